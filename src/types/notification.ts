import { z } from "zod";

export const ZNotificationMessage = z.object({
  template: z.enum([
    "welcome",
    "vendor-registration",
    "vendor-status",
    "order-placed",
    "order-status",
  ]),
  to: z.string().email(),
  subject: z.string(),
  body: z.string(),
});

export type NotificationMessage = z.infer<typeof ZNotificationMessage>;
