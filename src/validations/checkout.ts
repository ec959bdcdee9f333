import { z } from "zod";

export const PAYMENT_METHODS = ["cod", "online", "upi", "card"] as const;

const requiredField = (label: string, max: number) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`)
    .max(max);

export const ZCheckoutSchema = z.object({
  customerName: requiredField("Name", 100),
  customerPhone: requiredField("Phone", 15),
  deliveryAddress: requiredField("Address", 1000),
  paymentMethod: z.enum(PAYMENT_METHODS, {
    required_error: "Payment method is required",
    invalid_type_error: "Payment method is required",
  }),
  deliveryPincode: z
    .string()
    .trim()
    .regex(/^\d{6}$/, "Pincode must be exactly 6 digits")
    .optional(),
  deliveryLatitude: z.number().min(-90).max(90).optional(),
  deliveryLongitude: z.number().min(-180).max(180).optional(),
});

export const ZBuyNowSchema = ZCheckoutSchema.extend({
  quantity: z.number().int().positive().default(1),
});

export type CheckoutRequest = z.infer<typeof ZCheckoutSchema>;
export type BuyNowRequest = z.infer<typeof ZBuyNowSchema>;
