import { z } from "zod";

export const ZAddToCartSchema = z.object({
  quantity: z.number().int().positive().default(1),
});

export const ZCartItemActionParams = z.object({
  itemId: z.coerce.number().int().positive(),
  action: z.enum(["increment", "decrement"]),
});

export type AddToCartRequest = z.infer<typeof ZAddToCartSchema>;
export type CartItemAction = z.infer<typeof ZCartItemActionParams>["action"];
