import { z } from "zod";

export const PRODUCT_UNITS = ["kg", "g", "l", "ml", "piece", "pack"] as const;

// numeric(10, 2) columns
const MAX_PRICE = 99999999.99;

const ZPrice = z
  .number()
  .nonnegative()
  .max(MAX_PRICE, "Price is too large")
  .multipleOf(0.01, "Prices can have at most 2 decimal places");

export const ZProductSchema = z
  .object({
    name: z.string().trim().min(1, "Product name is required").max(200),
    categoryId: z.number().int().positive({ message: "Select a category" }),
    description: z.string().trim().default(""),
    price: ZPrice,
    discountPrice: ZPrice.nullable().default(null),
    quantity: z.number().int().nonnegative().default(0),
    weight: z.number().nonnegative().max(999999.99).multipleOf(0.01).nullable().default(null),
    unit: z.enum(PRODUCT_UNITS).default("piece"),
    lowStockThreshold: z.number().int().nonnegative().default(10),
    image: z.string().trim().url().nullable().default(null),
  })
  .refine(
    (data) => data.discountPrice === null || data.discountPrice < data.price,
    {
      message: "Discount price must be less than regular price",
      path: ["discountPrice"],
    }
  );

export const ZProductListQuery = z.object({
  categoryId: z.coerce.number().int().positive().optional(),
  availability: z.enum(["available", "unavailable"]).optional(),
});

export const ZProductActiveSchema = z.object({
  isActive: z.boolean(),
});

export type ProductRequest = z.infer<typeof ZProductSchema>;
export type ProductListQuery = z.infer<typeof ZProductListQuery>;
