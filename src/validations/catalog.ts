import { z } from "zod";

export const ZPincodeQuery = z.object({
  pincode: z.string().default(""),
});

export const ZLocationQuery = z.object({
  lat: z.coerce.number().min(-90).max(90).optional(),
  lon: z.coerce.number().min(-180).max(180).optional(),
});

export const ZCategorySchema = z.object({
  name: z.string().trim().min(1, "Category name is required").max(100),
  description: z.string().trim().default(""),
  isActive: z.boolean().default(true),
});

export const ZCategoryUpdateSchema = z.object({
  name: z.string().trim().min(1).max(100).optional(),
  description: z.string().trim().optional(),
  isActive: z.boolean().optional(),
});

export const ZContactSchema = z.object({
  name: z.string().trim().min(1, "Name is required").max(100),
  email: z.string().trim().email(),
  subject: z.string().trim().min(1, "Subject is required").max(200),
  message: z.string().trim().min(1, "Message is required"),
});

export const ZContactListQuery = z.object({
  resolved: z
    .enum(["true", "false"])
    .transform((value) => value === "true")
    .optional(),
});

export type LocationQuery = z.infer<typeof ZLocationQuery>;
export type CategoryRequest = z.infer<typeof ZCategorySchema>;
export type CategoryUpdateRequest = z.infer<typeof ZCategoryUpdateSchema>;
export type ContactRequest = z.infer<typeof ZContactSchema>;
