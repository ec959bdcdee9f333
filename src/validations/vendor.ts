import { z } from "zod";
import { normalizeVendorPincodes } from "../utils/pincode";
import {
  DEFAULT_DELIVERY_RADIUS_KM,
  MAX_DELIVERY_RADIUS_KM,
  MIN_DELIVERY_RADIUS_KM,
} from "../types/constants";
import { isCalendarDay } from "../utils/dates";
import { ORDER_ITEM_STATUSES } from "../utils/fulfillment";

const requiredText = (label: string, max: number) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`)
    .max(max);

export const ZPincodeField = z
  .string({ required_error: "Please enter at least one valid 6-digit pincode." })
  .transform((raw, ctx) => {
    const normalized = normalizeVendorPincodes(raw);
    if (!normalized.isSuccess) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: normalized.error.message });
      return z.NEVER;
    }
    return normalized.data;
  });

const ZVendorProfileFields = z.object({
  shopName: requiredText("Shop name", 200),
  ownerName: requiredText("Owner name", 100),
  email: z.string().trim().email(),
  phone: requiredText("Phone", 15),
  address: requiredText("Address", 500),
  city: requiredText("City", 100),
  state: requiredText("State", 100),
  pincode: ZPincodeField,
  latitude: z.number().min(-90).max(90).nullable().default(null),
  longitude: z.number().min(-180).max(180).nullable().default(null),
  deliveryRadius: z
    .number()
    .min(MIN_DELIVERY_RADIUS_KM, `Delivery radius must be at least ${MIN_DELIVERY_RADIUS_KM} km`)
    .max(MAX_DELIVERY_RADIUS_KM, `Delivery radius must be at most ${MAX_DELIVERY_RADIUS_KM} km`)
    .default(DEFAULT_DELIVERY_RADIUS_KM),
  shopLogo: z.string().trim().url().nullable().default(null),
  shopBanner: z.string().trim().url().nullable().default(null),
});

export const ZVendorSignupSchema = ZVendorProfileFields.extend({
  username: requiredText("Username", 150),
  password: z.string().min(6, "Password must be at least 6 characters"),
  confirmPassword: z.string(),
}).refine((data) => data.password === data.confirmPassword, {
  message: "Passwords do not match",
  path: ["confirmPassword"],
});

export const ZVendorProfileSchema = ZVendorProfileFields;

export const ZVendorStatusSchema = z.object({
  status: z.enum(["pending", "approved", "rejected", "blocked"]),
});

export const ZOrderItemStatusSchema = z.object({
  status: z.enum(ORDER_ITEM_STATUSES),
});

const ZDateFilter = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Dates must look like YYYY-MM-DD")
  .refine(isCalendarDay, "Enter a real calendar date")
  .optional();

export const ZVendorOrdersQuery = z.object({
  status: z.enum(ORDER_ITEM_STATUSES).optional(),
  dateFrom: ZDateFilter,
  dateTo: ZDateFilter,
});

export const ZEarningsQuery = z.object({
  dateFrom: ZDateFilter,
  dateTo: ZDateFilter,
  productId: z.coerce.number().int().positive().optional(),
  categoryId: z.coerce.number().int().positive().optional(),
});

export type VendorSignupRequest = z.infer<typeof ZVendorSignupSchema>;
export type VendorProfileRequest = z.infer<typeof ZVendorProfileSchema>;
export type VendorStatusRequest = z.infer<typeof ZVendorStatusSchema>;
export type OrderItemStatusRequest = z.infer<typeof ZOrderItemStatusSchema>;
export type VendorOrdersQuery = z.infer<typeof ZVendorOrdersQuery>;
export type EarningsQuery = z.infer<typeof ZEarningsQuery>;

export const ZVendorListQuery = z.object({
  status: z.enum(["pending", "approved", "rejected", "blocked"]).optional(),
});
