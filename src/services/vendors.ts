import { getSQLClient } from "../db";
import { VendorPrincipal } from "../types/auth";
import { Vendor, VendorStatus } from "../types/db";
import {
  LOW_STOCK_ITEMS_LIMIT,
  RECENT_ORDER_ITEMS_LIMIT,
} from "../types/constants";
import { fail, ok, ServiceResult } from "../types/result";
import { VendorProfileRequest, VendorSignupRequest } from "../validations/vendor";
import { extractServiceablePincodes } from "../utils/pincode";
import { isLowStock, roundMoney } from "../utils/pricing";
import { uniqueSlug } from "../utils/slug";
import { findRegistrationConflicts, hashPassword, issueToken } from "./auth";
import { notify, vendorRegistrationEmail } from "./notifications";

export interface VendorProfile {
  id: number;
  shopName: string;
  slug: string;
  ownerName: string;
  email: string;
  phone: string;
  address: string;
  city: string;
  state: string;
  pincode: string;
  serviceablePincodes: string[];
  latitude: number | null;
  longitude: number | null;
  deliveryRadius: number;
  shopLogo: string | null;
  shopBanner: string | null;
  status: VendorStatus;
  createdAt: Date;
}

export function toVendorProfile(vendor: Vendor): VendorProfile {
  return {
    id: vendor.id,
    shopName: vendor.shop_name,
    slug: vendor.slug,
    ownerName: vendor.owner_name,
    email: vendor.email,
    phone: vendor.phone,
    address: vendor.address,
    city: vendor.city,
    state: vendor.state,
    pincode: vendor.pincode,
    serviceablePincodes: extractServiceablePincodes(vendor.pincode),
    latitude: vendor.latitude,
    longitude: vendor.longitude,
    deliveryRadius: vendor.delivery_radius,
    shopLogo: vendor.shop_logo,
    shopBanner: vendor.shop_banner,
    status: vendor.status,
    createdAt: vendor.created_at,
  };
}

function profileColumns(request: VendorProfileRequest) {
  return {
    shop_name: request.shopName,
    owner_name: request.ownerName,
    email: request.email,
    phone: request.phone,
    address: request.address,
    city: request.city,
    state: request.state,
    pincode: request.pincode,
    latitude: request.latitude,
    longitude: request.longitude,
    delivery_radius: request.deliveryRadius,
    shop_logo: request.shopLogo,
    shop_banner: request.shopBanner,
  };
}

async function vendorEmailTaken(email: string, exceptVendorId?: number) {
  let query = getSQLClient().selectFrom("vendors").select("id").where("email", "=", email);
  if (exceptVendorId !== undefined) {
    query = query.where("id", "!=", exceptVendorId);
  }
  return (await query.executeTakeFirst()) !== undefined;
}

async function vendorSlugTaken(slug: string) {
  const existing = await getSQLClient()
    .selectFrom("vendors")
    .select("id")
    .where("slug", "=", slug)
    .executeTakeFirst();
  return existing !== undefined;
}

/**
 * Creates the account and its pending vendor profile together. The vendor
 * can sign in straight away but stays gated until an admin approves it.
 */
export async function registerVendor(
  request: VendorSignupRequest
): Promise<ServiceResult<{ token: string; vendor: VendorProfile }>> {
  const conflicts = await findRegistrationConflicts(request.username, request.email);
  if (await vendorEmailTaken(request.email)) {
    conflicts.push("Email already registered as vendor");
  }
  if (conflicts.length > 0) {
    return fail("ValidationError", conflicts[0], conflicts);
  }

  const passwordHash = await hashPassword(request.password);
  const slug = await uniqueSlug(request.shopName, vendorSlugTaken);

  const vendor = await getSQLClient()
    .transaction()
    .execute(async (trx) => {
      const user = await trx
        .insertInto("users")
        .values({
          username: request.username,
          email: request.email,
          password_hash: passwordHash,
          full_name: request.ownerName,
        })
        .returning("id")
        .executeTakeFirstOrThrow();

      return trx
        .insertInto("vendors")
        .values({
          ...profileColumns(request),
          user_id: user.id,
          slug,
          status: "pending",
        })
        .returningAll()
        .executeTakeFirstOrThrow();
    });

  console.log(`Vendor ${vendor.shop_name} (#${vendor.id}) registered, pending approval`);

  await notify(vendorRegistrationEmail(vendor));

  return ok({ token: issueToken(vendor.user_id), vendor: toVendorProfile(vendor) });
}

export async function getVendorProfile(vendorId: number): Promise<ServiceResult<VendorProfile>> {
  const vendor = await getSQLClient()
    .selectFrom("vendors")
    .selectAll()
    .where("id", "=", vendorId)
    .executeTakeFirst();

  if (!vendor) {
    return fail("NotFound", "Vendor not found");
  }
  return ok(toVendorProfile(vendor));
}

export async function updateVendorProfile(
  vendorId: number,
  request: VendorProfileRequest
): Promise<ServiceResult<VendorProfile>> {
  if (await vendorEmailTaken(request.email, vendorId)) {
    return fail("ValidationError", "Email already registered as vendor");
  }

  const vendor = await getSQLClient()
    .updateTable("vendors")
    .set({ ...profileColumns(request), updated_at: new Date() })
    .where("id", "=", vendorId)
    .returningAll()
    .executeTakeFirst();

  if (!vendor) {
    return fail("NotFound", "Vendor not found");
  }
  return ok(toVendorProfile(vendor));
}

export function getVendorStatus(principal: VendorPrincipal) {
  return {
    vendorId: principal.vendorId,
    status: principal.vendorStatus,
    approved: principal.vendorStatus === "approved",
  };
}

const startOfDayAgo = (days: number, now: Date) => {
  const start = new Date(now);
  start.setUTCHours(0, 0, 0, 0);
  start.setUTCDate(start.getUTCDate() - days);
  return start;
};

export async function getVendorDashboard(vendorId: number, now = new Date()) {
  const db = getSQLClient();

  const products = await db
    .selectFrom("products")
    .select(["quantity", "low_stock_threshold", "is_available"])
    .where("vendor_id", "=", vendorId)
    .execute();

  const orderItems = await db
    .selectFrom("order_items")
    .select(["quantity", "price", "status", "updated_at"])
    .where("vendor_id", "=", vendorId)
    .execute();
  const delivered = orderItems.filter((item) => item.status === "Delivered");

  // Delivered items are dated by their last status change.
  const revenueSince = (since?: Date) =>
    roundMoney(
      delivered
        .filter((item) => !since || item.updated_at >= since)
        .reduce((sum, item) => sum + item.price * item.quantity, 0)
    );

  const recentOrders = await db
    .selectFrom("order_items")
    .innerJoin("orders", "orders.id", "order_items.order_id")
    .select([
      "order_items.id",
      "order_items.order_id",
      "order_items.product_name",
      "order_items.quantity",
      "order_items.price",
      "order_items.status",
      "order_items.created_at",
      "orders.customer_name",
    ])
    .where("order_items.vendor_id", "=", vendorId)
    .orderBy("order_items.created_at", "desc")
    .orderBy("order_items.id", "desc")
    .limit(RECENT_ORDER_ITEMS_LIMIT)
    .execute();

  const lowStockItems = await db
    .selectFrom("products")
    .select(["id", "name", "slug", "quantity", "low_stock_threshold"])
    .where("vendor_id", "=", vendorId)
    .where("quantity", ">", 0)
    .whereRef("quantity", "<=", "low_stock_threshold")
    .orderBy("quantity")
    .orderBy("id")
    .limit(LOW_STOCK_ITEMS_LIMIT)
    .execute();

  return {
    products: {
      total: products.length,
      available: products.filter((product) => product.is_available).length,
      lowStock: products.filter(isLowStock).length,
    },
    orders: {
      total: orderItems.length,
      pending: orderItems.filter((item) => item.status === "Pending").length,
      delivered: delivered.length,
    },
    revenue: {
      total: revenueSince(),
      today: revenueSince(startOfDayAgo(0, now)),
      week: revenueSince(startOfDayAgo(7, now)),
      month: revenueSince(startOfDayAgo(30, now)),
    },
    recentOrders: recentOrders.map((row) => ({
      id: row.id,
      orderId: row.order_id,
      productName: row.product_name,
      quantity: row.quantity,
      total: roundMoney(row.price * row.quantity),
      status: row.status,
      customerName: row.customer_name,
      createdAt: row.created_at,
    })),
    lowStockItems: lowStockItems.map((row) => ({
      id: row.id,
      name: row.name,
      slug: row.slug,
      quantity: row.quantity,
      lowStockThreshold: row.low_stock_threshold,
    })),
  };
}
