import { getSQLClient } from "../db";
import { matchPincode } from "../utils/pincode";
import { haversineKm } from "../utils/distance";
import { ProductCard, selectSellableProducts, toProductCard } from "./catalog";

export type PincodeAvailability = "not_checked" | "available" | "unavailable";

export interface ServingVendor {
  id: number;
  shopName: string;
  slug: string;
  city: string;
}

export interface VendorInRange extends ServingVendor {
  distanceKm: number;
  deliveryRadiusKm: number;
}

function approvedVendors() {
  return getSQLClient()
    .selectFrom("vendors")
    .select([
      "id",
      "shop_name",
      "slug",
      "city",
      "pincode",
      "latitude",
      "longitude",
      "delivery_radius",
    ])
    .where("status", "=", "approved")
    .orderBy("id")
    .execute();
}

/**
 * Linear scan over approved vendors for one that serves `pincode`.
 * A blank pincode is reported as not checked rather than unavailable.
 */
export async function checkPincodeAvailability(pincode: string): Promise<{
  pincode: string;
  status: PincodeAvailability;
  vendors: ServingVendor[];
}> {
  const candidate = pincode.trim();
  if (!candidate) {
    return { pincode: candidate, status: "not_checked", vendors: [] };
  }

  const vendors = (await approvedVendors()).filter(
    (vendor) => matchPincode(vendor.pincode, candidate) === true
  );

  return {
    pincode: candidate,
    status: vendors.length > 0 ? "available" : "unavailable",
    vendors: vendors.map((vendor) => ({
      id: vendor.id,
      shopName: vendor.shop_name,
      slug: vendor.slug,
      city: vendor.city,
    })),
  };
}

export async function findVendorsInRange(
  latitude: number,
  longitude: number
): Promise<VendorInRange[]> {
  const inRange: VendorInRange[] = [];

  for (const vendor of await approvedVendors()) {
    const distance = haversineKm(latitude, longitude, vendor.latitude, vendor.longitude);
    if (distance !== undefined && distance <= vendor.delivery_radius) {
      inRange.push({
        id: vendor.id,
        shopName: vendor.shop_name,
        slug: vendor.slug,
        city: vendor.city,
        distanceKm: distance,
        deliveryRadiusKm: vendor.delivery_radius,
      });
    }
  }

  return inRange.sort((a, b) => a.distanceKm - b.distanceKm);
}

/**
 * Sellable products from vendors that deliver to the given location.
 * Without a location every sellable product is returned.
 */
export async function getProductsInDeliveryRange(
  latitude?: number,
  longitude?: number
): Promise<ProductCard[]> {
  if (latitude === undefined || longitude === undefined) {
    const products = await selectSellableProducts()
      .orderBy("products.created_at", "desc")
      .orderBy("products.id", "desc")
      .execute();
    return products.map(toProductCard);
  }

  const vendors = await findVendorsInRange(latitude, longitude);
  if (vendors.length === 0) {
    return [];
  }

  const products = await selectSellableProducts()
    .where(
      "products.vendor_id",
      "in",
      vendors.map((vendor) => vendor.id)
    )
    .orderBy("products.created_at", "desc")
    .orderBy("products.id", "desc")
    .execute();
  return products.map(toProductCard);
}
