import { getSQLClient } from "../db";
import { Product } from "../types/db";
import { fail, ok, ServiceResult } from "../types/result";
import { ProductListQuery, ProductRequest } from "../validations/product";
import { displayPrice, isLowStock, roundMoney } from "../utils/pricing";
import { uniqueSlug } from "../utils/slug";

export interface VendorProduct {
  id: number;
  name: string;
  slug: string;
  categoryId: number | null;
  description: string;
  price: number;
  discountPrice: number | null;
  displayPrice: number;
  quantity: number;
  weight: number | null;
  unit: Product["unit"];
  lowStockThreshold: number;
  lowStock: boolean;
  image: string | null;
  isAvailable: boolean;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export function toVendorProduct(product: Product): VendorProduct {
  return {
    id: product.id,
    name: product.name,
    slug: product.slug,
    categoryId: product.category_id,
    description: product.description,
    price: product.price,
    discountPrice: product.discount_price,
    displayPrice: roundMoney(displayPrice(product)),
    quantity: product.quantity,
    weight: product.weight,
    unit: product.unit,
    lowStockThreshold: product.low_stock_threshold,
    lowStock: isLowStock(product),
    image: product.image,
    isAvailable: product.is_available,
    isActive: product.is_active,
    createdAt: product.created_at,
    updatedAt: product.updated_at,
  };
}

export async function getVendorProducts(
  vendorId: number,
  filters: ProductListQuery = {}
): Promise<VendorProduct[]> {
  let query = getSQLClient()
    .selectFrom("products")
    .selectAll()
    .where("vendor_id", "=", vendorId);

  if (filters.categoryId !== undefined) {
    query = query.where("category_id", "=", filters.categoryId);
  }
  if (filters.availability) {
    query = query.where("is_available", "=", filters.availability === "available");
  }

  const products = await query.orderBy("created_at", "desc").orderBy("id", "desc").execute();
  return products.map(toVendorProduct);
}

async function findVendorProduct(vendorId: number, productId: number) {
  return getSQLClient()
    .selectFrom("products")
    .selectAll()
    .where("id", "=", productId)
    .where("vendor_id", "=", vendorId)
    .executeTakeFirst();
}

export async function getVendorProduct(
  vendorId: number,
  productId: number
): Promise<ServiceResult<VendorProduct>> {
  const product = await findVendorProduct(vendorId, productId);
  if (!product) {
    return fail("NotFound", "Product not found");
  }
  return ok(toVendorProduct(product));
}

async function categoryIsActive(categoryId: number) {
  const category = await getSQLClient()
    .selectFrom("categories")
    .select("id")
    .where("id", "=", categoryId)
    .where("is_active", "=", true)
    .executeTakeFirst();
  return category !== undefined;
}

async function productSlugTaken(slug: string) {
  const existing = await getSQLClient()
    .selectFrom("products")
    .select("id")
    .where("slug", "=", slug)
    .executeTakeFirst();
  return existing !== undefined;
}

function productColumns(request: ProductRequest) {
  return {
    name: request.name,
    category_id: request.categoryId,
    description: request.description,
    price: request.price,
    discount_price: request.discountPrice,
    quantity: request.quantity,
    weight: request.weight,
    unit: request.unit,
    low_stock_threshold: request.lowStockThreshold,
    image: request.image,
  };
}

export async function createProduct(
  vendorId: number,
  request: ProductRequest
): Promise<ServiceResult<VendorProduct>> {
  if (!(await categoryIsActive(request.categoryId))) {
    return fail("ValidationError", "Select a valid category");
  }

  const product = await getSQLClient()
    .insertInto("products")
    .values({
      ...productColumns(request),
      vendor_id: vendorId,
      slug: await uniqueSlug(request.name, productSlugTaken),
    })
    .returningAll()
    .executeTakeFirstOrThrow();

  console.log(`Vendor #${vendorId} added product ${product.name} (#${product.id})`);
  return ok(toVendorProduct(product));
}

/** The slug is fixed at creation so product links keep working after a rename. */
export async function updateProduct(
  vendorId: number,
  productId: number,
  request: ProductRequest
): Promise<ServiceResult<VendorProduct>> {
  const existing = await findVendorProduct(vendorId, productId);
  if (!existing) {
    return fail("NotFound", "Product not found");
  }
  if (
    request.categoryId !== existing.category_id &&
    !(await categoryIsActive(request.categoryId))
  ) {
    return fail("ValidationError", "Select a valid category");
  }

  const product = await getSQLClient()
    .updateTable("products")
    .set({ ...productColumns(request), updated_at: new Date() })
    .where("id", "=", productId)
    .returningAll()
    .executeTakeFirstOrThrow();

  return ok(toVendorProduct(product));
}

/**
 * Removes the product and every cart line holding it. Past order items keep
 * their name and price snapshot and lose only the link.
 */
export async function deleteProduct(
  vendorId: number,
  productId: number
): Promise<ServiceResult<{ id: number }>> {
  const existing = await findVendorProduct(vendorId, productId);
  if (!existing) {
    return fail("NotFound", "Product not found");
  }

  await getSQLClient()
    .transaction()
    .execute(async (trx) => {
      await trx.deleteFrom("cart_items").where("product_id", "=", productId).execute();
      await trx
        .updateTable("order_items")
        .set({ product_id: null })
        .where("product_id", "=", productId)
        .execute();
      await trx.deleteFrom("products").where("id", "=", productId).execute();
    });

  console.log(`Vendor #${vendorId} deleted product ${existing.name} (#${productId})`);
  return ok({ id: productId });
}

export async function toggleProductAvailability(
  vendorId: number,
  productId: number
): Promise<ServiceResult<VendorProduct>> {
  const existing = await findVendorProduct(vendorId, productId);
  if (!existing) {
    return fail("NotFound", "Product not found");
  }

  const product = await getSQLClient()
    .updateTable("products")
    .set({ is_available: !existing.is_available, updated_at: new Date() })
    .where("id", "=", productId)
    .returningAll()
    .executeTakeFirstOrThrow();

  return ok(toVendorProduct(product));
}
