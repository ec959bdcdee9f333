import { getSQLClient } from "../db";
import { CategoryImageMap } from "../config";
import { VendorStatus } from "../types/db";
import { fail, ok, ServiceResult } from "../types/result";
import { CategoryRequest, CategoryUpdateRequest } from "../validations/catalog";
import { roundMoney } from "../utils/pricing";
import { slugify, uniqueSlug } from "../utils/slug";
import { CategoryCard, toCategoryCard } from "./catalog";
import { notify, vendorStatusEmail } from "./notifications";
import { toVendorProduct, VendorProduct } from "./products";
import { toVendorProfile, VendorProfile } from "./vendors";

export async function listVendors(status?: VendorStatus): Promise<VendorProfile[]> {
  let query = getSQLClient().selectFrom("vendors").selectAll();
  if (status) {
    query = query.where("status", "=", status);
  }
  const vendors = await query.orderBy("created_at", "desc").orderBy("id", "desc").execute();
  return vendors.map(toVendorProfile);
}

export async function setVendorStatus(
  vendorId: number,
  status: VendorStatus
): Promise<ServiceResult<VendorProfile>> {
  const existing = await getSQLClient()
    .selectFrom("vendors")
    .select(["id", "status"])
    .where("id", "=", vendorId)
    .executeTakeFirst();

  if (!existing) {
    return fail("NotFound", "Vendor not found");
  }

  const vendor = await getSQLClient()
    .updateTable("vendors")
    .set({ status, updated_at: new Date() })
    .where("id", "=", vendorId)
    .returningAll()
    .executeTakeFirstOrThrow();

  if (existing.status !== status) {
    console.log(`Vendor ${vendor.shop_name} (#${vendor.id}) is now ${status}`);
    await notify(vendorStatusEmail(vendor));
  }

  return ok(toVendorProfile(vendor));
}

export async function listCategories(categoryImages: CategoryImageMap) {
  const categories = await getSQLClient()
    .selectFrom("categories")
    .selectAll()
    .orderBy("name")
    .execute();

  return categories.map((category) => ({
    ...toCategoryCard(category, categoryImages),
    isActive: category.is_active,
  }));
}

async function categoryNameTaken(name: string, exceptId?: number) {
  let query = getSQLClient().selectFrom("categories").select("id").where("name", "=", name);
  if (exceptId !== undefined) {
    query = query.where("id", "!=", exceptId);
  }
  return (await query.executeTakeFirst()) !== undefined;
}

async function categorySlugTaken(slug: string) {
  const existing = await getSQLClient()
    .selectFrom("categories")
    .select("id")
    .where("slug", "=", slug)
    .executeTakeFirst();
  return existing !== undefined;
}

export async function createCategory(
  request: CategoryRequest,
  categoryImages: CategoryImageMap
): Promise<ServiceResult<CategoryCard>> {
  if (await categoryNameTaken(request.name)) {
    return fail("ValidationError", "Category already exists");
  }

  const category = await getSQLClient()
    .insertInto("categories")
    .values({
      name: request.name,
      slug: await uniqueSlug(request.name, categorySlugTaken),
      description: request.description,
      is_active: request.isActive,
    })
    .returningAll()
    .executeTakeFirstOrThrow();

  console.log(`Created category ${category.name} (#${category.id})`);
  return ok(toCategoryCard(category, categoryImages));
}

export async function updateCategory(
  categoryId: number,
  request: CategoryUpdateRequest,
  categoryImages: CategoryImageMap
): Promise<ServiceResult<CategoryCard>> {
  const existing = await getSQLClient()
    .selectFrom("categories")
    .selectAll()
    .where("id", "=", categoryId)
    .executeTakeFirst();

  if (!existing) {
    return fail("NotFound", "Category not found");
  }
  if (request.name !== undefined && (await categoryNameTaken(request.name, categoryId))) {
    return fail("ValidationError", "Category already exists");
  }

  const slug =
    request.name !== undefined && slugify(request.name) !== existing.slug
      ? await uniqueSlug(request.name, categorySlugTaken)
      : existing.slug;

  const category = await getSQLClient()
    .updateTable("categories")
    .set({
      name: request.name ?? existing.name,
      slug,
      description: request.description ?? existing.description,
      is_active: request.isActive ?? existing.is_active,
    })
    .where("id", "=", categoryId)
    .returningAll()
    .executeTakeFirstOrThrow();

  return ok(toCategoryCard(category, categoryImages));
}

/** Products in the category are kept and become uncategorized. */
export async function deleteCategory(categoryId: number): Promise<ServiceResult<{ id: number }>> {
  const deleted = await getSQLClient()
    .transaction()
    .execute(async (trx) => {
      await trx
        .updateTable("products")
        .set({ category_id: null })
        .where("category_id", "=", categoryId)
        .execute();
      return trx
        .deleteFrom("categories")
        .where("id", "=", categoryId)
        .returning(["id", "name"])
        .executeTakeFirst();
    });

  if (!deleted) {
    return fail("NotFound", "Category not found");
  }

  console.log(`Deleted category ${deleted.name} (#${deleted.id})`);
  return ok({ id: deleted.id });
}

export async function listAllProducts(): Promise<VendorProduct[]> {
  const products = await getSQLClient()
    .selectFrom("products")
    .selectAll()
    .orderBy("created_at", "desc")
    .orderBy("id", "desc")
    .execute();
  return products.map(toVendorProduct);
}

export async function setProductActive(
  productId: number,
  isActive: boolean
): Promise<ServiceResult<VendorProduct>> {
  const product = await getSQLClient()
    .updateTable("products")
    .set({ is_active: isActive, updated_at: new Date() })
    .where("id", "=", productId)
    .returningAll()
    .executeTakeFirst();

  if (!product) {
    return fail("NotFound", "Product not found");
  }

  console.log(`Product ${product.name} (#${product.id}) ${isActive ? "activated" : "deactivated"}`);
  return ok(toVendorProduct(product));
}

export async function listAllOrders() {
  const db = getSQLClient();

  const orders = await db
    .selectFrom("orders")
    .innerJoin("users", "users.id", "orders.user_id")
    .select([
      "orders.id",
      "orders.total_amount",
      "orders.payment_method",
      "orders.is_paid",
      "orders.customer_name",
      "orders.customer_phone",
      "orders.delivery_address",
      "orders.delivery_pincode",
      "orders.created_at",
      "users.username",
    ])
    .orderBy("orders.created_at", "desc")
    .orderBy("orders.id", "desc")
    .execute();

  if (orders.length === 0) {
    return [];
  }

  const items = await db
    .selectFrom("order_items")
    .innerJoin("vendors", "vendors.id", "order_items.vendor_id")
    .select([
      "order_items.id",
      "order_items.order_id",
      "order_items.product_name",
      "order_items.quantity",
      "order_items.price",
      "order_items.status",
      "vendors.shop_name",
    ])
    .where(
      "order_items.order_id",
      "in",
      orders.map((order) => order.id)
    )
    .orderBy("order_items.id")
    .execute();

  return orders.map((order) => ({
    id: order.id,
    username: order.username,
    totalAmount: order.total_amount,
    paymentMethod: order.payment_method,
    isPaid: order.is_paid,
    customerName: order.customer_name,
    customerPhone: order.customer_phone,
    deliveryAddress: order.delivery_address,
    deliveryPincode: order.delivery_pincode,
    createdAt: order.created_at,
    items: items
      .filter((item) => item.order_id === order.id)
      .map((item) => ({
        id: item.id,
        productName: item.product_name,
        vendorShopName: item.shop_name,
        quantity: item.quantity,
        price: item.price,
        total: roundMoney(item.price * item.quantity),
        status: item.status,
      })),
  }));
}
