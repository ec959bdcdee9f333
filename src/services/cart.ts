import { Kysely } from "kysely";
import { getSQLClient } from "../db";
import { DB, ProductUnit, VendorStatus } from "../types/db";
import { fail, ok, ServiceResult } from "../types/result";
import { CartItemAction } from "../validations/cart";
import { displayPrice, roundMoney } from "../utils/pricing";

export interface CartLine {
  id: number;
  quantity: number;
  lineTotal: number;
  product: {
    id: number;
    name: string;
    slug: string;
    image: string | null;
    unit: ProductUnit;
    price: number;
    discountPrice: number | null;
    displayPrice: number;
    stock: number;
    vendorId: number;
    vendorShopName: string;
    isSellable: boolean;
  };
}

export interface CartView {
  id: number;
  items: CartLine[];
  totalPrice: number;
  totalItems: number;
}

/** One cart per customer, created the first time it is needed. */
export async function getOrCreateCartId(userId: number): Promise<number> {
  const db = getSQLClient();

  const existing = await db
    .selectFrom("carts")
    .select("id")
    .where("user_id", "=", userId)
    .executeTakeFirst();
  if (existing) {
    return existing.id;
  }

  const created = await db
    .insertInto("carts")
    .values({ user_id: userId })
    .onConflict((oc) => oc.column("user_id").doNothing())
    .returning("id")
    .executeTakeFirst();
  if (created) {
    return created.id;
  }

  // a concurrent request created it first
  const winner = await db
    .selectFrom("carts")
    .select("id")
    .where("user_id", "=", userId)
    .executeTakeFirstOrThrow();
  return winner.id;
}

interface LineProductRow {
  product_id: number;
  name: string;
  slug: string;
  image: string | null;
  unit: ProductUnit;
  price: number;
  discount_price: number | null;
  stock: number;
  is_active: boolean;
  is_available: boolean;
  vendor_id: number;
  shop_name: string;
  vendor_status: VendorStatus;
}

/** Prices `quantity` units of a product at its current display price. */
export function toOrderLine(row: LineProductRow, quantity: number): Omit<CartLine, "id"> {
  const unitPrice = roundMoney(displayPrice(row));
  return {
    quantity,
    lineTotal: roundMoney(unitPrice * quantity),
    product: {
      id: row.product_id,
      name: row.name,
      slug: row.slug,
      image: row.image,
      unit: row.unit,
      price: row.price,
      discountPrice: row.discount_price,
      displayPrice: unitPrice,
      stock: row.stock,
      vendorId: row.vendor_id,
      vendorShopName: row.shop_name,
      isSellable: row.is_active && row.is_available && row.vendor_status === "approved",
    },
  };
}

/**
 * Cart lines priced with each product's current display price. Cart totals
 * follow live prices; only orders freeze them.
 */
export async function loadCartLines(
  db: Kysely<DB>,
  cartId: number
): Promise<CartLine[]> {
  const rows = await db
    .selectFrom("cart_items")
    .innerJoin("products", "products.id", "cart_items.product_id")
    .innerJoin("vendors", "vendors.id", "products.vendor_id")
    .select([
      "cart_items.id",
      "cart_items.quantity",
      "products.id as product_id",
      "products.name",
      "products.slug",
      "products.image",
      "products.unit",
      "products.price",
      "products.discount_price",
      "products.quantity as stock",
      "products.is_active",
      "products.is_available",
      "products.vendor_id",
      "vendors.shop_name",
      "vendors.status as vendor_status",
    ])
    .where("cart_items.cart_id", "=", cartId)
    .orderBy("cart_items.id")
    .execute();

  return rows.map((row) => ({ id: row.id, ...toOrderLine(row, row.quantity) }));
}

export function summarizeCart(cartId: number, items: CartLine[]): CartView {
  return {
    id: cartId,
    items,
    totalPrice: roundMoney(items.reduce((sum, item) => sum + item.lineTotal, 0)),
    totalItems: items.reduce((sum, item) => sum + item.quantity, 0),
  };
}

export async function getCart(userId: number): Promise<CartView> {
  const cartId = await getOrCreateCartId(userId);
  return summarizeCart(cartId, await loadCartLines(getSQLClient(), cartId));
}

function outOfStock(name: string, available: number, requested: number) {
  return fail(
    "OutOfStock",
    available > 0
      ? `Only ${available} unit(s) of ${name} available`
      : `${name} is currently out of stock.`,
    { available, requested }
  );
}

/**
 * Adds `quantity` units of a product. Stock is only checked here, never
 * reserved; a request that would exceed stock changes nothing.
 */
export async function addToCart(
  userId: number,
  productSlug: string,
  quantity = 1
): Promise<ServiceResult<CartView>> {
  const db = getSQLClient();

  const product = await db
    .selectFrom("products")
    .innerJoin("vendors", "vendors.id", "products.vendor_id")
    .select(["products.id", "products.name", "products.quantity"])
    .where("products.slug", "=", productSlug)
    .where("products.is_active", "=", true)
    .where("products.is_available", "=", true)
    .where("vendors.status", "=", "approved")
    .executeTakeFirst();

  if (!product) {
    return fail("NotFound", "Product not found");
  }
  if (product.quantity < 1) {
    return outOfStock(product.name, 0, quantity);
  }

  const cartId = await getOrCreateCartId(userId);

  const existing = await db
    .selectFrom("cart_items")
    .select(["id", "quantity"])
    .where("cart_id", "=", cartId)
    .where("product_id", "=", product.id)
    .executeTakeFirst();

  if (existing) {
    const newQuantity = existing.quantity + quantity;
    if (newQuantity > product.quantity) {
      return outOfStock(product.name, product.quantity, newQuantity);
    }
    await db
      .updateTable("cart_items")
      .set({ quantity: newQuantity })
      .where("id", "=", existing.id)
      .execute();
  } else {
    if (quantity > product.quantity) {
      return outOfStock(product.name, product.quantity, quantity);
    }
    await db
      .insertInto("cart_items")
      .values({ cart_id: cartId, product_id: product.id, quantity })
      .execute();
  }

  await db
    .updateTable("carts")
    .set({ updated_at: new Date() })
    .where("id", "=", cartId)
    .execute();

  return ok(summarizeCart(cartId, await loadCartLines(db, cartId)));
}

async function findOwnedCartItem(userId: number, itemId: number) {
  return getSQLClient()
    .selectFrom("cart_items")
    .innerJoin("carts", "carts.id", "cart_items.cart_id")
    .innerJoin("products", "products.id", "cart_items.product_id")
    .select([
      "cart_items.id",
      "cart_items.cart_id",
      "cart_items.quantity",
      "products.name",
      "products.quantity as stock",
    ])
    .where("cart_items.id", "=", itemId)
    .where("carts.user_id", "=", userId)
    .executeTakeFirst();
}

/**
 * Steps a line up or down by one. Incrementing past stock is refused;
 * decrementing the last unit removes the line.
 */
export async function updateCartItem(
  userId: number,
  itemId: number,
  action: CartItemAction
): Promise<ServiceResult<CartView>> {
  const db = getSQLClient();
  const item = await findOwnedCartItem(userId, itemId);

  if (!item) {
    return fail("NotFound", "Cart item not found");
  }

  if (action === "increment") {
    if (item.quantity + 1 > item.stock) {
      return outOfStock(item.name, item.stock, item.quantity + 1);
    }
    await db
      .updateTable("cart_items")
      .set({ quantity: item.quantity + 1 })
      .where("id", "=", item.id)
      .execute();
  } else if (item.quantity - 1 < 1) {
    await db.deleteFrom("cart_items").where("id", "=", item.id).execute();
  } else {
    await db
      .updateTable("cart_items")
      .set({ quantity: item.quantity - 1 })
      .where("id", "=", item.id)
      .execute();
  }

  return ok(summarizeCart(item.cart_id, await loadCartLines(db, item.cart_id)));
}

export async function removeCartItem(
  userId: number,
  itemId: number
): Promise<ServiceResult<CartView>> {
  const db = getSQLClient();
  const item = await findOwnedCartItem(userId, itemId);

  if (!item) {
    return fail("NotFound", "Cart item not found");
  }

  await db.deleteFrom("cart_items").where("id", "=", item.id).execute();

  return ok(summarizeCart(item.cart_id, await loadCartLines(db, item.cart_id)));
}
