import { sql, Transaction } from "kysely";
import { getSQLClient } from "../db";
import { CustomerPrincipal } from "../types/auth";
import { DB, OrderItemStatus, PaymentMethod } from "../types/db";
import { fail, ok, ServiceError, ServiceResult } from "../types/result";
import { CheckoutRequest } from "../validations/checkout";
import { roundMoney } from "../utils/pricing";
import {
  CartLine,
  CartView,
  getOrCreateCartId,
  loadCartLines,
  summarizeCart,
  toOrderLine,
} from "./cart";
import { notify, orderPlacedEmail } from "./notifications";

export interface PlacedOrderItem {
  id: number;
  productId: number | null;
  productName: string;
  vendorId: number;
  quantity: number;
  price: number;
  status: OrderItemStatus;
}

export interface PlacedOrder {
  id: number;
  totalAmount: number;
  paymentMethod: PaymentMethod;
  isPaid: boolean;
  customerName: string;
  customerPhone: string;
  deliveryAddress: string;
  createdAt: Date;
  items: PlacedOrderItem[];
}

/** Thrown inside the checkout transaction to roll it back with a known outcome. */
class CheckoutAborted extends Error {
  constructor(readonly reason: ServiceError) {
    super(reason.message);
    this.name = "CheckoutAborted";
  }
}

type OrderLine = Omit<CartLine, "id">;

function findShortages(lines: OrderLine[]) {
  return lines
    .filter((line) => line.quantity > line.product.stock)
    .map((line) => ({
      productId: line.product.id,
      productName: line.product.name,
      requested: line.quantity,
      available: line.product.stock,
    }));
}

export async function getCheckoutSummary(
  principal: CustomerPrincipal
): Promise<ServiceResult<{ cart: CartView; customerName: string }>> {
  const cartId = await getOrCreateCartId(principal.userId);
  const lines = await loadCartLines(getSQLClient(), cartId);

  if (lines.length === 0) {
    return fail("ValidationError", "Your cart is empty");
  }

  const user = await getSQLClient()
    .selectFrom("users")
    .select(["full_name", "username"])
    .where("id", "=", principal.userId)
    .executeTakeFirstOrThrow();

  return ok({
    cart: summarizeCart(cartId, lines),
    customerName: user.full_name || user.username,
  });
}

/**
 * Writes the order for `lines` inside `trx`: the order row, its
 * price-snapshotted items and the guarded stock decrements. Throws
 * `CheckoutAborted` to roll the whole transaction back.
 */
async function createOrderFromLines(
  trx: Transaction<DB>,
  principal: CustomerPrincipal,
  request: CheckoutRequest,
  lines: OrderLine[]
): Promise<PlacedOrder> {
  const unsellable = lines.filter((line) => !line.product.isSellable);
  if (unsellable.length > 0) {
    const [first] = unsellable;
    throw new CheckoutAborted({
      kind: "StateConflict",
      message: `${first.product.name} is no longer available. Please remove it from your cart.`,
      details: unsellable.map((line) => ({ productId: line.product.id, productName: line.product.name })),
    });
  }

  const shortages = findShortages(lines);
  if (shortages.length > 0) {
    const [first] = shortages;
    throw new CheckoutAborted({
      kind: "OutOfStock",
      message: `Only ${first.available} unit(s) of ${first.productName} available`,
      details: shortages,
    });
  }

  const totalAmount = roundMoney(lines.reduce((sum, line) => sum + line.lineTotal, 0));

  const order = await trx
    .insertInto("orders")
    .values({
      user_id: principal.userId,
      total_amount: totalAmount,
      payment_method: request.paymentMethod,
      is_paid: request.paymentMethod !== "cod",
      customer_name: request.customerName,
      customer_phone: request.customerPhone,
      delivery_address: request.deliveryAddress,
      delivery_pincode: request.deliveryPincode ?? null,
      delivery_latitude: request.deliveryLatitude ?? null,
      delivery_longitude: request.deliveryLongitude ?? null,
    })
    .returningAll()
    .executeTakeFirstOrThrow();

  const items: PlacedOrderItem[] = [];
  for (const line of lines) {
    const stockUpdate = await trx
      .updateTable("products")
      .set((eb) => ({
        quantity: eb("quantity", "-", sql.lit(line.quantity)),
        updated_at: new Date(),
      }))
      .where("id", "=", line.product.id)
      .where("quantity", ">=", line.quantity)
      .where("is_active", "=", true)
      .where("is_available", "=", true)
      .returning(["quantity"])
      .executeTakeFirst();

    if (!stockUpdate) {
      throw new CheckoutAborted({
        kind: "StateConflict",
        message: `Stock for ${line.product.name} changed during checkout. Please review your cart.`,
        details: { productId: line.product.id },
      });
    }

    const item = await trx
      .insertInto("order_items")
      .values({
        order_id: order.id,
        product_id: line.product.id,
        vendor_id: line.product.vendorId,
        product_name: line.product.name,
        quantity: line.quantity,
        price: line.product.displayPrice,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    items.push({
      id: item.id,
      productId: item.product_id,
      productName: item.product_name,
      vendorId: item.vendor_id,
      quantity: item.quantity,
      price: item.price,
      status: item.status,
    });
  }

  console.log(`Created order ${order.id} with ${items.length} items`);

  return {
    id: order.id,
    totalAmount: order.total_amount,
    paymentMethod: order.payment_method,
    isPaid: order.is_paid,
    customerName: order.customer_name,
    customerPhone: order.customer_phone,
    deliveryAddress: order.delivery_address,
    createdAt: order.created_at,
    items,
  };
}

/** Runs `place` in one transaction and queues the confirmation after commit. */
async function commitOrder(
  principal: CustomerPrincipal,
  place: (trx: Transaction<DB>) => Promise<PlacedOrder>
): Promise<ServiceResult<PlacedOrder>> {
  let placed: PlacedOrder;
  try {
    placed = await getSQLClient().transaction().execute(place);
  } catch (err) {
    if (err instanceof CheckoutAborted) {
      return fail(err.reason.kind, err.reason.message, err.reason.details);
    }
    throw err;
  }

  if (principal.email) {
    await notify(
      orderPlacedEmail({
        id: placed.id,
        customer_name: placed.customerName,
        total_amount: placed.totalAmount,
        email: principal.email,
        itemCount: placed.items.length,
      })
    );
  }

  return ok(placed);
}

/**
 * Turns the customer's cart into an order in a single transaction: the
 * order, its price-snapshotted items, the stock decrements and the emptied
 * cart are committed together or not at all.
 */
export async function placeOrder(
  principal: CustomerPrincipal,
  request: CheckoutRequest
): Promise<ServiceResult<PlacedOrder>> {
  const cartId = await getOrCreateCartId(principal.userId);

  return commitOrder(principal, async (trx) => {
    const lines = await loadCartLines(trx, cartId);

    if (lines.length === 0) {
      throw new CheckoutAborted({ kind: "ValidationError", message: "Your cart is empty" });
    }

    const placed = await createOrderFromLines(trx, principal, request, lines);

    await trx.deleteFrom("cart_items").where("cart_id", "=", cartId).execute();
    await trx
      .updateTable("carts")
      .set({ updated_at: new Date() })
      .where("id", "=", cartId)
      .execute();

    return placed;
  });
}

/** Orders `quantity` units of one product straight away. The cart is left alone. */
export async function buyNow(
  principal: CustomerPrincipal,
  productSlug: string,
  quantity: number,
  request: CheckoutRequest
): Promise<ServiceResult<PlacedOrder>> {
  return commitOrder(principal, async (trx) => {
    const product = await trx
      .selectFrom("products")
      .innerJoin("vendors", "vendors.id", "products.vendor_id")
      .select([
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
      .where("products.slug", "=", productSlug)
      .executeTakeFirst();

    const line = product && toOrderLine(product, quantity);
    if (!line || !line.product.isSellable) {
      throw new CheckoutAborted({ kind: "NotFound", message: "Product not found" });
    }
    if (line.product.stock < 1) {
      throw new CheckoutAborted({
        kind: "OutOfStock",
        message: `${line.product.name} is currently out of stock.`,
      });
    }

    return createOrderFromLines(trx, principal, request, [line]);
  });
}
