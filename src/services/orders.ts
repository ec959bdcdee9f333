import { getSQLClient } from "../db";
import { OrderItemStatus, PaymentMethod } from "../types/db";
import { fail, ok, ServiceResult } from "../types/result";
import { canCancel } from "../utils/fulfillment";
import { roundMoney } from "../utils/pricing";
import { changeOrderItemStatus, findCustomerOrderItem, OrderItemDetail } from "./fulfillment";

export interface CustomerOrderItem {
  id: number;
  productId: number | null;
  productName: string;
  productSlug: string | null;
  quantity: number;
  price: number;
  total: number;
  status: OrderItemStatus;
  canCancel: boolean;
}

export interface CustomerOrder {
  id: number;
  totalAmount: number;
  paymentMethod: PaymentMethod;
  isPaid: boolean;
  customerName: string;
  customerPhone: string;
  deliveryAddress: string;
  createdAt: Date;
  items: CustomerOrderItem[];
}

async function loadOrders(userId: number, orderId?: number): Promise<CustomerOrder[]> {
  const db = getSQLClient();

  let ordersQuery = db
    .selectFrom("orders")
    .selectAll()
    .where("user_id", "=", userId);
  if (orderId !== undefined) {
    ordersQuery = ordersQuery.where("id", "=", orderId);
  }
  const orders = await ordersQuery.orderBy("created_at", "desc").orderBy("id", "desc").execute();

  if (orders.length === 0) {
    return [];
  }

  const items = await db
    .selectFrom("order_items")
    .leftJoin("products", "products.id", "order_items.product_id")
    .select([
      "order_items.id",
      "order_items.order_id",
      "order_items.product_id",
      "order_items.product_name",
      "order_items.quantity",
      "order_items.price",
      "order_items.status",
      "products.slug as product_slug",
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
    totalAmount: order.total_amount,
    paymentMethod: order.payment_method,
    isPaid: order.is_paid,
    customerName: order.customer_name,
    customerPhone: order.customer_phone,
    deliveryAddress: order.delivery_address,
    createdAt: order.created_at,
    items: items
      .filter((item) => item.order_id === order.id)
      .map((item) => ({
        id: item.id,
        productId: item.product_id,
        productName: item.product_name,
        productSlug: item.product_slug,
        quantity: item.quantity,
        price: item.price,
        total: roundMoney(item.price * item.quantity),
        status: item.status,
        canCancel: canCancel(item.status),
      })),
  }));
}

export function listCustomerOrders(userId: number): Promise<CustomerOrder[]> {
  return loadOrders(userId);
}

export async function getCustomerOrder(
  userId: number,
  orderId: number
): Promise<ServiceResult<CustomerOrder>> {
  const [order] = await loadOrders(userId, orderId);
  if (!order) {
    return fail("NotFound", "Order not found");
  }
  return ok(order);
}

export async function cancelOrderItem(
  userId: number,
  itemId: number
): Promise<ServiceResult<OrderItemDetail>> {
  const row = await findCustomerOrderItem(userId, itemId);

  if (!row) {
    return fail("NotFound", "Order item not found");
  }
  if (!canCancel(row.status)) {
    return fail("StateConflict", `Items that are ${row.status} can no longer be cancelled`);
  }
  return changeOrderItemStatus(row, "Cancelled");
}
