import { sql } from "kysely";
import { getSQLClient } from "../db";
import { OrderItemStatus } from "../types/db";
import { fail, ok, ServiceResult } from "../types/result";
import { VendorOrdersQuery } from "../validations/vendor";
import { endOfUtcDay, startOfUtcDay } from "../utils/dates";
import { canCancel, checkStatusTransition } from "../utils/fulfillment";
import { roundMoney } from "../utils/pricing";
import { notify, orderStatusEmail } from "./notifications";

export interface OrderItemDetail {
  id: number;
  orderId: number;
  productId: number | null;
  productName: string;
  vendorId: number;
  quantity: number;
  price: number;
  total: number;
  status: OrderItemStatus;
  canCancel: boolean;
  createdAt: Date;
  updatedAt: Date;
  order: {
    customerName: string;
    customerPhone: string;
    deliveryAddress: string;
    deliveryPincode: string | null;
    paymentMethod: string;
    isPaid: boolean;
    placedAt: Date;
  };
}

function selectOrderItemDetails() {
  return getSQLClient()
    .selectFrom("order_items")
    .innerJoin("orders", "orders.id", "order_items.order_id")
    .innerJoin("users", "users.id", "orders.user_id")
    .select([
      "order_items.id",
      "order_items.order_id",
      "order_items.product_id",
      "order_items.product_name",
      "order_items.vendor_id",
      "order_items.quantity",
      "order_items.price",
      "order_items.status",
      "order_items.created_at",
      "order_items.updated_at",
      "orders.user_id",
      "orders.customer_name",
      "orders.customer_phone",
      "orders.delivery_address",
      "orders.delivery_pincode",
      "orders.payment_method",
      "orders.is_paid",
      "orders.created_at as placed_at",
      "users.email as customer_email",
    ]);
}

type OrderItemRow = Awaited<
  ReturnType<ReturnType<typeof selectOrderItemDetails>["execute"]>
>[number];

export function toOrderItemDetail(row: OrderItemRow): OrderItemDetail {
  return {
    id: row.id,
    orderId: row.order_id,
    productId: row.product_id,
    productName: row.product_name,
    vendorId: row.vendor_id,
    quantity: row.quantity,
    price: row.price,
    total: roundMoney(row.price * row.quantity),
    status: row.status,
    canCancel: canCancel(row.status),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    order: {
      customerName: row.customer_name,
      customerPhone: row.customer_phone,
      deliveryAddress: row.delivery_address,
      deliveryPincode: row.delivery_pincode,
      paymentMethod: row.payment_method,
      isPaid: row.is_paid,
      placedAt: row.placed_at,
    },
  };
}

export async function listVendorOrderItems(
  vendorId: number,
  filters: VendorOrdersQuery
): Promise<OrderItemDetail[]> {
  let query = selectOrderItemDetails().where("order_items.vendor_id", "=", vendorId);

  if (filters.status) {
    query = query.where("order_items.status", "=", filters.status);
  }
  if (filters.dateFrom) {
    query = query.where("order_items.created_at", ">=", startOfUtcDay(filters.dateFrom));
  }
  if (filters.dateTo) {
    query = query.where("order_items.created_at", "<", endOfUtcDay(filters.dateTo));
  }

  const rows = await query
    .orderBy("order_items.created_at", "desc")
    .orderBy("order_items.id", "desc")
    .execute();
  return rows.map(toOrderItemDetail);
}

export async function getVendorOrderItem(
  vendorId: number,
  itemId: number
): Promise<ServiceResult<OrderItemDetail>> {
  const row = await selectOrderItemDetails()
    .where("order_items.id", "=", itemId)
    .where("order_items.vendor_id", "=", vendorId)
    .executeTakeFirst();

  if (!row) {
    return fail("NotFound", "Order item not found");
  }
  return ok(toOrderItemDetail(row));
}

/**
 * Moves one order item to `status`. Entering Cancelled puts the quantity
 * back on the product shelf in the same transaction. The customer is told
 * afterwards; a failed notification leaves the change in place.
 */
export async function changeOrderItemStatus(
  row: OrderItemRow,
  status: OrderItemStatus
): Promise<ServiceResult<OrderItemDetail>> {
  const transition = checkStatusTransition(row.status, status);
  if (!transition.isSuccess) {
    return transition;
  }

  if (row.status === status) {
    return ok(toOrderItemDetail(row));
  }

  const updatedAt = new Date();
  const moved = await getSQLClient()
    .transaction()
    .execute(async (trx) => {
      // only from the status this change was checked against
      const changed = await trx
        .updateTable("order_items")
        .set({ status, updated_at: updatedAt })
        .where("id", "=", row.id)
        .where("status", "=", row.status)
        .returning("id")
        .executeTakeFirst();

      if (!changed) {
        return false;
      }

      if (status === "Cancelled" && row.product_id !== null) {
        await trx
          .updateTable("products")
          .set((eb) => ({
            quantity: eb("quantity", "+", sql.lit(row.quantity)),
            updated_at: updatedAt,
          }))
          .where("id", "=", row.product_id)
          .execute();
        console.log(`Released ${row.quantity} units back to product ${row.product_id}`);
      }
      return true;
    });

  if (!moved) {
    return fail(
      "StateConflict",
      `Order item ${row.id} is no longer ${row.status}. Please reload and try again.`
    );
  }

  console.log(`Order item ${row.id} moved from ${row.status} to ${status}`);

  const updated = { ...row, status, updated_at: updatedAt };

  if (row.customer_email) {
    await notify(
      orderStatusEmail({
        order_id: row.order_id,
        customer_name: row.customer_name,
        product_name: row.product_name,
        quantity: row.quantity,
        status,
        email: row.customer_email,
      })
    );
  }

  return ok(toOrderItemDetail(updated));
}

export async function updateOrderItemStatus(
  vendorId: number,
  itemId: number,
  status: OrderItemStatus
): Promise<ServiceResult<OrderItemDetail>> {
  const row = await selectOrderItemDetails()
    .where("order_items.id", "=", itemId)
    .where("order_items.vendor_id", "=", vendorId)
    .executeTakeFirst();

  if (!row) {
    return fail("NotFound", "Order item not found");
  }
  return changeOrderItemStatus(row, status);
}

export async function findCustomerOrderItem(userId: number, itemId: number) {
  return selectOrderItemDetails()
    .where("order_items.id", "=", itemId)
    .where("orders.user_id", "=", userId)
    .executeTakeFirst();
}
