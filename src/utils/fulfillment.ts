import { OrderItemStatus } from "../types/db";
import { fail, ok, ServiceResult } from "../types/result";

export const ORDER_ITEM_STATUSES = [
  "Pending",
  "Accepted",
  "Packed",
  "Out for Delivery",
  "Delivered",
  "Cancelled",
] as const satisfies readonly OrderItemStatus[];

const CANCELLABLE: ReadonlySet<OrderItemStatus> = new Set(["Pending", "Accepted"]);

export function canCancel(status: OrderItemStatus): boolean {
  return CANCELLABLE.has(status);
}

/**
 * Vendors may move an item to any status, skipping steps if they like.
 * Cancelled is terminal and a delivered item can no longer be cancelled.
 */
export function checkStatusTransition(
  from: OrderItemStatus,
  to: OrderItemStatus
): ServiceResult<OrderItemStatus> {
  if (from === "Cancelled" && to !== "Cancelled") {
    return fail("StateConflict", "This order item has been cancelled");
  }
  if (from === "Delivered" && to === "Cancelled") {
    return fail("StateConflict", "Delivered items cannot be cancelled");
  }
  return ok(to);
}
