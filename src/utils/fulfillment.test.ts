import { describe, expect, it } from "vitest";
import { canCancel, checkStatusTransition, ORDER_ITEM_STATUSES } from "./fulfillment";

describe("canCancel", () => {
  it("is true only before the item is packed", () => {
    expect(ORDER_ITEM_STATUSES.filter(canCancel)).toEqual(["Pending", "Accepted"]);
  });
});

describe("checkStatusTransition", () => {
  it("lets vendors skip steps", () => {
    expect(checkStatusTransition("Pending", "Delivered")).toEqual({
      isSuccess: true,
      data: "Delivered",
    });
    expect(checkStatusTransition("Out for Delivery", "Accepted")).toEqual({
      isSuccess: true,
      data: "Accepted",
    });
  });

  it("allows cancelling anything not yet delivered", () => {
    expect(checkStatusTransition("Packed", "Cancelled").isSuccess).toBe(true);
  });

  it("keeps cancelled items cancelled", () => {
    expect(checkStatusTransition("Cancelled", "Pending")).toEqual({
      isSuccess: false,
      error: { kind: "StateConflict", message: "This order item has been cancelled" },
    });
  });

  it("refuses to cancel a delivered item", () => {
    expect(checkStatusTransition("Delivered", "Cancelled")).toEqual({
      isSuccess: false,
      error: { kind: "StateConflict", message: "Delivered items cannot be cancelled" },
    });
  });
});
