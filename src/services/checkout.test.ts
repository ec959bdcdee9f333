import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  createProduct,
  createUser,
  createVendor,
  resetDatabase,
  testDb,
} from "../../testing/memoryDb";
import { sendNotificationToQueue } from "../queue/producer";
import { CustomerPrincipal } from "../types/auth";
import { addToCart, loadCartLines } from "./cart";
import { buyNow, getCheckoutSummary, placeOrder } from "./checkout";

vi.mock("../db", async () => {
  const { testDb } = await import("../../testing/memoryDb");
  return { getSQLClient: () => testDb };
});

vi.mock("../queue/producer", () => ({
  sendNotificationToQueue: vi.fn().mockResolvedValue(undefined),
}));

vi.mock("./cart", async (importOriginal) => {
  const actual = await importOriginal<typeof import("./cart")>();
  return { ...actual, loadCartLines: vi.fn(actual.loadCartLines) };
});

const request = {
  customerName: "Asha Rao",
  customerPhone: "9000000001",
  deliveryAddress: "22 Lake View, Indiranagar",
  paymentMethod: "cod" as const,
  deliveryPincode: "560038",
};

async function customerWithCart() {
  const user = await createUser({ username: "asha", email: "asha@example.com" });
  const principal: CustomerPrincipal = {
    role: "customer",
    userId: user.id,
    username: user.username,
    email: user.email,
  };
  const { vendor } = await createVendor();
  const rice = await createProduct(vendor.id, { name: "Sona Masoori Rice", price: 80, quantity: 5 });
  const dal = await createProduct(vendor.id, {
    name: "Toor Dal",
    price: 150,
    discountPrice: 135.5,
    quantity: 4,
  });
  await addToCart(user.id, rice.slug, 2);
  await addToCart(user.id, dal.slug, 1);
  return { principal, vendor, rice, dal };
}

const stockOf = async (productId: number) =>
  (
    await testDb
      .selectFrom("products")
      .select("quantity")
      .where("id", "=", productId)
      .executeTakeFirstOrThrow()
  ).quantity;

const countOrders = async () => (await testDb.selectFrom("orders").select("id").execute()).length;

const countOrderItems = async () =>
  (await testDb.selectFrom("order_items").select("id").execute()).length;

describe("checkout", () => {
  beforeEach(() => {
    resetDatabase();
    vi.mocked(sendNotificationToQueue).mockClear();
  });

  it("summarizes the cart with the customer's name", async () => {
    const { principal } = await customerWithCart();

    const result = await getCheckoutSummary(principal);

    if (!result.isSuccess) throw new Error(result.error.message);
    expect(result.data.customerName).toBe("asha");
    expect(result.data.cart.totalPrice).toBe(295.5);
    expect(result.data.cart.totalItems).toBe(3);
  });

  it("places an order, decrements stock and empties the cart", async () => {
    const { principal, rice, dal } = await customerWithCart();

    const result = await placeOrder(principal, request);

    if (!result.isSuccess) throw new Error(result.error.message);
    expect(result.data.totalAmount).toBe(295.5);
    expect(result.data.isPaid).toBe(false);
    expect(result.data.items.map((item) => [item.productName, item.quantity, item.price])).toEqual([
      ["Sona Masoori Rice", 2, 80],
      ["Toor Dal", 1, 135.5],
    ]);
    expect(result.data.items.every((item) => item.status === "Pending")).toBe(true);

    expect(await stockOf(rice.id)).toBe(3);
    expect(await stockOf(dal.id)).toBe(3);
    expect(await testDb.selectFrom("cart_items").selectAll().execute()).toEqual([]);
    expect(sendNotificationToQueue).toHaveBeenCalledTimes(1);
  });

  it("marks prepaid methods as paid", async () => {
    const { principal } = await customerWithCart();

    const result = await placeOrder(principal, { ...request, paymentMethod: "upi" });

    if (!result.isSuccess) throw new Error(result.error.message);
    expect(result.data.isPaid).toBe(true);
  });

  it("keeps the purchase price after the product is repriced", async () => {
    const { principal, dal } = await customerWithCart();
    const result = await placeOrder(principal, request);
    if (!result.isSuccess) throw new Error(result.error.message);

    await testDb
      .updateTable("products")
      .set({ price: 199, discount_price: null })
      .where("id", "=", dal.id)
      .execute();

    const item = await testDb
      .selectFrom("order_items")
      .select("price")
      .where("product_id", "=", dal.id)
      .executeTakeFirstOrThrow();
    expect(item.price).toBe(135.5);
  });

  it("treats a second submission on an emptied cart as a no-op", async () => {
    const { principal } = await customerWithCart();
    await placeOrder(principal, request);

    const again = await placeOrder(principal, request);

    expect(again).toEqual({
      isSuccess: false,
      error: { kind: "ValidationError", message: "Your cart is empty" },
    });
    expect(await countOrders()).toBe(1);
  });

  it("creates nothing when stock ran out after the items were carted", async () => {
    const { principal, rice, dal } = await customerWithCart();
    await testDb.updateTable("products").set({ quantity: 1 }).where("id", "=", rice.id).execute();

    const result = await placeOrder(principal, request);

    expect(result.isSuccess).toBe(false);
    if (result.isSuccess) return;
    expect(result.error.kind).toBe("OutOfStock");
    expect(result.error.message).toBe("Only 1 unit(s) of Sona Masoori Rice available");
    expect(await countOrders()).toBe(0);
    expect(await stockOf(dal.id)).toBe(4);
    expect(await testDb.selectFrom("cart_items").selectAll().execute()).toHaveLength(2);
    expect(sendNotificationToQueue).not.toHaveBeenCalled();
  });

  it("still places the order when the notification cannot be queued", async () => {
    const { principal } = await customerWithCart();
    vi.mocked(sendNotificationToQueue).mockRejectedValueOnce(new Error("broker down"));

    const result = await placeOrder(principal, request);

    expect(result.isSuccess).toBe(true);
    expect(await countOrders()).toBe(1);
  });

  it("refuses products that stopped being sellable after they were carted", async () => {
    const { principal, vendor, rice, dal } = await customerWithCart();
    await testDb.updateTable("products").set({ is_available: false }).where("id", "=", rice.id).execute();
    await testDb.updateTable("vendors").set({ status: "blocked" }).where("id", "=", vendor.id).execute();

    const result = await placeOrder(principal, request);

    expect(result.isSuccess).toBe(false);
    if (result.isSuccess) return;
    expect(result.error.kind).toBe("StateConflict");
    expect(result.error.message).toBe(
      "Sona Masoori Rice is no longer available. Please remove it from your cart."
    );
    expect(await countOrders()).toBe(0);
    expect(await stockOf(rice.id)).toBe(5);
    expect(await stockOf(dal.id)).toBe(4);
  });

  it("refuses a product the admin deactivated", async () => {
    const { principal, dal } = await customerWithCart();
    await testDb.updateTable("products").set({ is_active: false }).where("id", "=", dal.id).execute();

    const result = await placeOrder(principal, request);

    expect(result.isSuccess).toBe(false);
    if (result.isSuccess) return;
    expect(result.error.message).toBe(
      "Toor Dal is no longer available. Please remove it from your cart."
    );
    expect(await countOrders()).toBe(0);
  });

  it("rolls everything back when stock changes mid-checkout", async () => {
    const { principal, rice, dal } = await customerWithCart();
    const { loadCartLines: loadLines } = await vi.importActual<typeof import("./cart")>("./cart");
    vi.mocked(loadCartLines).mockImplementationOnce(async (db, cartId) => {
      const lines = await loadLines(db, cartId);
      // another order takes the last units of dal after the lines were read
      await db.updateTable("products").set({ quantity: 0 }).where("id", "=", dal.id).execute();
      return lines;
    });

    const result = await placeOrder(principal, request);

    expect(result).toEqual({
      isSuccess: false,
      error: {
        kind: "StateConflict",
        message: "Stock for Toor Dal changed during checkout. Please review your cart.",
        details: { productId: dal.id },
      },
    });
    expect(await countOrders()).toBe(0);
    expect(await countOrderItems()).toBe(0);
    expect(await stockOf(rice.id)).toBe(5);
    expect(await stockOf(dal.id)).toBe(4);
    expect(await testDb.selectFrom("cart_items").selectAll().execute()).toHaveLength(2);
    expect(sendNotificationToQueue).not.toHaveBeenCalled();
  });
});

describe("buy now", () => {
  beforeEach(() => {
    resetDatabase();
  });

  async function customer() {
    const user = await createUser({ username: "ravi", email: "ravi@example.com" });
    const principal: CustomerPrincipal = {
      role: "customer",
      userId: user.id,
      username: user.username,
      email: user.email,
    };
    return principal;
  }

  it("orders a single product without touching the cart", async () => {
    const principal = await customer();
    const { vendor } = await createVendor();
    const ghee = await createProduct(vendor.id, { name: "Ghee", price: 600, discountPrice: 560, quantity: 4 });
    const oil = await createProduct(vendor.id, { name: "Groundnut Oil", quantity: 3 });
    await addToCart(principal.userId, oil.slug, 1);

    const result = await buyNow(principal, ghee.slug, 2, request);

    if (!result.isSuccess) throw new Error(result.error.message);
    expect(result.data.totalAmount).toBe(1120);
    expect(result.data.items.map((item) => [item.productName, item.quantity, item.price])).toEqual([
      ["Ghee", 2, 560],
    ]);
    expect(await stockOf(ghee.id)).toBe(2);
    expect(await testDb.selectFrom("cart_items").selectAll().execute()).toHaveLength(1);
  });

  it("does not sell a product from an unapproved vendor", async () => {
    const principal = await customer();
    const { vendor } = await createVendor({ status: "pending" });
    const ghee = await createProduct(vendor.id, { name: "Ghee" });

    const result = await buyNow(principal, ghee.slug, 1, request);

    expect(result).toEqual({
      isSuccess: false,
      error: { kind: "NotFound", message: "Product not found" },
    });
    expect(await countOrders()).toBe(0);
  });

  it("reports an out-of-stock product", async () => {
    const principal = await customer();
    const { vendor } = await createVendor();
    const ghee = await createProduct(vendor.id, { name: "Ghee", quantity: 0 });

    const result = await buyNow(principal, ghee.slug, 1, request);

    expect(result).toEqual({
      isSuccess: false,
      error: { kind: "OutOfStock", message: "Ghee is currently out of stock." },
    });
  });

  it("refuses more units than are in stock", async () => {
    const principal = await customer();
    const { vendor } = await createVendor();
    const ghee = await createProduct(vendor.id, { name: "Ghee", quantity: 1 });

    const result = await buyNow(principal, ghee.slug, 2, request);

    expect(result.isSuccess).toBe(false);
    if (result.isSuccess) return;
    expect(result.error.message).toBe("Only 1 unit(s) of Ghee available");
    expect(await stockOf(ghee.id)).toBe(1);
  });
});
