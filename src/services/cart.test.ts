import { beforeEach, describe, expect, it, vi } from "vitest";
import { createProduct, createUser, createVendor, resetDatabase, testDb } from "../../testing/memoryDb";
import { addToCart, getCart, removeCartItem, updateCartItem } from "./cart";

vi.mock("../db", async () => {
  const { testDb } = await import("../../testing/memoryDb");
  return { getSQLClient: () => testDb };
});

async function cartRows(userId: number) {
  return testDb
    .selectFrom("cart_items")
    .innerJoin("carts", "carts.id", "cart_items.cart_id")
    .select(["cart_items.id", "cart_items.product_id", "cart_items.quantity"])
    .where("carts.user_id", "=", userId)
    .execute();
}

describe("cart", () => {
  beforeEach(() => {
    resetDatabase();
  });

  async function setup(stock = 3) {
    const customer = await createUser();
    const { vendor } = await createVendor();
    const product = await createProduct(vendor.id, {
      name: "Alphonso Mango",
      price: 60,
      discountPrice: 50,
      quantity: stock,
    });
    return { customer, vendor, product };
  }

  it("creates an empty cart on first read", async () => {
    const customer = await createUser();
    const cart = await getCart(customer.id);
    expect(cart.items).toEqual([]);
    expect(cart.totalPrice).toBe(0);
    expect(cart.totalItems).toBe(0);
  });

  it("merges repeated adds of a product into one line", async () => {
    const { customer, product } = await setup();

    await addToCart(customer.id, product.slug);
    const result = await addToCart(customer.id, product.slug);

    expect(result.isSuccess).toBe(true);
    const rows = await cartRows(customer.id);
    expect(rows).toHaveLength(1);
    expect(rows[0].quantity).toBe(2);
  });

  it("prices lines at the display price", async () => {
    const { customer, product } = await setup();

    const result = await addToCart(customer.id, product.slug, 2);

    if (!result.isSuccess) throw new Error(result.error.message);
    expect(result.data.items[0].product.displayPrice).toBe(50);
    expect(result.data.items[0].lineTotal).toBe(100);
    expect(result.data.totalPrice).toBe(100);
    expect(result.data.totalItems).toBe(2);
  });

  it("refuses to add more than is in stock and leaves the cart alone", async () => {
    const { customer, product } = await setup(3);
    await addToCart(customer.id, product.slug, 2);

    const result = await addToCart(customer.id, product.slug, 2);

    expect(result).toEqual({
      isSuccess: false,
      error: {
        kind: "OutOfStock",
        message: "Only 3 unit(s) of Alphonso Mango available",
        details: { available: 3, requested: 4 },
      },
    });
    expect((await cartRows(customer.id))[0].quantity).toBe(2);
  });

  it("reports sold out products", async () => {
    const { customer, product } = await setup(0);

    const result = await addToCart(customer.id, product.slug);

    expect(result.isSuccess).toBe(false);
    if (result.isSuccess) return;
    expect(result.error.message).toBe("Alphonso Mango is currently out of stock.");
  });

  it("does not sell products from unapproved vendors", async () => {
    const customer = await createUser();
    const { vendor } = await createVendor({ status: "pending" });
    const product = await createProduct(vendor.id);

    const result = await addToCart(customer.id, product.slug);

    expect(result.isSuccess).toBe(false);
    if (result.isSuccess) return;
    expect(result.error.kind).toBe("NotFound");
  });

  it("rejects incrementing past stock and keeps the quantity", async () => {
    const { customer, product } = await setup(3);
    await addToCart(customer.id, product.slug, 3);
    const [line] = await cartRows(customer.id);

    const result = await updateCartItem(customer.id, line.id, "increment");

    expect(result.isSuccess).toBe(false);
    if (result.isSuccess) return;
    expect(result.error.kind).toBe("OutOfStock");
    expect((await cartRows(customer.id))[0].quantity).toBe(3);
  });

  it("increments within stock", async () => {
    const { customer, product } = await setup(3);
    await addToCart(customer.id, product.slug, 2);
    const [line] = await cartRows(customer.id);

    const result = await updateCartItem(customer.id, line.id, "increment");

    if (!result.isSuccess) throw new Error(result.error.message);
    expect(result.data.items[0].quantity).toBe(3);
  });

  it("removes the line when the last unit is decremented", async () => {
    const { customer, product } = await setup();
    await addToCart(customer.id, product.slug, 1);
    const [line] = await cartRows(customer.id);

    const result = await updateCartItem(customer.id, line.id, "decrement");

    if (!result.isSuccess) throw new Error(result.error.message);
    expect(result.data.items).toEqual([]);
    expect(await cartRows(customer.id)).toEqual([]);
  });

  it("does not touch another customer's cart line", async () => {
    const { customer, product } = await setup();
    const other = await createUser();
    await addToCart(customer.id, product.slug, 1);
    const [line] = await cartRows(customer.id);

    const result = await removeCartItem(other.id, line.id);

    expect(result).toEqual({
      isSuccess: false,
      error: { kind: "NotFound", message: "Cart item not found" },
    });
    expect(await cartRows(customer.id)).toHaveLength(1);
  });
});
