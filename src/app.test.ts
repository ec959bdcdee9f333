import request from "supertest";
import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  createCategory,
  createProduct,
  createUser,
  createVendor,
  resetDatabase,
  testDb,
} from "../testing/memoryDb";
import { createApp } from "./app";
import { issueToken } from "./services/auth";

vi.mock("./db", async () => {
  const { testDb } = await import("../testing/memoryDb");
  return { getSQLClient: () => testDb };
});

vi.mock("./queue/producer", () => ({
  sendNotificationToQueue: vi.fn().mockResolvedValue(undefined),
}));

vi.spyOn(console, "log").mockImplementation(() => undefined);

const app = createApp({
  categoryImages: {
    defaultImage: "/static/categories/default.png",
    images: { Dairy: "/static/categories/dairy.png" },
  },
});

const bearer = (userId: number) => `Bearer ${issueToken(userId)}`;

describe("HTTP API", () => {
  beforeEach(() => {
    resetDatabase();
  });

  it("answers the health check", async () => {
    const res = await request(app).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ok" });
  });

  it("registers and logs in a customer", async () => {
    const registered = await request(app).post("/auth/register").send({
      username: "nisha",
      email: "nisha@example.com",
      password: "test-password",
      confirmPassword: "test-password",
    });
    expect(registered.status).toBe(201);

    const loggedIn = await request(app)
      .post("/auth/login")
      .send({ username: "nisha", password: "test-password" });
    expect(loggedIn.status).toBe(200);
    expect(loggedIn.body.data.principal.role).toBe("customer");

    const me = await request(app).get("/auth/me").set("Authorization", `Bearer ${loggedIn.body.data.token}`);
    expect(me.body.data.username).toBe("nisha");
  });

  it("rejects mismatched passwords", async () => {
    const res = await request(app).post("/auth/register").send({
      username: "nisha",
      password: "test-password",
      confirmPassword: "other-password",
    });
    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe("Passwords do not match");
  });

  it("rejects a wrong password", async () => {
    await request(app).post("/auth/register").send({
      username: "nisha",
      password: "test-password",
      confirmPassword: "test-password",
    });

    const res = await request(app)
      .post("/auth/login")
      .send({ username: "nisha", password: "wrong-password" });

    expect(res.status).toBe(401);
    expect(res.body.error.message).toBe("Invalid username or password");
  });

  it("requires a token for the cart", async () => {
    const res = await request(app).get("/cart");
    expect(res.status).toBe(401);
    expect(res.body.error.message).toBe("Authentication required");
  });

  it("keeps vendors out of customer routes", async () => {
    const { owner } = await createVendor();
    const res = await request(app).get("/cart").set("Authorization", bearer(owner.id));
    expect(res.status).toBe(403);
  });

  it("tells pending vendors to wait for approval", async () => {
    const { owner } = await createVendor({ status: "pending" });

    const status = await request(app).get("/vendor/status").set("Authorization", bearer(owner.id));
    const dashboard = await request(app).get("/vendor/dashboard").set("Authorization", bearer(owner.id));

    expect(status.body.data).toEqual(expect.objectContaining({ status: "pending", approved: false }));
    expect(dashboard.status).toBe(403);
    expect(dashboard.body.error.message).toBe("Your vendor account is pending approval");
  });

  it("serves the home page with configured category images", async () => {
    const { vendor } = await createVendor();
    const dairy = await createCategory("Dairy");
    await createProduct(vendor.id, { name: "Curd", categoryId: dairy.id });

    const res = await request(app).get("/home");

    expect(res.status).toBe(200);
    expect(res.body.data.products.map((product: { name: string }) => product.name)).toEqual(["Curd"]);
    expect(res.body.data.categories[0].imageUrl).toBe("/static/categories/dairy.png");
  });

  it("checks pincode availability", async () => {
    await createVendor({ pincode: "560001, 560034" });

    const res = await request(app).get("/delivery/check").query({ pincode: "560034" });

    expect(res.body.data.status).toBe("available");
  });

  it("creates nothing when checkout is missing the phone number", async () => {
    const customer = await createUser();
    const { vendor } = await createVendor();
    const product = await createProduct(vendor.id, { quantity: 5 });
    await request(app)
      .post(`/cart/items/${product.slug}`)
      .set("Authorization", bearer(customer.id))
      .send({ quantity: 2 });

    const res = await request(app)
      .post("/checkout")
      .set("Authorization", bearer(customer.id))
      .send({ customerName: "Asha", deliveryAddress: "22 Lake View", paymentMethod: "cod" });

    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe("Phone is required");
    expect(await testDb.selectFrom("orders").selectAll().execute()).toEqual([]);
    const cart = await request(app).get("/cart").set("Authorization", bearer(customer.id));
    expect(cart.body.data.totalItems).toBe(2);
  });

  it("places an order over HTTP", async () => {
    const customer = await createUser();
    const { vendor } = await createVendor();
    const product = await createProduct(vendor.id, { quantity: 5, price: 40 });
    await request(app)
      .post(`/cart/items/${product.slug}`)
      .set("Authorization", bearer(customer.id))
      .send({});

    const res = await request(app).post("/checkout").set("Authorization", bearer(customer.id)).send({
      customerName: "Asha",
      customerPhone: "9000000001",
      deliveryAddress: "22 Lake View",
      paymentMethod: "cod",
    });

    expect(res.status).toBe(201);
    expect(res.body.data.totalAmount).toBe(40);
  });

  it("answers an unexpected checkout failure with the generic message", async () => {
    const customer = await createUser();
    const { vendor } = await createVendor();
    const product = await createProduct(vendor.id, { quantity: 5 });
    await request(app)
      .post(`/cart/items/${product.slug}`)
      .set("Authorization", bearer(customer.id))
      .send({});
    vi.spyOn(console, "error").mockImplementationOnce(() => undefined);
    vi.spyOn(testDb, "transaction").mockImplementationOnce(() => {
      throw new Error("connection lost");
    });

    const res = await request(app).post("/checkout").set("Authorization", bearer(customer.id)).send({
      customerName: "Asha",
      customerPhone: "9000000001",
      deliveryAddress: "22 Lake View",
      paymentMethod: "cod",
    });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      isSuccess: false,
      error: { kind: "Unexpected", message: "Error processing checkout. Please try again." },
    });
  });

  it("buys a single product over HTTP", async () => {
    const customer = await createUser();
    const { vendor } = await createVendor();
    const product = await createProduct(vendor.id, { quantity: 5, price: 40 });

    const res = await request(app)
      .post(`/orders/buy/${product.slug}`)
      .set("Authorization", bearer(customer.id))
      .send({
        quantity: 3,
        customerName: "Asha",
        customerPhone: "9000000001",
        deliveryAddress: "22 Lake View",
        paymentMethod: "card",
      });

    expect(res.status).toBe(201);
    expect(res.body.data.totalAmount).toBe(120);
    expect(res.body.data.isPaid).toBe(true);
  });

  it("downloads the sales report as CSV", async () => {
    const { owner, vendor } = await createVendor();

    const res = await request(app).get("/vendor/earnings/export").set("Authorization", bearer(owner.id));

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toContain("text/csv");
    expect(res.headers["content-disposition"]).toContain(`sales_report_${vendor.slug}_`);
    expect(res.text).toBe("Order ID,Product,Quantity,Price,Total,Status,Date\r\n");
  });

  it("lets admins approve vendors", async () => {
    const admin = await createUser({ isAdmin: true });
    const { vendor } = await createVendor({ status: "pending" });

    const res = await request(app)
      .patch(`/admin/vendors/${vendor.id}/status`)
      .set("Authorization", bearer(admin.id))
      .send({ status: "approved" });

    expect(res.status).toBe(200);
    expect(res.body.data.status).toBe("approved");
  });

  it("accepts contact messages", async () => {
    const res = await request(app).post("/contact").send({
      name: "Meera",
      email: "meera@example.com",
      subject: "Hello",
      message: "Do you deliver on Sundays?",
    });
    expect(res.status).toBe(201);
  });
});
