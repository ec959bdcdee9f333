import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  createCategory,
  createOrder,
  createProduct,
  createUser,
  createVendor,
  resetDatabase,
  testDb,
} from "../../testing/memoryDb";
import { exportSalesCsv, getEarningsReport } from "./earnings";

vi.mock("../db", async () => {
  const { testDb } = await import("../../testing/memoryDb");
  return { getSQLClient: () => testDb };
});

async function salesFixture() {
  const customer = await createUser();
  const { vendor } = await createVendor();
  const dairy = await createCategory("Dairy");
  const bakery = await createCategory("Bakery");
  const paneer = await createProduct(vendor.id, { name: "Paneer", categoryId: dairy.id });
  const bun = await createProduct(vendor.id, { name: "Pav Bun", categoryId: bakery.id });
  const { orderItems } = await createOrder(customer.id, [
    { productId: paneer.id, vendorId: vendor.id, productName: "Paneer", quantity: 2, price: 90, status: "Delivered" },
    { productId: bun.id, vendorId: vendor.id, productName: "Pav Bun", quantity: 3, price: 25.5, status: "Delivered" },
    { productId: paneer.id, vendorId: vendor.id, productName: "Paneer", quantity: 1, price: 95, status: "Delivered" },
    { productId: bun.id, vendorId: vendor.id, productName: "Pav Bun", quantity: 4, price: 25.5, status: "Pending" },
  ]);
  return { vendor, dairy, paneer, bun, orderItems };
}

describe("earnings", () => {
  beforeEach(() => {
    resetDatabase();
  });

  it("counts delivered items only", async () => {
    const { vendor, paneer, bun } = await salesFixture();

    const report = await getEarningsReport(vendor.id);

    expect(report.totals).toEqual({ revenue: 351.5, orderItems: 3, itemsSold: 6 });
    expect(report.topProducts).toEqual([
      { productId: paneer.id, productName: "Paneer", quantitySold: 3, revenue: 275 },
      { productId: bun.id, productName: "Pav Bun", quantitySold: 3, revenue: 76.5 },
    ]);
    expect(report.revenueByCategory).toEqual([
      { categoryName: "Dairy", revenue: 275 },
      { categoryName: "Bakery", revenue: 76.5 },
    ]);
  });

  it("filters by category", async () => {
    const { vendor, dairy } = await salesFixture();

    const report = await getEarningsReport(vendor.id, { categoryId: dairy.id });

    expect(report.totals.revenue).toBe(275);
  });

  it("exports delivered items as CSV", async () => {
    const { vendor, orderItems } = await salesFixture();
    const placedAt = new Date(Date.UTC(2024, 5, 1, 9, 30));
    await testDb.updateTable("order_items").set({ created_at: placedAt }).execute();

    const result = await exportSalesCsv(vendor.id, new Date(Date.UTC(2024, 5, 2)));

    if (!result.isSuccess) throw new Error(result.error.message);
    expect(result.data.filename).toBe(`sales_report_${vendor.slug}_20240602.csv`);
    const lines = result.data.csv.split("\r\n");
    expect(lines[0]).toBe("Order ID,Product,Quantity,Price,Total,Status,Date");
    expect(lines).toHaveLength(5);
    expect(lines).toContain(
      `${orderItems[1].order_id},Pav Bun,3,25.50,76.50,Delivered,2024-06-01 09:30`
    );
  });

  it("dates delivered items by when they were delivered", async () => {
    const { vendor, orderItems } = await salesFixture();
    await testDb
      .updateTable("order_items")
      .set({ created_at: new Date(Date.UTC(2024, 0, 20)) })
      .execute();
    const deliveredAt = [
      new Date(Date.UTC(2024, 1, 10, 10)),
      new Date(Date.UTC(2024, 1, 29, 23, 30)),
      new Date(Date.UTC(2024, 2, 1)),
    ];
    for (const [index, updatedAt] of deliveredAt.entries()) {
      await testDb
        .updateTable("order_items")
        .set({ updated_at: updatedAt })
        .where("id", "=", orderItems[index].id)
        .execute();
    }

    const february = await getEarningsReport(vendor.id, {
      dateFrom: "2024-02-01",
      dateTo: "2024-02-29",
    });
    const january = await getEarningsReport(vendor.id, { dateTo: "2024-01-31" });

    expect(february.totals).toEqual({ revenue: 256.5, orderItems: 2, itemsSold: 5 });
    expect(january.totals).toEqual({ revenue: 0, orderItems: 0, itemsSold: 0 });
  });

  it("rounds CSV totals to the cent", async () => {
    const customer = await createUser();
    const { vendor } = await createVendor();
    const { orderItems } = await createOrder(customer.id, [
      { productId: null, vendorId: vendor.id, productName: "Lemons", quantity: 3, price: 1.15, status: "Delivered" },
    ]);
    await testDb
      .updateTable("order_items")
      .set({ created_at: new Date(Date.UTC(2024, 5, 1, 9, 30)) })
      .execute();

    const result = await exportSalesCsv(vendor.id);

    if (!result.isSuccess) throw new Error(result.error.message);
    expect(result.data.csv.split("\r\n")[1]).toBe(
      `${orderItems[0].order_id},Lemons,3,1.15,3.45,Delivered,2024-06-01 09:30`
    );
  });
});
