import { getSQLClient } from "../db";
import { TOP_PRODUCTS_LIMIT } from "../types/constants";
import { fail, ok, ServiceResult } from "../types/result";
import { EarningsQuery } from "../validations/vendor";
import { formatCsvDate, formatFileDate, toCsv } from "../utils/csv";
import { endOfUtcDay, startOfUtcDay } from "../utils/dates";
import { roundMoney } from "../utils/pricing";

export interface ProductEarnings {
  productId: number | null;
  productName: string;
  quantitySold: number;
  revenue: number;
}

export interface CategoryEarnings {
  categoryName: string;
  revenue: number;
}

export interface EarningsReport {
  totals: { revenue: number; orderItems: number; itemsSold: number };
  topProducts: ProductEarnings[];
  revenueByCategory: CategoryEarnings[];
}

function deliveredItems(vendorId: number, filters: EarningsQuery = {}) {
  let query = getSQLClient()
    .selectFrom("order_items")
    .leftJoin("products", "products.id", "order_items.product_id")
    .leftJoin("categories", "categories.id", "products.category_id")
    .select([
      "order_items.id",
      "order_items.order_id",
      "order_items.product_id",
      "order_items.product_name",
      "order_items.quantity",
      "order_items.price",
      "order_items.status",
      "order_items.created_at",
      "categories.name as category_name",
    ])
    .where("order_items.vendor_id", "=", vendorId)
    .where("order_items.status", "=", "Delivered");

  // delivered items are dated by their last status change
  if (filters.dateFrom) {
    query = query.where("order_items.updated_at", ">=", startOfUtcDay(filters.dateFrom));
  }
  if (filters.dateTo) {
    query = query.where("order_items.updated_at", "<", endOfUtcDay(filters.dateTo));
  }
  if (filters.productId !== undefined) {
    query = query.where("order_items.product_id", "=", filters.productId);
  }
  if (filters.categoryId !== undefined) {
    query = query.where("products.category_id", "=", filters.categoryId);
  }

  return query.orderBy("order_items.created_at", "desc").orderBy("order_items.id", "desc");
}

/**
 * Revenue from delivered order items only. Items whose product was deleted
 * still count, grouped under their snapshot name and "Uncategorized".
 */
export async function getEarningsReport(
  vendorId: number,
  filters: EarningsQuery = {}
): Promise<EarningsReport> {
  const items = await deliveredItems(vendorId, filters).execute();

  const byProduct = new Map<string, ProductEarnings>();
  const byCategory = new Map<string, CategoryEarnings>();

  for (const item of items) {
    const revenue = item.price * item.quantity;

    const productKey = item.product_id !== null ? `id:${item.product_id}` : `name:${item.product_name}`;
    const product = byProduct.get(productKey) ?? {
      productId: item.product_id,
      productName: item.product_name,
      quantitySold: 0,
      revenue: 0,
    };
    product.quantitySold += item.quantity;
    product.revenue += revenue;
    byProduct.set(productKey, product);

    const categoryName = item.category_name ?? "Uncategorized";
    const category = byCategory.get(categoryName) ?? { categoryName, revenue: 0 };
    category.revenue += revenue;
    byCategory.set(categoryName, category);
  }

  return {
    totals: {
      revenue: roundMoney(items.reduce((sum, item) => sum + item.price * item.quantity, 0)),
      orderItems: items.length,
      itemsSold: items.reduce((sum, item) => sum + item.quantity, 0),
    },
    topProducts: [...byProduct.values()]
      .map((product) => ({ ...product, revenue: roundMoney(product.revenue) }))
      .sort((a, b) => b.revenue - a.revenue)
      .slice(0, TOP_PRODUCTS_LIMIT),
    revenueByCategory: [...byCategory.values()]
      .map((category) => ({ ...category, revenue: roundMoney(category.revenue) }))
      .sort((a, b) => b.revenue - a.revenue),
  };
}

export const SALES_CSV_HEADER = [
  "Order ID",
  "Product",
  "Quantity",
  "Price",
  "Total",
  "Status",
  "Date",
];

export async function exportSalesCsv(
  vendorId: number,
  now = new Date()
): Promise<ServiceResult<{ filename: string; csv: string }>> {
  const vendor = await getSQLClient()
    .selectFrom("vendors")
    .select("slug")
    .where("id", "=", vendorId)
    .executeTakeFirst();

  if (!vendor) {
    return fail("NotFound", "Vendor not found");
  }

  const items = await deliveredItems(vendorId).execute();

  const rows = items.map((item) => [
    item.order_id,
    item.product_name,
    item.quantity,
    item.price.toFixed(2),
    roundMoney(item.price * item.quantity).toFixed(2),
    item.status,
    formatCsvDate(item.created_at),
  ]);

  return ok({
    filename: `sales_report_${vendor.slug}_${formatFileDate(now)}.csv`,
    csv: toCsv([SALES_CSV_HEADER, ...rows]),
  });
}
