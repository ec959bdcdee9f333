import { getSQLClient } from "../db";
import { CategoryImageMap } from "../config";
import { HOME_PRODUCT_LIMIT } from "../types/constants";
import { Category, ProductUnit } from "../types/db";
import { fail, ok, ServiceResult } from "../types/result";
import { displayPrice, isLowStock, roundMoney, savings } from "../utils/pricing";

export interface ProductCard {
  id: number;
  name: string;
  slug: string;
  description: string;
  price: number;
  discountPrice: number | null;
  displayPrice: number;
  savings: number;
  unit: ProductUnit;
  weight: number | null;
  image: string | null;
  quantity: number;
  inStock: boolean;
  lowStock: boolean;
  category: { id: number; name: string; slug: string } | null;
  vendor: { id: number; shopName: string; slug: string };
}

export interface CategoryCard {
  id: number;
  name: string;
  slug: string;
  description: string;
  imageUrl: string;
}

/** Products a customer may see and buy: active, available, approved vendor. */
export function selectSellableProducts() {
  return getSQLClient()
    .selectFrom("products")
    .innerJoin("vendors", "vendors.id", "products.vendor_id")
    .leftJoin("categories", "categories.id", "products.category_id")
    .select([
      "products.id",
      "products.name",
      "products.slug",
      "products.description",
      "products.price",
      "products.discount_price",
      "products.unit",
      "products.weight",
      "products.image",
      "products.quantity",
      "products.low_stock_threshold",
      "products.created_at",
      "products.vendor_id",
      "vendors.shop_name as vendor_shop_name",
      "vendors.slug as vendor_slug",
      "categories.id as category_id",
      "categories.name as category_name",
      "categories.slug as category_slug",
    ])
    .where("products.is_active", "=", true)
    .where("products.is_available", "=", true)
    .where("vendors.status", "=", "approved");
}

type SellableRow = Awaited<
  ReturnType<ReturnType<typeof selectSellableProducts>["execute"]>
>[number];

export function toProductCard(row: SellableRow): ProductCard {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    description: row.description,
    price: row.price,
    discountPrice: row.discount_price,
    displayPrice: roundMoney(displayPrice(row)),
    savings: savings(row),
    unit: row.unit,
    weight: row.weight,
    image: row.image,
    quantity: row.quantity,
    inStock: row.quantity > 0,
    lowStock: isLowStock(row),
    category:
      row.category_id !== null && row.category_name !== null && row.category_slug !== null
        ? { id: row.category_id, name: row.category_name, slug: row.category_slug }
        : null,
    vendor: { id: row.vendor_id, shopName: row.vendor_shop_name, slug: row.vendor_slug },
  };
}

export function toCategoryCard(
  category: Pick<Category, "id" | "name" | "slug" | "description">,
  categoryImages: CategoryImageMap
): CategoryCard {
  return {
    id: category.id,
    name: category.name,
    slug: category.slug,
    description: category.description,
    imageUrl: categoryImages.images[category.name] ?? categoryImages.defaultImage,
  };
}

export async function getActiveCategories(
  categoryImages: CategoryImageMap
): Promise<CategoryCard[]> {
  const categories = await getSQLClient()
    .selectFrom("categories")
    .select(["id", "name", "slug", "description"])
    .where("is_active", "=", true)
    .orderBy("name")
    .execute();

  return categories.map((category) => toCategoryCard(category, categoryImages));
}

export async function getHomeCatalog(categoryImages: CategoryImageMap) {
  const products = await selectSellableProducts()
    .orderBy("products.created_at", "desc")
    .orderBy("products.id", "desc")
    .limit(HOME_PRODUCT_LIMIT)
    .execute();

  return ok({
    products: products.map(toProductCard),
    categories: await getActiveCategories(categoryImages),
  });
}

export async function getCategoryProducts(
  slug: string,
  categoryImages: CategoryImageMap
): Promise<ServiceResult<{ category: CategoryCard; products: ProductCard[] }>> {
  const category = await getSQLClient()
    .selectFrom("categories")
    .select(["id", "name", "slug", "description"])
    .where("slug", "=", slug)
    .where("is_active", "=", true)
    .executeTakeFirst();

  if (!category) {
    return fail("NotFound", "Category not found");
  }

  const products = await selectSellableProducts()
    .where("products.category_id", "=", category.id)
    .orderBy("products.created_at", "desc")
    .orderBy("products.id", "desc")
    .execute();

  return ok({
    category: toCategoryCard(category, categoryImages),
    products: products.map(toProductCard),
  });
}

export async function getProductBySlug(slug: string): Promise<ServiceResult<ProductCard>> {
  const product = await selectSellableProducts()
    .where("products.slug", "=", slug)
    .executeTakeFirst();

  if (!product) {
    return fail("NotFound", "Product not found");
  }
  return ok(toProductCard(product));
}
