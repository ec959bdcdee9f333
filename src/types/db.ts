import { ColumnType, Generated, Selectable } from "kysely";

export type VendorStatus = "pending" | "approved" | "rejected" | "blocked";

export type ProductUnit = "kg" | "g" | "l" | "ml" | "piece" | "pack";

export type PaymentMethod = "cod" | "online" | "upi" | "card";

export type OrderItemStatus =
  | "Pending"
  | "Accepted"
  | "Packed"
  | "Out for Delivery"
  | "Delivered"
  | "Cancelled";

// Written by the database on insert, set explicitly on update.
type Timestamp = ColumnType<Date, Date | undefined, Date>;

export interface UsersTable {
  id: Generated<number>;
  username: string;
  email: Generated<string>;
  password_hash: string;
  full_name: string | null;
  is_admin: Generated<boolean>;
  created_at: Timestamp;
}

export interface VendorsTable {
  id: Generated<number>;
  user_id: number;
  shop_name: string;
  slug: string;
  owner_name: string;
  email: string;
  phone: string;
  address: string;
  city: string;
  state: string;
  pincode: string; // canonical "560001, 560034"
  latitude: number | null;
  longitude: number | null;
  delivery_radius: Generated<number>; // km
  shop_logo: string | null;
  shop_banner: string | null;
  status: Generated<VendorStatus>;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface CategoriesTable {
  id: Generated<number>;
  name: string;
  slug: string;
  description: Generated<string>;
  is_active: Generated<boolean>;
  created_at: Timestamp;
}

export interface ProductsTable {
  id: Generated<number>;
  vendor_id: number;
  category_id: number | null;
  name: string;
  slug: string;
  description: Generated<string>;
  price: number;
  discount_price: number | null;
  quantity: Generated<number>;
  weight: number | null;
  unit: Generated<ProductUnit>;
  low_stock_threshold: Generated<number>;
  image: string | null;
  is_available: Generated<boolean>;
  is_active: Generated<boolean>;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface CartsTable {
  id: Generated<number>;
  user_id: number;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface CartItemsTable {
  id: Generated<number>;
  cart_id: number;
  product_id: number;
  quantity: number;
  created_at: Timestamp;
}

export interface OrdersTable {
  id: Generated<number>;
  user_id: number;
  total_amount: number;
  payment_method: PaymentMethod;
  is_paid: boolean;
  customer_name: string;
  customer_phone: string;
  delivery_address: string;
  delivery_pincode: string | null;
  delivery_latitude: number | null;
  delivery_longitude: number | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface OrderItemsTable {
  id: Generated<number>;
  order_id: number;
  product_id: number | null; // null once the product is deleted
  vendor_id: number;
  product_name: string;
  quantity: number;
  price: number; // unit price at purchase time
  status: Generated<OrderItemStatus>;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface ContactMessagesTable {
  id: Generated<number>;
  name: string;
  email: string;
  subject: string;
  message: string;
  is_resolved: Generated<boolean>;
  created_at: Timestamp;
}

export interface DB {
  users: UsersTable;
  vendors: VendorsTable;
  categories: CategoriesTable;
  products: ProductsTable;
  carts: CartsTable;
  cart_items: CartItemsTable;
  orders: OrdersTable;
  order_items: OrderItemsTable;
  contact_messages: ContactMessagesTable;
}

export type Vendor = Selectable<VendorsTable>;
export type Category = Selectable<CategoriesTable>;
export type Product = Selectable<ProductsTable>;
export type ContactMessage = Selectable<ContactMessagesTable>;
