export const NOTIFICATION_QUEUE = "notifications";

export const EARTH_RADIUS_KM = 6371.0;
export const DEFAULT_DELIVERY_RADIUS_KM = 5.0;
export const MIN_DELIVERY_RADIUS_KM = 0.5;
export const MAX_DELIVERY_RADIUS_KM = 50.0;

export const HOME_PRODUCT_LIMIT = 20;
export const RECENT_ORDER_ITEMS_LIMIT = 10;
export const LOW_STOCK_ITEMS_LIMIT = 5;
export const TOP_PRODUCTS_LIMIT = 10;

export const BCRYPT_ROUNDS = 10;
