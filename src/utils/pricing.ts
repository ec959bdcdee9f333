export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

export function displayPrice(product: {
  price: number;
  discount_price: number | null;
}): number {
  const { price, discount_price } = product;
  return discount_price !== null && discount_price < price ? discount_price : price;
}

export function savings(product: { price: number; discount_price: number | null }): number {
  return roundMoney(product.price - displayPrice(product));
}

export function isLowStock(product: { quantity: number; low_stock_threshold: number }): boolean {
  return product.quantity > 0 && product.quantity <= product.low_stock_threshold;
}
