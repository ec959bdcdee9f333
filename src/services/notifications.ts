import { config } from "../config";
import { sendNotificationToQueue } from "../queue/producer";
import { NotificationMessage } from "../types/notification";
import { OrderItemStatus, VendorStatus } from "../types/db";

/**
 * Publishes a notification without letting delivery problems reach the
 * caller. Returns whether the message was handed to the queue.
 */
export async function notify(message: NotificationMessage): Promise<boolean> {
  try {
    await sendNotificationToQueue(message);
    return true;
  } catch (err) {
    console.warn(
      `Could not queue ${message.template} notification for ${message.to}:`,
      err instanceof Error ? err.message : err
    );
    return false;
  }
}

const signature = () => `Best regards,\n${config.appName} Team`;

export function welcomeEmail(username: string, email: string): NotificationMessage {
  return {
    template: "welcome",
    to: email,
    subject: `Welcome to ${config.appName}!`,
    body: [
      `Hello ${username},`,
      "",
      `Welcome to ${config.appName}! Your account has been created successfully.`,
      "",
      "Start browsing products from vendors near you and get them delivered quickly.",
      "",
      signature(),
    ].join("\n"),
  };
}

export function vendorRegistrationEmail(vendor: {
  owner_name: string;
  shop_name: string;
  email: string;
}): NotificationMessage {
  return {
    template: "vendor-registration",
    to: vendor.email,
    subject: "Vendor Registration Confirmation",
    body: [
      `Hello ${vendor.owner_name},`,
      "",
      `Thank you for registering as a vendor on ${config.appName}!`,
      "",
      `Shop: ${vendor.shop_name}`,
      "Status: Pending Approval",
      "",
      "Our admin team will review your application shortly.",
      "You'll receive an email once your account has been reviewed.",
      "",
      signature(),
    ].join("\n"),
  };
}

export function vendorStatusEmail(vendor: {
  owner_name: string;
  shop_name: string;
  email: string;
  status: VendorStatus;
}): NotificationMessage {
  return {
    template: "vendor-status",
    to: vendor.email,
    subject: `Vendor account ${vendor.status}`,
    body: [
      `Hello ${vendor.owner_name},`,
      "",
      `The vendor account for ${vendor.shop_name} is now ${vendor.status}.`,
      "",
      signature(),
    ].join("\n"),
  };
}

export function orderPlacedEmail(order: {
  id: number;
  customer_name: string;
  total_amount: number;
  email: string;
  itemCount: number;
}): NotificationMessage {
  return {
    template: "order-placed",
    to: order.email,
    subject: `Order #${order.id} confirmed`,
    body: [
      `Hello ${order.customer_name},`,
      "",
      `We've received your order #${order.id} with ${order.itemCount} item(s).`,
      `Total: ${order.total_amount.toFixed(2)}`,
      "",
      `Thank you for shopping with ${config.appName}!`,
    ].join("\n"),
  };
}

export function orderStatusEmail(item: {
  order_id: number;
  customer_name: string;
  product_name: string;
  quantity: number;
  status: OrderItemStatus;
  email: string;
}): NotificationMessage {
  return {
    template: "order-status",
    to: item.email,
    subject: `Order Update - ${item.product_name}`,
    body: [
      `Hello ${item.customer_name},`,
      "",
      "Your order has been updated:",
      "",
      `Product: ${item.product_name}`,
      `Quantity: ${item.quantity}`,
      `Current Status: ${item.status}`,
      "",
      `Order ID: #${item.order_id}`,
      "",
      `Thank you for shopping with ${config.appName}!`,
    ].join("\n"),
  };
}
