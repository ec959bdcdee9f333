import amqp from "amqplib";
import { config } from "../config";
import { NOTIFICATION_QUEUE } from "../types/constants";
import { NotificationMessage } from "../types/notification";

export async function sendNotificationToQueue(notification: NotificationMessage) {
  const conn = await amqp.connect(config.rabbitmqUrl);
  try {
    const ch = await conn.createChannel();
    await ch.assertQueue(NOTIFICATION_QUEUE, { durable: true });

    const message = JSON.stringify(notification);
    ch.sendToQueue(NOTIFICATION_QUEUE, Buffer.from(message), { persistent: true });

    await ch.close();
  } finally {
    await conn.close();
  }
}
