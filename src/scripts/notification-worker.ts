import amqp from "amqplib";
import { config } from "../config";
import { NOTIFICATION_QUEUE } from "../types/constants";
import { NotificationMessage, ZNotificationMessage } from "../types/notification";

export function renderMail(message: NotificationMessage, from: string): string {
  return [
    `From: ${from}`,
    `To: ${message.to}`,
    `Subject: ${message.subject}`,
    "",
    message.body,
  ].join("\n");
}

async function startWorker() {
  const conn = await amqp.connect(config.rabbitmqUrl);
  const ch = await conn.createChannel();
  await ch.assertQueue(NOTIFICATION_QUEUE, { durable: true });

  // One message at a time per worker
  await ch.prefetch(1);

  console.log("Notification worker started, waiting for messages...");

  await ch.consume(NOTIFICATION_QUEUE, (msg) => {
    if (!msg) return;

    let payload: unknown;
    try {
      payload = JSON.parse(msg.content.toString());
    } catch (err) {
      console.error("Dropping unreadable notification:", err);
      ch.nack(msg, false, false);
      return;
    }

    const parsed = ZNotificationMessage.safeParse(payload);
    if (!parsed.success) {
      console.error("Dropping invalid notification:", parsed.error.flatten().fieldErrors);
      ch.nack(msg, false, false);
      return;
    }

    console.log(`Delivering ${parsed.data.template} mail\n${renderMail(parsed.data, config.mailFrom)}`);
    ch.ack(msg);
  });
}

startWorker().catch((err) => {
  console.error("Notification worker stopped:", err);
  process.exitCode = 1;
});
