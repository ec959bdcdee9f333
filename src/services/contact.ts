import { getSQLClient } from "../db";
import { ContactMessage } from "../types/db";
import { fail, ok, ServiceResult } from "../types/result";
import { ContactRequest } from "../validations/catalog";

export async function submitContactMessage(request: ContactRequest): Promise<ContactMessage> {
  const message = await getSQLClient()
    .insertInto("contact_messages")
    .values(request)
    .returningAll()
    .executeTakeFirstOrThrow();

  console.log(`Contact message #${message.id} received from ${message.email}`);
  return message;
}

export async function listContactMessages(resolved?: boolean): Promise<ContactMessage[]> {
  let query = getSQLClient().selectFrom("contact_messages").selectAll();
  if (resolved !== undefined) {
    query = query.where("is_resolved", "=", resolved);
  }
  return query.orderBy("created_at", "desc").orderBy("id", "desc").execute();
}

export async function resolveContactMessage(id: number): Promise<ServiceResult<ContactMessage>> {
  const message = await getSQLClient()
    .updateTable("contact_messages")
    .set({ is_resolved: true })
    .where("id", "=", id)
    .returningAll()
    .executeTakeFirst();

  if (!message) {
    return fail("NotFound", "Message not found");
  }
  return ok(message);
}
