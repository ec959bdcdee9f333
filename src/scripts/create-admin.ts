import { z } from "zod";
import { closeSQLClient, getSQLClient } from "../db";
import { hashPassword } from "../services/auth";

const ZAdminEnv = z.object({
  ADMIN_USERNAME: z.string().min(3),
  ADMIN_PASSWORD: z.string().min(6),
  ADMIN_EMAIL: z.string().email().or(z.literal("")).default(""),
});

async function createAdmin() {
  const env = ZAdminEnv.safeParse(process.env);
  if (!env.success) {
    throw new Error(
      `Set ADMIN_USERNAME and ADMIN_PASSWORD: ${JSON.stringify(env.error.flatten().fieldErrors)}`
    );
  }
  const { ADMIN_USERNAME, ADMIN_PASSWORD, ADMIN_EMAIL } = env.data;

  const admin = await getSQLClient()
    .insertInto("users")
    .values({
      username: ADMIN_USERNAME,
      email: ADMIN_EMAIL,
      password_hash: await hashPassword(ADMIN_PASSWORD),
      is_admin: true,
    })
    .onConflict((oc) => oc.column("username").doUpdateSet({ is_admin: true }))
    .returning(["id", "username"])
    .executeTakeFirstOrThrow();

  console.log(`Admin ${admin.username} (#${admin.id}) ready`);
}

createAdmin()
  .catch((err) => {
    console.error("Could not create admin:", err);
    process.exitCode = 1;
  })
  .finally(closeSQLClient);
