import fs from "fs";
import path from "path";
import { sql } from "kysely";
import { closeSQLClient, getSQLClient } from "../db";

const SCHEMA_PATH = path.resolve(process.cwd(), "db/schema.sql");

async function migrate() {
  console.log(`Applying schema from ${SCHEMA_PATH}...`);
  const schema = fs.readFileSync(SCHEMA_PATH, "utf8");

  await sql.raw(schema).execute(getSQLClient());

  console.log("Schema applied");
}

migrate()
  .catch((err) => {
    console.error("Migration failed:", err);
    process.exitCode = 1;
  })
  .finally(closeSQLClient);
