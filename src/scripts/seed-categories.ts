import fs from "fs";
import path from "path";
import { z } from "zod";
import { closeSQLClient, getSQLClient } from "../db";
import { slugify } from "../utils/slug";

const CATEGORIES_PATH = path.resolve(process.cwd(), "config/categories.json");

const ZCategoryNames = z.array(z.string().trim().min(1));

export async function seedCategories(names: string[]) {
  let created = 0;

  for (const name of names) {
    const inserted = await getSQLClient()
      .insertInto("categories")
      .values({ name, slug: slugify(name) })
      .onConflict((oc) => oc.column("name").doNothing())
      .returning("id")
      .executeTakeFirst();

    if (inserted) {
      created++;
      console.log(`Created category: ${name}`);
    } else {
      console.log(`Category already exists: ${name}`);
    }
  }

  console.log(`Seeding completed, ${created} new categories`);
}

async function main() {
  const names = ZCategoryNames.parse(JSON.parse(fs.readFileSync(CATEGORIES_PATH, "utf8")));
  await seedCategories(names);
}

main()
  .catch((err) => {
    console.error("Category seeding failed:", err);
    process.exitCode = 1;
  })
  .finally(closeSQLClient);
