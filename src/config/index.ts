import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const ZEnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().default("postgres://localhost:5432/grocery_marketplace"),
  RABBITMQ_URL: z.string().default("amqp://localhost"),
  JWT_SECRET: z.string().min(1, "JWT_SECRET is required"),
  JWT_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
  APP_NAME: z.string().default("Grocery Marketplace"),
  MAIL_FROM: z.string().default("no-reply@grocery-marketplace.local"),
  CATEGORY_IMAGES_PATH: z.string().default("config/category-images.json"),
});

const ZCategoryImagesFile = z.object({
  default: z.string(),
  images: z.record(z.string(), z.string()),
});

export interface CategoryImageMap {
  defaultImage: string;
  images: Record<string, string>;
}

export interface AppConfig {
  port: number;
  databaseUrl: string;
  rabbitmqUrl: string;
  jwtSecret: string;
  jwtExpiresInSeconds: number;
  appName: string;
  mailFrom: string;
  categoryImages: CategoryImageMap;
}

export function loadCategoryImages(filePath: string): CategoryImageMap {
  const absolutePath = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(absolutePath)) {
    console.warn(`Category image map not found at ${absolutePath}, using empty map`);
    return { defaultImage: "", images: {} };
  }

  const parsed = ZCategoryImagesFile.parse(
    JSON.parse(fs.readFileSync(absolutePath, "utf8"))
  );
  return { defaultImage: parsed.default, images: parsed.images };
}

function loadConfig(): AppConfig {
  const result = ZEnvSchema.safeParse(process.env);
  if (!result.success) {
    throw new Error(
      `Invalid environment configuration: ${JSON.stringify(result.error.flatten().fieldErrors)}`
    );
  }
  const data = result.data;

  return {
    port: data.PORT,
    databaseUrl: data.DATABASE_URL,
    rabbitmqUrl: data.RABBITMQ_URL,
    jwtSecret: data.JWT_SECRET,
    jwtExpiresInSeconds: data.JWT_EXPIRES_IN_SECONDS,
    appName: data.APP_NAME,
    mailFrom: data.MAIL_FROM,
    categoryImages: loadCategoryImages(data.CATEGORY_IMAGES_PATH),
  };
}

export const config = loadConfig();
