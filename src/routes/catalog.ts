import express, { Request, Response } from "express";
import { CategoryImageMap } from "../config";
import {
  getActiveCategories,
  getCategoryProducts,
  getHomeCatalog,
  getProductBySlug,
} from "../services/catalog";
import {
  checkPincodeAvailability,
  findVendorsInRange,
  getProductsInDeliveryRange,
} from "../services/delivery";
import { ok } from "../types/result";
import { parseRequestPart } from "../utils/requestValidator";
import { routeHandler, sendResult } from "../utils/respond";
import { ZLocationQuery, ZPincodeQuery } from "../validations/catalog";

export default function catalogRouter(categoryImages: CategoryImageMap) {
  const router = express.Router();

  router.get(
    "/home",
    routeHandler("Failed to load home page", async (_req: Request, res: Response) => {
      sendResult(res, await getHomeCatalog(categoryImages));
    })
  );

  router.get(
    "/categories",
    routeHandler("Failed to fetch categories", async (_req: Request, res: Response) => {
      sendResult(res, ok(await getActiveCategories(categoryImages)));
    })
  );

  router.get(
    "/categories/:slug",
    routeHandler("Failed to fetch category", async (req: Request, res: Response) => {
      sendResult(res, await getCategoryProducts(req.params.slug, categoryImages));
    })
  );

  router.get(
    "/products",
    routeHandler("Failed to fetch products", async (req: Request, res: Response) => {
      const location = parseRequestPart(ZLocationQuery, req.query, res);
      if (!location) return;
      sendResult(res, ok(await getProductsInDeliveryRange(location.lat, location.lon)));
    })
  );

  router.get(
    "/products/:slug",
    routeHandler("Failed to fetch product", async (req: Request, res: Response) => {
      sendResult(res, await getProductBySlug(req.params.slug));
    })
  );

  router.get(
    "/delivery/check",
    routeHandler("Failed to check pincode", async (req: Request, res: Response) => {
      const query = parseRequestPart(ZPincodeQuery, req.query, res);
      if (!query) return;
      sendResult(res, ok(await checkPincodeAvailability(query.pincode)));
    })
  );

  router.get(
    "/delivery/vendors",
    routeHandler("Failed to find nearby vendors", async (req: Request, res: Response) => {
      const location = parseRequestPart(ZLocationQuery, req.query, res);
      if (!location) return;
      if (location.lat === undefined || location.lon === undefined) {
        sendResult(res, ok([]));
        return;
      }
      sendResult(res, ok(await findVendorsInRange(location.lat, location.lon)));
    })
  );

  return router;
}
