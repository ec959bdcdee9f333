import express, { Response } from "express";
import { CategoryImageMap } from "../config";
import { AuthRequest, authenticate, requireRole } from "../middlewares/auth";
import {
  createCategory,
  deleteCategory,
  listAllOrders,
  listAllProducts,
  listCategories,
  listVendors,
  setProductActive,
  setVendorStatus,
  updateCategory,
} from "../services/admin";
import { listContactMessages, resolveContactMessage } from "../services/contact";
import { fail, ok } from "../types/result";
import { parseRequestPart, requestValidator } from "../utils/requestValidator";
import { parseId, routeHandler, sendResult } from "../utils/respond";
import {
  ZCategorySchema,
  ZCategoryUpdateSchema,
  ZContactListQuery,
} from "../validations/catalog";
import { ZProductActiveSchema } from "../validations/product";
import { VendorStatusRequest, ZVendorListQuery, ZVendorStatusSchema } from "../validations/vendor";

export default function adminRouter(categoryImages: CategoryImageMap) {
  const router = express.Router();

  router.use(authenticate, requireRole("admin"));

  router.get(
    "/vendors",
    routeHandler("Failed to fetch vendors", async (req: AuthRequest, res: Response) => {
      const query = parseRequestPart(ZVendorListQuery, req.query, res);
      if (!query) return;
      sendResult(res, ok(await listVendors(query.status)));
    })
  );

  router.patch(
    "/vendors/:vendorId/status",
    requestValidator(ZVendorStatusSchema),
    routeHandler("Failed to update vendor", async (req: AuthRequest, res: Response) => {
      const vendorId = parseId(req.params.vendorId);
      if (vendorId === undefined) {
        sendResult(res, fail("NotFound", "Vendor not found"));
        return;
      }
      const { status }: VendorStatusRequest = req.body;
      sendResult(res, await setVendorStatus(vendorId, status));
    })
  );

  router.get(
    "/categories",
    routeHandler("Failed to fetch categories", async (_req: AuthRequest, res: Response) => {
      sendResult(res, ok(await listCategories(categoryImages)));
    })
  );

  router.post(
    "/categories",
    requestValidator(ZCategorySchema),
    routeHandler("Failed to create category", async (req: AuthRequest, res: Response) => {
      sendResult(res, await createCategory(req.body, categoryImages), 201);
    })
  );

  router.patch(
    "/categories/:categoryId",
    requestValidator(ZCategoryUpdateSchema),
    routeHandler("Failed to update category", async (req: AuthRequest, res: Response) => {
      const categoryId = parseId(req.params.categoryId);
      if (categoryId === undefined) {
        sendResult(res, fail("NotFound", "Category not found"));
        return;
      }
      sendResult(res, await updateCategory(categoryId, req.body, categoryImages));
    })
  );

  router.delete(
    "/categories/:categoryId",
    routeHandler("Failed to delete category", async (req: AuthRequest, res: Response) => {
      const categoryId = parseId(req.params.categoryId);
      if (categoryId === undefined) {
        sendResult(res, fail("NotFound", "Category not found"));
        return;
      }
      sendResult(res, await deleteCategory(categoryId));
    })
  );

  router.get(
    "/products",
    routeHandler("Failed to fetch products", async (_req: AuthRequest, res: Response) => {
      sendResult(res, ok(await listAllProducts()));
    })
  );

  router.patch(
    "/products/:productId/active",
    requestValidator(ZProductActiveSchema),
    routeHandler("Failed to update product", async (req: AuthRequest, res: Response) => {
      const productId = parseId(req.params.productId);
      if (productId === undefined) {
        sendResult(res, fail("NotFound", "Product not found"));
        return;
      }
      sendResult(res, await setProductActive(productId, req.body.isActive));
    })
  );

  router.get(
    "/orders",
    routeHandler("Failed to fetch orders", async (_req: AuthRequest, res: Response) => {
      sendResult(res, ok(await listAllOrders()));
    })
  );

  router.get(
    "/messages",
    routeHandler("Failed to fetch messages", async (req: AuthRequest, res: Response) => {
      const query = parseRequestPart(ZContactListQuery, req.query, res);
      if (!query) return;
      sendResult(res, ok(await listContactMessages(query.resolved)));
    })
  );

  router.post(
    "/messages/:messageId/resolve",
    routeHandler("Failed to resolve message", async (req: AuthRequest, res: Response) => {
      const messageId = parseId(req.params.messageId);
      if (messageId === undefined) {
        sendResult(res, fail("NotFound", "Message not found"));
        return;
      }
      sendResult(res, await resolveContactMessage(messageId));
    })
  );

  return router;
}
