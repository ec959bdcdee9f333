import express, { Response } from "express";
import {
  AuthRequest,
  authenticate,
  requireApprovedVendor,
  requireRole,
  vendorOf,
} from "../middlewares/auth";
import { exportSalesCsv, getEarningsReport } from "../services/earnings";
import {
  getVendorOrderItem,
  listVendorOrderItems,
  updateOrderItemStatus,
} from "../services/fulfillment";
import {
  createProduct,
  deleteProduct,
  getVendorProduct,
  getVendorProducts,
  toggleProductAvailability,
  updateProduct,
} from "../services/products";
import {
  getVendorDashboard,
  getVendorProfile,
  getVendorStatus,
  updateVendorProfile,
} from "../services/vendors";
import { fail, ok } from "../types/result";
import { parseRequestPart, requestValidator } from "../utils/requestValidator";
import { parseId, routeHandler, sendResult } from "../utils/respond";
import { ZProductListQuery, ZProductSchema } from "../validations/product";
import {
  OrderItemStatusRequest,
  ZEarningsQuery,
  ZOrderItemStatusSchema,
  ZVendorOrdersQuery,
  ZVendorProfileSchema,
} from "../validations/vendor";

const router = express.Router();

router.use(authenticate, requireRole("vendor"));

// Available while the account waits for approval.
router.get("/status", (req: AuthRequest, res: Response) => {
  res.status(200).json(ok(getVendorStatus(vendorOf(req))));
});

router.get(
  "/profile",
  routeHandler("Failed to fetch profile", async (req: AuthRequest, res: Response) => {
    sendResult(res, await getVendorProfile(vendorOf(req).vendorId));
  })
);

router.put(
  "/profile",
  requestValidator(ZVendorProfileSchema),
  routeHandler("Failed to update profile", async (req: AuthRequest, res: Response) => {
    sendResult(res, await updateVendorProfile(vendorOf(req).vendorId, req.body));
  })
);

router.use(requireApprovedVendor);

router.get(
  "/dashboard",
  routeHandler("Failed to load dashboard", async (req: AuthRequest, res: Response) => {
    sendResult(res, ok(await getVendorDashboard(vendorOf(req).vendorId)));
  })
);

router.get(
  "/products",
  routeHandler("Failed to fetch products", async (req: AuthRequest, res: Response) => {
    const filters = parseRequestPart(ZProductListQuery, req.query, res);
    if (!filters) return;
    sendResult(res, ok(await getVendorProducts(vendorOf(req).vendorId, filters)));
  })
);

router.post(
  "/products",
  requestValidator(ZProductSchema),
  routeHandler("Failed to create product", async (req: AuthRequest, res: Response) => {
    sendResult(res, await createProduct(vendorOf(req).vendorId, req.body), 201);
  })
);

const productNotFound = fail("NotFound", "Product not found");

router.get(
  "/products/:productId",
  routeHandler("Failed to fetch product", async (req: AuthRequest, res: Response) => {
    const productId = parseId(req.params.productId);
    if (productId === undefined) {
      sendResult(res, productNotFound);
      return;
    }
    sendResult(res, await getVendorProduct(vendorOf(req).vendorId, productId));
  })
);

router.put(
  "/products/:productId",
  requestValidator(ZProductSchema),
  routeHandler("Failed to update product", async (req: AuthRequest, res: Response) => {
    const productId = parseId(req.params.productId);
    if (productId === undefined) {
      sendResult(res, productNotFound);
      return;
    }
    sendResult(res, await updateProduct(vendorOf(req).vendorId, productId, req.body));
  })
);

router.delete(
  "/products/:productId",
  routeHandler("Failed to delete product", async (req: AuthRequest, res: Response) => {
    const productId = parseId(req.params.productId);
    if (productId === undefined) {
      sendResult(res, productNotFound);
      return;
    }
    sendResult(res, await deleteProduct(vendorOf(req).vendorId, productId));
  })
);

router.post(
  "/products/:productId/toggle",
  routeHandler("Failed to update product", async (req: AuthRequest, res: Response) => {
    const productId = parseId(req.params.productId);
    if (productId === undefined) {
      sendResult(res, productNotFound);
      return;
    }
    sendResult(res, await toggleProductAvailability(vendorOf(req).vendorId, productId));
  })
);

router.get(
  "/orders",
  routeHandler("Failed to fetch orders", async (req: AuthRequest, res: Response) => {
    const filters = parseRequestPart(ZVendorOrdersQuery, req.query, res);
    if (!filters) return;
    sendResult(res, ok(await listVendorOrderItems(vendorOf(req).vendorId, filters)));
  })
);

const orderItemNotFound = fail("NotFound", "Order item not found");

router.get(
  "/orders/:itemId",
  routeHandler("Failed to fetch order item", async (req: AuthRequest, res: Response) => {
    const itemId = parseId(req.params.itemId);
    if (itemId === undefined) {
      sendResult(res, orderItemNotFound);
      return;
    }
    sendResult(res, await getVendorOrderItem(vendorOf(req).vendorId, itemId));
  })
);

router.patch(
  "/orders/:itemId/status",
  requestValidator(ZOrderItemStatusSchema),
  routeHandler("Failed to update order status", async (req: AuthRequest, res: Response) => {
    const itemId = parseId(req.params.itemId);
    if (itemId === undefined) {
      sendResult(res, orderItemNotFound);
      return;
    }
    const { status }: OrderItemStatusRequest = req.body;
    sendResult(res, await updateOrderItemStatus(vendorOf(req).vendorId, itemId, status));
  })
);

router.get(
  "/earnings",
  routeHandler("Failed to load earnings", async (req: AuthRequest, res: Response) => {
    const filters = parseRequestPart(ZEarningsQuery, req.query, res);
    if (!filters) return;
    sendResult(res, ok(await getEarningsReport(vendorOf(req).vendorId, filters)));
  })
);

router.get(
  "/earnings/export",
  routeHandler("Failed to export sales", async (req: AuthRequest, res: Response) => {
    const result = await exportSalesCsv(vendorOf(req).vendorId);
    if (!result.isSuccess) {
      sendResult(res, result);
      return;
    }
    res
      .status(200)
      .type("text/csv")
      .attachment(result.data.filename)
      .send(result.data.csv);
  })
);

export default router;
