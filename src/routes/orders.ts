import express, { Response } from "express";
import { AuthRequest, authenticate, customerOf, requireRole } from "../middlewares/auth";
import { buyNow } from "../services/checkout";
import { cancelOrderItem, getCustomerOrder, listCustomerOrders } from "../services/orders";
import { fail, ok } from "../types/result";
import { parseId, routeHandler, sendResult } from "../utils/respond";
import { requestValidator } from "../utils/requestValidator";
import { BuyNowRequest, ZBuyNowSchema } from "../validations/checkout";

const router = express.Router();

router.use(authenticate, requireRole("customer"));

router.get(
  "/",
  routeHandler("Failed to fetch orders", async (req: AuthRequest, res: Response) => {
    sendResult(res, ok(await listCustomerOrders(customerOf(req).userId)));
  })
);

router.get(
  "/:orderId",
  routeHandler("Failed to fetch order", async (req: AuthRequest, res: Response) => {
    const orderId = parseId(req.params.orderId);
    if (orderId === undefined) {
      sendResult(res, fail("NotFound", "Order not found"));
      return;
    }
    sendResult(res, await getCustomerOrder(customerOf(req).userId, orderId));
  })
);

router.post(
  "/buy/:productSlug",
  requestValidator(ZBuyNowSchema),
  routeHandler("Error placing order. Please try again.", async (req: AuthRequest, res: Response) => {
    const { quantity, ...details }: BuyNowRequest = req.body;
    sendResult(res, await buyNow(customerOf(req), req.params.productSlug, quantity, details), 201);
  })
);

router.post(
  "/items/:itemId/cancel",
  routeHandler("Failed to cancel order item", async (req: AuthRequest, res: Response) => {
    const itemId = parseId(req.params.itemId);
    if (itemId === undefined) {
      sendResult(res, fail("NotFound", "Order item not found"));
      return;
    }
    sendResult(res, await cancelOrderItem(customerOf(req).userId, itemId));
  })
);

export default router;
