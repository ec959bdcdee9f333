import express, { Response } from "express";
import { AuthRequest, authenticate, customerOf, requireRole } from "../middlewares/auth";
import { addToCart, getCart, removeCartItem, updateCartItem } from "../services/cart";
import { fail, ok } from "../types/result";
import { parseRequestPart, requestValidator } from "../utils/requestValidator";
import { parseId, routeHandler, sendResult } from "../utils/respond";
import {
  AddToCartRequest,
  ZAddToCartSchema,
  ZCartItemActionParams,
} from "../validations/cart";

const router = express.Router();

router.use(authenticate, requireRole("customer"));

router.get(
  "/",
  routeHandler("Failed to load cart", async (req: AuthRequest, res: Response) => {
    sendResult(res, ok(await getCart(customerOf(req).userId)));
  })
);

router.post(
  "/items/:productSlug",
  requestValidator(ZAddToCartSchema),
  routeHandler("Failed to add to cart", async (req: AuthRequest, res: Response) => {
    const request: AddToCartRequest = req.body;
    sendResult(
      res,
      await addToCart(customerOf(req).userId, req.params.productSlug, request.quantity)
    );
  })
);

router.patch(
  "/items/:itemId/:action",
  routeHandler("Failed to update cart", async (req: AuthRequest, res: Response) => {
    const params = parseRequestPart(ZCartItemActionParams, req.params, res);
    if (!params) return;
    sendResult(res, await updateCartItem(customerOf(req).userId, params.itemId, params.action));
  })
);

router.delete(
  "/items/:itemId",
  routeHandler("Failed to remove cart item", async (req: AuthRequest, res: Response) => {
    const itemId = parseId(req.params.itemId);
    if (itemId === undefined) {
      sendResult(res, fail("NotFound", "Cart item not found"));
      return;
    }
    sendResult(res, await removeCartItem(customerOf(req).userId, itemId));
  })
);

export default router;
