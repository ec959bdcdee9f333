import express, { Response } from "express";
import { AuthRequest, authenticate, customerOf, requireRole } from "../middlewares/auth";
import { getCheckoutSummary, placeOrder } from "../services/checkout";
import { requestValidator } from "../utils/requestValidator";
import { routeHandler, sendResult } from "../utils/respond";
import { ZCheckoutSchema } from "../validations/checkout";

const router = express.Router();

router.use(authenticate, requireRole("customer"));

router.get(
  "/",
  routeHandler("Failed to load checkout", async (req: AuthRequest, res: Response) => {
    sendResult(res, await getCheckoutSummary(customerOf(req)));
  })
);

router.post(
  "/",
  requestValidator(ZCheckoutSchema),
  routeHandler("Error processing checkout. Please try again.", async (req: AuthRequest, res: Response) => {
    sendResult(res, await placeOrder(customerOf(req), req.body), 201);
  })
);

export default router;
