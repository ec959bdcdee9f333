import express, { Request, Response } from "express";
import { AuthRequest, authenticate } from "../middlewares/auth";
import { login, registerCustomer } from "../services/auth";
import { registerVendor } from "../services/vendors";
import { requestValidator } from "../utils/requestValidator";
import { routeHandler, sendResult } from "../utils/respond";
import { ZLoginSchema, ZRegisterSchema } from "../validations/auth";
import { ZVendorSignupSchema } from "../validations/vendor";

const router = express.Router();

router.post(
  "/register",
  requestValidator(ZRegisterSchema),
  routeHandler("Registration failed", async (req: Request, res: Response) => {
    sendResult(res, await registerCustomer(req.body), 201);
  })
);

router.post(
  "/vendor-signup",
  requestValidator(ZVendorSignupSchema),
  routeHandler("Vendor registration failed", async (req: Request, res: Response) => {
    sendResult(res, await registerVendor(req.body), 201);
  })
);

router.post(
  "/login",
  requestValidator(ZLoginSchema),
  routeHandler("Login failed", async (req: Request, res: Response) => {
    sendResult(res, await login(req.body));
  })
);

router.get("/me", authenticate, (req: AuthRequest, res: Response) => {
  res.status(200).json({ isSuccess: true, data: req.principal });
});

export default router;
