import express, { Request, Response } from "express";
import { submitContactMessage } from "../services/contact";
import { ok } from "../types/result";
import { requestValidator } from "../utils/requestValidator";
import { routeHandler, sendResult } from "../utils/respond";
import { ZContactSchema } from "../validations/catalog";

const router = express.Router();

router.post(
  "/",
  requestValidator(ZContactSchema),
  routeHandler("Failed to send message", async (req: Request, res: Response) => {
    sendResult(res, ok(await submitContactMessage(req.body)), 201);
  })
);

export default router;
