import express from "express";
import { CategoryImageMap, config } from "./config";
import adminRouter from "./routes/admin";
import authRouter from "./routes/auth";
import cartRouter from "./routes/cart";
import catalogRouter from "./routes/catalog";
import checkoutRouter from "./routes/checkout";
import contactRouter from "./routes/contact";
import ordersRouter from "./routes/orders";
import vendorRouter from "./routes/vendor";
import { requestLogger } from "./utils/requestLogger";

export interface AppOptions {
  categoryImages?: CategoryImageMap;
}

export function createApp({ categoryImages = config.categoryImages }: AppOptions = {}) {
  const app = express();
  app.use(express.json());
  app.use(requestLogger);

  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok" });
  });

  app.use("/auth", authRouter);
  app.use("/", catalogRouter(categoryImages));
  app.use("/cart", cartRouter);
  app.use("/checkout", checkoutRouter);
  app.use("/orders", ordersRouter);
  app.use("/vendor", vendorRouter);
  app.use("/admin", adminRouter(categoryImages));
  app.use("/contact", contactRouter);

  return app;
}
