import express, { Express } from "express";
import cors from "cors";
import cookieParser from "cookie-parser";
import { AppConfig } from "./config/env";
import { createAuthMiddleware } from "./middlewares/auth";
import errorHandler from "./middlewares/errorHandler";
import { Store } from "./repositories/types";
import { PaymentGateway } from "./services/paymentGateway";
import { createCartService } from "./services/cart";
import { createOrderAssembler } from "./services/orderAssembler";
import { createOrderService } from "./services/orders";
import { createPaymentService } from "./services/payments";

// Controllers
import { createAdminController } from "./controllers/admin";
import { createAuthController } from "./controllers/auth";
import { createCartController } from "./controllers/cart";
import { createCategoriesController } from "./controllers/categories";
import { createOrdersController } from "./controllers/orders";
import { createPaymentsController } from "./controllers/payments";
import { createProductsController } from "./controllers/products";

// Routes
import { createAdminRouter } from "./routes/admin";
import { createAuthRouter } from "./routes/auth";
import { createCartRouter } from "./routes/cart";
import { createCategoriesRouter } from "./routes/categories";
import { createOrdersRouter } from "./routes/orders";
import { createPaymentsRouter } from "./routes/payments";
import { createProductsRouter } from "./routes/products";

export interface AppDependencies {
  config: AppConfig;
  store: Store;
  gateway: PaymentGateway;
}

export const createApp = ({ config, store, gateway }: AppDependencies): Express => {
  const app = express();

  const auth = createAuthMiddleware(store, config);
  const cartService = createCartService(store);
  const orderAssembler = createOrderAssembler(store);
  const orderService = createOrderService(store);
  const paymentService = createPaymentService(store, gateway, {
    webhookSecret: config.payments.webhookSecret,
    currency: config.payments.currency,
    returnUrlTemplate: config.payments.returnUrlTemplate,
  });

  // Middlewares
  app.use(
    cors({
      origin: config.frontendUrl,
      credentials: true,
    })
  );
  app.use(cookieParser());
  // Before express.json: the webhook route reads its own raw body.
  app.use(
    "/api/payments",
    createPaymentsRouter(createPaymentsController(paymentService), auth)
  );
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Routes
  app.use("/api/auth", createAuthRouter(createAuthController(store, config), auth));
  app.use("/api/categories", createCategoriesRouter(createCategoriesController(store), auth));
  app.use("/api/products", createProductsRouter(createProductsController(store), auth));
  app.use("/api/cart", createCartRouter(createCartController(cartService), auth));
  app.use(
    "/api/orders",
    createOrdersRouter(createOrdersController(orderAssembler, orderService), auth)
  );
  app.use("/api/admin", createAdminRouter(createAdminController(store, orderService), auth));

  // Health check
  app.get("/api/health", (req, res) => {
    res.json({ status: "ok", message: "Server is running" });
  });

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
};
