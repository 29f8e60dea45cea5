import express from "express";
import { AuthMiddleware } from "../middlewares/auth";
import { asyncHandler } from "../controllers/helpers";
import { createOrdersController } from "../controllers/orders";

export const createOrdersRouter = (
  controller: ReturnType<typeof createOrdersController>,
  { authenticate }: AuthMiddleware
) => {
  const router = express.Router();

  router.use(authenticate);
  router.post("/", asyncHandler(controller.createOrder));
  router.get("/", asyncHandler(controller.getOrders));
  router.get("/:orderId", asyncHandler(controller.getOrder));

  return router;
};
