import express from "express";
import { AuthMiddleware } from "../middlewares/auth";
import { asyncHandler } from "../controllers/helpers";
import { createAdminController } from "../controllers/admin";

export const createAdminRouter = (
  controller: ReturnType<typeof createAdminController>,
  { authenticate, authorize }: AuthMiddleware
) => {
  const router = express.Router();

  router.use(authenticate, authorize("admin"));
  router.get("/orders", asyncHandler(controller.listOrders));
  router.patch("/orders/:orderId/status", asyncHandler(controller.updateOrderStatus));
  router.get("/users", asyncHandler(controller.listUsers));
  router.get("/stats", asyncHandler(controller.getStats));

  return router;
};
