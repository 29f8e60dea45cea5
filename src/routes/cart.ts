import express from "express";
import { AuthMiddleware } from "../middlewares/auth";
import { asyncHandler } from "../controllers/helpers";
import { createCartController } from "../controllers/cart";

export const createCartRouter = (
  controller: ReturnType<typeof createCartController>,
  { authenticate }: AuthMiddleware
) => {
  const router = express.Router();

  router.use(authenticate);
  router.get("/", asyncHandler(controller.getCart));
  router.delete("/", asyncHandler(controller.clearCart));
  router.post("/items", asyncHandler(controller.addToCart));
  router.put("/items/:productId", asyncHandler(controller.updateCartItem));
  router.delete("/items/:productId", asyncHandler(controller.removeFromCart));

  return router;
};
