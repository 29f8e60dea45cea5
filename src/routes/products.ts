import express from "express";
import { AuthMiddleware } from "../middlewares/auth";
import { asyncHandler } from "../controllers/helpers";
import { createProductsController } from "../controllers/products";

export const createProductsRouter = (
  controller: ReturnType<typeof createProductsController>,
  { authenticate, authorize }: AuthMiddleware
) => {
  const router = express.Router();

  router.get("/", asyncHandler(controller.getProducts));
  router.get("/:id", asyncHandler(controller.getProduct));
  router.post("/", authenticate, authorize("admin"), asyncHandler(controller.createProduct));
  router.patch("/:id", authenticate, authorize("admin"), asyncHandler(controller.updateProduct));
  router.delete("/:id", authenticate, authorize("admin"), asyncHandler(controller.deleteProduct));

  return router;
};
