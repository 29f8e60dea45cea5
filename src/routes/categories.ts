import express from "express";
import { AuthMiddleware } from "../middlewares/auth";
import { asyncHandler } from "../controllers/helpers";
import { createCategoriesController } from "../controllers/categories";

export const createCategoriesRouter = (
  controller: ReturnType<typeof createCategoriesController>,
  { authenticate, authorize }: AuthMiddleware
) => {
  const router = express.Router();

  router.get("/", asyncHandler(controller.getCategories));
  router.get("/:id", asyncHandler(controller.getCategory));
  router.post("/", authenticate, authorize("admin"), asyncHandler(controller.createCategory));
  router.put("/:id", authenticate, authorize("admin"), asyncHandler(controller.updateCategory));
  router.delete("/:id", authenticate, authorize("admin"), asyncHandler(controller.deleteCategory));

  return router;
};
