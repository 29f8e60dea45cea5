import express from "express";
import { AuthMiddleware } from "../middlewares/auth";
import { asyncHandler } from "../controllers/helpers";
import { createAuthController } from "../controllers/auth";

export const createAuthRouter = (
  controller: ReturnType<typeof createAuthController>,
  { authenticate }: AuthMiddleware
) => {
  const router = express.Router();

  router.post("/signup", asyncHandler(controller.signup));
  router.post("/login", asyncHandler(controller.login));
  router.post("/logout", asyncHandler(controller.logout));
  router.get("/me", authenticate, asyncHandler(controller.getMe));

  return router;
};
