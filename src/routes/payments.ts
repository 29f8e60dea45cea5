import express from "express";
import { AuthMiddleware } from "../middlewares/auth";
import { asyncHandler } from "../controllers/helpers";
import { createPaymentsController } from "../controllers/payments";

export const createPaymentsRouter = (
  controller: ReturnType<typeof createPaymentsController>,
  { authenticate }: AuthMiddleware
) => {
  const router = express.Router();

  router.post(
    "/webhook",
    express.raw({ type: "*/*" }),
    asyncHandler(controller.handleWebhook)
  );
  router.post("/checkout/:orderId", authenticate, asyncHandler(controller.createCheckoutSession));

  return router;
};
