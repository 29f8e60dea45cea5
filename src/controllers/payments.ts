import { Response } from "express";
import { AuthRequest } from "../middlewares/auth";
import { PaymentService } from "../services/payments";
import { requireUser, unwrap } from "./helpers";

export const SIGNATURE_HEADER = "x-razorpay-signature";

export const createPaymentsController = (paymentService: PaymentService) => {
  const createCheckoutSession = async (req: AuthRequest, res: Response): Promise<void> => {
    const session = unwrap(
      await paymentService.createCheckoutSession(requireUser(req), req.params.orderId)
    );
    res.json({ success: true, ...session });
  };

  // Mounted behind express.raw: the signature covers the exact bytes sent.
  // A request without a body is verified as an empty one, so it fails the
  // signature check like any other unsigned request.
  const handleWebhook = async (req: AuthRequest, res: Response): Promise<void> => {
    const rawBody = Buffer.isBuffer(req.body) ? req.body.toString("utf8") : "";

    const acknowledged = unwrap(
      await paymentService.handlePaymentNotification(rawBody, req.get(SIGNATURE_HEADER))
    );
    res.json({ success: true, ...acknowledged });
  };

  return { createCheckoutSession, handleWebhook };
};
