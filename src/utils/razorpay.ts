import Razorpay from "razorpay";
import {
  CheckoutSession,
  CheckoutSessionRequest,
  PaymentGateway,
} from "../services/paymentGateway";

export interface RazorpayCredentials {
  keyId: string;
  keySecret: string;
}

const describeLineItems = (request: CheckoutSessionRequest): string =>
  request.lineItems
    .map((item) => `${item.quantity} x ${item.name}`)
    .join(", ")
    .slice(0, 2048);

/**
 * Hosted checkout through Razorpay payment links. The order id travels in
 * the link's notes and comes back in the `payment_link.paid` webhook.
 */
export const createRazorpayGateway = ({ keyId, keySecret }: RazorpayCredentials): PaymentGateway => {
  const razorpay = new Razorpay({
    key_id: keyId,
    key_secret: keySecret,
  });

  return {
    async createCheckoutSession(request: CheckoutSessionRequest): Promise<CheckoutSession> {
      const link = await razorpay.paymentLink.create({
        amount: request.amount,
        currency: request.currency,
        description: describeLineItems(request),
        notes: { order_id: request.orderId },
        callback_url: request.returnUrl,
        callback_method: "get",
      });

      // The payment id is only known once the customer pays.
      return { sessionId: link.id, url: link.short_url, paymentIntentId: null };
    },
  };
};
