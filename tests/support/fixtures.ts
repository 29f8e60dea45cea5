import { UserRecord } from "../../src/repositories/types";
import {
  CheckoutSession,
  CheckoutSessionRequest,
  PaymentGateway,
} from "../../src/services/paymentGateway";
import { CurrentUser } from "../../src/services/types";
import { signWebhookBody } from "../../src/utils/webhookSignature";

export const WEBHOOK_SECRET = "test-secret";

export const asCurrentUser = ({ id, email, role }: UserRecord): CurrentUser => ({
  id,
  email,
  role,
});

export interface FakeGateway extends PaymentGateway {
  requests: CheckoutSessionRequest[];
  failWith(error: Error): void;
}

export const createFakeGateway = (
  session: Partial<CheckoutSession> = {}
): FakeGateway => {
  const requests: CheckoutSessionRequest[] = [];
  let failure: Error | null = null;

  return {
    requests,
    failWith(error) {
      failure = error;
    },
    async createCheckoutSession(request) {
      if (failure) {
        throw failure;
      }
      requests.push(request);
      return {
        sessionId: session.sessionId ?? `plink_test_${requests.length}`,
        url: session.url ?? `https://pay.example.test/${requests.length}`,
        paymentIntentId: session.paymentIntentId ?? null,
      };
    },
  };
};

export interface PaymentLinkEventOptions {
  event?: string;
  status?: string;
  paymentId?: string | null;
}

export const paymentLinkEvent = (
  orderId: string | null,
  { event = "payment_link.paid", status = "paid", paymentId = "pay_test_1" }: PaymentLinkEventOptions = {}
): string =>
  JSON.stringify({
    entity: "event",
    event,
    payload: {
      payment_link: {
        entity: {
          id: "plink_test_1",
          status,
          notes: orderId === null ? [] : { order_id: orderId },
        },
      },
      ...(paymentId === null ? {} : { payment: { entity: { id: paymentId, status: "captured" } } }),
    },
  });

export const sign = (rawBody: string): string => signWebhookBody(rawBody, WEBHOOK_SECRET);
