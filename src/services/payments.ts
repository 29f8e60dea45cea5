import { reconcileOrderStatus } from "../models/orderStatus";
import { OrderPatch, Store } from "../repositories/types";
import { describeError, logger } from "../utils/logger";
import { toMinorUnits } from "../utils/money";
import { Result, err, ok } from "../utils/result";
import { verifyWebhookSignature } from "../utils/webhookSignature";
import {
  PaymentLinkPaidPayload,
  paymentLinkPaidPayloadSchema,
  webhookEnvelopeSchema,
} from "../validation/schemas";
import {
  AdminAccount,
  AlreadyPaid,
  InvalidSignature,
  MalformedPayload,
  OrderNotFound,
  OrderNotPayable,
} from "./errors";
import { PaymentGateway } from "./paymentGateway";
import { CurrentUser, isAdmin } from "./types";

export const PAYMENT_LINK_PAID_EVENT = "payment_link.paid";

export interface PaymentServiceOptions {
  webhookSecret: string;
  currency: string;
  /** `{orderId}` is replaced with the order id. */
  returnUrlTemplate: string;
}

export interface CheckoutSessionResult {
  checkoutUrl: string;
  sessionId: string;
}

/**
 * - applied: the order moved to `paid`
 * - unchanged: order found, status kept (replay, or already past payment)
 * - ignored: event type this service does not act on
 * - anomaly: nothing to apply it to (no order id, unknown order)
 */
export type WebhookOutcome = "applied" | "unchanged" | "ignored" | "anomaly";

export interface WebhookAck {
  received: true;
  outcome: WebhookOutcome;
}

const ack = (outcome: WebhookOutcome): WebhookAck => ({ received: true, outcome });

const malformed = (reason: string): MalformedPayload => ({ type: "MalformedPayload", reason });

const readOrderId = (notes: PaymentLinkPaidPayload["payment_link"]["entity"]["notes"]) => {
  if (!notes || Array.isArray(notes)) {
    return null;
  }
  const value = notes.order_id;
  if (value === undefined) {
    return null;
  }
  const orderId = String(value).trim();
  return orderId.length > 0 ? orderId : null;
};

export const createPaymentService = (
  store: Store,
  gateway: PaymentGateway,
  options: PaymentServiceOptions
) => {
  const uow = store.repositories;

  async function createCheckoutSession(
    user: CurrentUser,
    orderId: string
  ): Promise<
    Result<CheckoutSessionResult, AdminAccount | OrderNotFound | AlreadyPaid | OrderNotPayable>
  > {
    if (isAdmin(user)) {
      return err({ type: "AdminAccount" });
    }

    const order = await uow.orders.findById(orderId);
    if (!order || order.userId !== user.id) {
      return err({ type: "OrderNotFound" });
    }
    if (order.status === "paid") {
      return err({ type: "AlreadyPaid" });
    }
    if (order.status !== "pending_payment") {
      return err({ type: "OrderNotPayable", status: order.status });
    }

    const session = await gateway.createCheckoutSession({
      orderId: order.id,
      currency: options.currency,
      amount: toMinorUnits(order.totalPrice),
      lineItems: order.items.map((item) => ({
        name: item.name,
        unitAmount: toMinorUnits(item.priceAtPurchase),
        quantity: item.quantity,
      })),
      returnUrl: options.returnUrlTemplate.replace("{orderId}", encodeURIComponent(order.id)),
    });

    const stored = await store.transaction<null, OrderNotFound>(async (tx) => {
      const locked = await tx.orders.findByIdForUpdate(order.id);
      if (!locked) {
        return err({ type: "OrderNotFound" });
      }
      const patch: OrderPatch = { paymentSessionId: session.sessionId };
      if (session.paymentIntentId) {
        patch.paymentIntentId = session.paymentIntentId;
      }
      await tx.orders.update(locked.id, patch);
      return ok(null);
    });
    if (!stored.ok) {
      return stored;
    }

    logger.info("payment.checkout_session_created", {
      orderId: order.id,
      sessionId: session.sessionId,
    });
    return ok({ checkoutUrl: session.url, sessionId: session.sessionId });
  }

  /**
   * Applies a payment provider notification to its order.
   *
   * Only a bad signature or an unparseable body is refused. Anything that
   * cannot be acted on (other event types, missing or unknown order) is
   * acknowledged so the provider stops redelivering it. Store errors are
   * thrown, which makes the provider retry.
   */
  async function handlePaymentNotification(
    rawBody: string,
    signature: string | undefined
  ): Promise<Result<WebhookAck, InvalidSignature | MalformedPayload>> {
    if (!verifyWebhookSignature(rawBody, signature, options.webhookSecret)) {
      logger.warn("payment.webhook.invalid_signature");
      return err({ type: "InvalidSignature" });
    }

    let body: unknown;
    try {
      body = JSON.parse(rawBody);
    } catch (error) {
      logger.warn("payment.webhook.malformed", describeError(error));
      return err(malformed("body is not valid JSON"));
    }

    const envelope = webhookEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      logger.warn("payment.webhook.malformed", { issues: envelope.error.issues });
      return err(malformed("unexpected event envelope"));
    }

    const { event, payload } = envelope.data;
    if (event !== PAYMENT_LINK_PAID_EVENT) {
      logger.info("payment.webhook.ignored", { event });
      return ok(ack("ignored"));
    }

    const parsed = paymentLinkPaidPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      logger.warn("payment.webhook.malformed", { event, issues: parsed.error.issues });
      return err(malformed(`unexpected ${event} payload`));
    }

    const link = parsed.data.payment_link.entity;
    const paymentIntentId = parsed.data.payment?.entity.id ?? null;
    const orderId = readOrderId(link.notes);
    if (!orderId) {
      logger.error("payment.webhook.missing_order_id", { event, paymentLinkId: link.id });
      return ok(ack("anomaly"));
    }

    const applied = await store.transaction<WebhookOutcome, never>(async (tx) => {
      const order = await tx.orders.findByIdForUpdate(orderId);
      if (!order) {
        return ok<WebhookOutcome>("anomaly");
      }

      const status = reconcileOrderStatus(order.status, link.status);
      const patch: OrderPatch = {};
      if (status !== order.status) {
        patch.status = status;
      }
      if (paymentIntentId && paymentIntentId !== order.paymentIntentId) {
        patch.paymentIntentId = paymentIntentId;
      }
      if (patch.status !== undefined || patch.paymentIntentId !== undefined) {
        await tx.orders.update(order.id, patch);
      }
      return ok<WebhookOutcome>(status !== order.status ? "applied" : "unchanged");
    });

    const outcome = applied.ok ? applied.value : "anomaly";
    if (outcome === "anomaly") {
      logger.warn("payment.webhook.unknown_order", { orderId, paymentLinkId: link.id });
    } else {
      logger.info("payment.webhook.processed", {
        orderId,
        outcome,
        paymentStatus: link.status,
        paymentIntentId,
      });
    }
    return ok(ack(outcome));
  }

  return { createCheckoutSession, handlePaymentNotification };
};

export type PaymentService = ReturnType<typeof createPaymentService>;
