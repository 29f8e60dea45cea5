import { beforeEach, describe, expect, it } from "vitest";
import { PaymentService, createPaymentService } from "../src/services/payments";
import { CurrentUser } from "../src/services/types";
import { MemoryStore, createMemoryStore } from "./support/memoryStore";
import {
  FakeGateway,
  WEBHOOK_SECRET,
  asCurrentUser,
  createFakeGateway,
  paymentLinkEvent,
  sign,
} from "./support/fixtures";

const options = {
  webhookSecret: WEBHOOK_SECRET,
  currency: "INR",
  returnUrlTemplate: "http://localhost:5173/orders/{orderId}/payment",
};

describe("payment service", () => {
  let store: MemoryStore;
  let gateway: FakeGateway;
  let payments: PaymentService;
  let customer: CurrentUser;

  beforeEach(() => {
    store = createMemoryStore();
    gateway = createFakeGateway();
    payments = createPaymentService(store, gateway, options);
    customer = asCurrentUser(store.seedUser());
  });

  describe("createCheckoutSession", () => {
    it("opens a session for a pending order and stores its id", async () => {
      const order = store.seedOrder({
        userId: customer.id,
        items: [{ productId: null, name: "Ghee", quantity: 3, priceAtPurchase: 12.35 }],
        totalPrice: 37.05,
      });

      const result = await payments.createCheckoutSession(customer, order.id);

      expect(result).toEqual({
        ok: true,
        value: { checkoutUrl: "https://pay.example.test/1", sessionId: "plink_test_1" },
      });
      expect(gateway.requests).toEqual([
        {
          orderId: order.id,
          currency: "INR",
          amount: 3705,
          lineItems: [{ name: "Ghee", unitAmount: 1235, quantity: 3 }],
          returnUrl: `http://localhost:5173/orders/${order.id}/payment`,
        },
      ]);
      expect(store.order(order.id).paymentSessionId).toBe("plink_test_1");
      expect(store.order(order.id).paymentIntentId).toBeNull();
    });

    it("stores the payment intent when the provider returns one", async () => {
      gateway = createFakeGateway({ paymentIntentId: "pi_test_1" });
      payments = createPaymentService(store, gateway, options);
      const order = store.seedOrder({ userId: customer.id });

      await payments.createCheckoutSession(customer, order.id);

      expect(store.order(order.id).paymentIntentId).toBe("pi_test_1");
    });

    it("refuses paid orders and orders past payment", async () => {
      const paid = store.seedOrder({ userId: customer.id, status: "paid" });
      const shipped = store.seedOrder({ userId: customer.id, status: "cancelled" });

      expect(await payments.createCheckoutSession(customer, paid.id)).toEqual({
        ok: false,
        error: { type: "AlreadyPaid" },
      });
      expect(await payments.createCheckoutSession(customer, shipped.id)).toEqual({
        ok: false,
        error: { type: "OrderNotPayable", status: "cancelled" },
      });
      expect(gateway.requests).toEqual([]);
    });

    it("hides other customers' orders", async () => {
      const owner = store.seedUser();
      const order = store.seedOrder({ userId: owner.id });

      expect(await payments.createCheckoutSession(customer, order.id)).toEqual({
        ok: false,
        error: { type: "OrderNotFound" },
      });
    });

    it("rejects admin accounts", async () => {
      const admin = asCurrentUser(store.seedUser({ role: "admin" }));

      expect(await payments.createCheckoutSession(admin, "d".repeat(24))).toEqual({
        ok: false,
        error: { type: "AdminAccount" },
      });
    });

    it("leaves the order alone when the provider fails", async () => {
      const order = store.seedOrder({ userId: customer.id });
      gateway.failWith(new Error("provider unavailable"));

      await expect(payments.createCheckoutSession(customer, order.id)).rejects.toThrow(
        "provider unavailable"
      );
      expect(store.order(order.id).paymentSessionId).toBeNull();
    });
  });

  describe("handlePaymentNotification", () => {
    it("marks the order paid and acknowledges a replay without changes", async () => {
      const order = store.seedOrder({ userId: customer.id });
      const body = paymentLinkEvent(order.id);

      const first = await payments.handlePaymentNotification(body, sign(body));
      const second = await payments.handlePaymentNotification(body, sign(body));

      expect(first).toEqual({ ok: true, value: { received: true, outcome: "applied" } });
      expect(second).toEqual({ ok: true, value: { received: true, outcome: "unchanged" } });
      expect(store.order(order.id).status).toBe("paid");
      expect(store.order(order.id).paymentIntentId).toBe("pay_test_1");
    });

    it("refuses a bad signature without opening a transaction", async () => {
      const order = store.seedOrder({ userId: customer.id });
      const body = paymentLinkEvent(order.id);
      const writes = store.counters.writes;

      const forged = await payments.handlePaymentNotification(body, "0".repeat(64));
      const unsigned = await payments.handlePaymentNotification(body, undefined);

      expect(forged).toEqual({ ok: false, error: { type: "InvalidSignature" } });
      expect(unsigned).toEqual({ ok: false, error: { type: "InvalidSignature" } });
      expect(store.counters.transactions).toBe(0);
      expect(store.counters.writes).toBe(writes);
      expect(store.order(order.id).status).toBe("pending_payment");
    });

    it("does not move an order that is already past payment", async () => {
      const order = store.seedOrder({ userId: customer.id, status: "shipped" });
      const body = paymentLinkEvent(order.id, { paymentId: "pay_late_1" });

      const result = await payments.handlePaymentNotification(body, sign(body));

      expect(result).toEqual({ ok: true, value: { received: true, outcome: "unchanged" } });
      expect(store.order(order.id).status).toBe("shipped");
      expect(store.order(order.id).paymentIntentId).toBe("pay_late_1");
    });

    it("keeps pending orders pending when the link is not fully paid", async () => {
      const order = store.seedOrder({ userId: customer.id });
      const body = paymentLinkEvent(order.id, { status: "partially_paid", paymentId: null });

      const result = await payments.handlePaymentNotification(body, sign(body));

      expect(result).toEqual({ ok: true, value: { received: true, outcome: "unchanged" } });
      expect(store.order(order.id).status).toBe("pending_payment");
    });

    it("acknowledges other event types without acting on them", async () => {
      const order = store.seedOrder({ userId: customer.id });
      const body = paymentLinkEvent(order.id, { event: "payment_link.cancelled" });

      const result = await payments.handlePaymentNotification(body, sign(body));

      expect(result).toEqual({ ok: true, value: { received: true, outcome: "ignored" } });
      expect(store.order(order.id).status).toBe("pending_payment");
      expect(store.counters.transactions).toBe(0);
    });

    it("acknowledges events without an order id as an anomaly", async () => {
      const body = paymentLinkEvent(null);

      const result = await payments.handlePaymentNotification(body, sign(body));

      expect(result).toEqual({ ok: true, value: { received: true, outcome: "anomaly" } });
      expect(store.counters.transactions).toBe(0);
    });

    it("acknowledges unknown and malformed order ids as an anomaly", async () => {
      for (const orderId of ["e".repeat(24), "order-42"]) {
        const body = paymentLinkEvent(orderId);
        expect(await payments.handlePaymentNotification(body, sign(body))).toEqual({
          ok: true,
          value: { received: true, outcome: "anomaly" },
        });
      }
    });

    it("refuses bodies that are not the expected JSON", async () => {
      const notJson = "payment_link.paid";
      const noLink = JSON.stringify({ event: "payment_link.paid", payload: {} });
      const noEvent = JSON.stringify({ payload: {} });

      expect(await payments.handlePaymentNotification(notJson, sign(notJson))).toEqual({
        ok: false,
        error: { type: "MalformedPayload", reason: "body is not valid JSON" },
      });
      expect(await payments.handlePaymentNotification(noLink, sign(noLink))).toEqual({
        ok: false,
        error: { type: "MalformedPayload", reason: "unexpected payment_link.paid payload" },
      });
      expect(await payments.handlePaymentNotification(noEvent, sign(noEvent))).toEqual({
        ok: false,
        error: { type: "MalformedPayload", reason: "unexpected event envelope" },
      });
    });

    it("lets persistence failures propagate and leaves the order pending", async () => {
      const order = store.seedOrder({ userId: customer.id });
      const body = paymentLinkEvent(order.id);
      store.failNext("orders.update", new Error("write concern timeout"));

      await expect(payments.handlePaymentNotification(body, sign(body))).rejects.toThrow(
        "write concern timeout"
      );
      expect(store.order(order.id).status).toBe("pending_payment");

      expect(await payments.handlePaymentNotification(body, sign(body))).toEqual({
        ok: true,
        value: { received: true, outcome: "applied" },
      });
    });
  });
});
