export const ORDER_STATUSES = [
  "pending_payment",
  "paid",
  "shipped",
  "delivered",
  "cancelled",
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const INITIAL_ORDER_STATUS: OrderStatus = "pending_payment";

// Payment status value the provider reports for a settled payment link.
export const PROVIDER_PAID_STATUS = "paid";

export const isOrderStatus = (value: unknown): value is OrderStatus =>
  ORDER_STATUSES.some((status) => status === value);

/**
 * Status an order moves to when the payment provider reports
 * `reportedPaymentStatus` for it.
 *
 * Only `pending_payment -> paid` is a transition; every other pair keeps
 * the current status, so replayed or late notifications are no-ops.
 */
export const reconcileOrderStatus = (
  current: OrderStatus,
  reportedPaymentStatus: string
): OrderStatus =>
  current === "pending_payment" && reportedPaymentStatus === PROVIDER_PAID_STATUS
    ? "paid"
    : current;
