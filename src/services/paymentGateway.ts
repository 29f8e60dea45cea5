export interface CheckoutLineItem {
  name: string;
  /** Unit price in minor units (paise). */
  unitAmount: number;
  quantity: number;
}

export interface CheckoutSessionRequest {
  orderId: string;
  currency: string;
  /** Order total in minor units; equals the sum of the line items. */
  amount: number;
  lineItems: CheckoutLineItem[];
  returnUrl: string;
}

export interface CheckoutSession {
  sessionId: string;
  url: string;
  /** Some providers only assign a payment id once the customer pays. */
  paymentIntentId: string | null;
}

/** Outbound side of the payment provider: hosted checkout creation. */
export interface PaymentGateway {
  createCheckoutSession(request: CheckoutSessionRequest): Promise<CheckoutSession>;
}
