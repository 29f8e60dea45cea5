import crypto from "crypto";

// Razorpay signs the raw request body with HMAC-SHA256 (hex) using the
// webhook secret configured in its dashboard.
export const signWebhookBody = (rawBody: string, secret: string): string =>
  crypto.createHmac("sha256", secret).update(rawBody).digest("hex");

export const verifyWebhookSignature = (
  rawBody: string,
  signature: string | undefined,
  secret: string
): boolean => {
  if (!signature || !secret) {
    return false;
  }
  const expected = Buffer.from(signWebhookBody(rawBody, secret), "utf8");
  const received = Buffer.from(signature, "utf8");
  return expected.length === received.length && crypto.timingSafeEqual(expected, received);
};
