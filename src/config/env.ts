import dotenv from "dotenv";
import { ConfigError } from "../utils/errors";

export interface AppConfig {
  port: number;
  nodeEnv: string;
  mongo: {
    uri: string;
    dbName: string;
  };
  jwt: {
    secret: string;
    expiresInSeconds: number;
  };
  frontendUrl: string;
  payments: {
    keyId: string;
    keySecret: string;
    webhookSecret: string;
    currency: string;
    returnUrlTemplate: string;
  };
  transactionRetryWindowMs: number;
}

type Env = Record<string, string | undefined>;

const readInt = (env: Env, name: string, fallback: number): number => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
};

const readString = (env: Env, name: string, fallback: string): string => {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
};

export function loadConfig(env: Env = process.env): AppConfig {
  const nodeEnv = readString(env, "NODE_ENV", "development");
  const frontendUrl = readString(env, "FRONTEND_URL", "http://localhost:5173");

  const config: AppConfig = {
    port: readInt(env, "PORT", 5000),
    nodeEnv,
    mongo: {
      uri: readString(env, "MONGODB_URI", "mongodb://localhost:27017/?replicaSet=rs0"),
      dbName: readString(env, "MONGODB_DB_NAME", "storefront"),
    },
    jwt: {
      secret: readString(env, "JWT_SECRET", ""),
      expiresInSeconds: readInt(env, "JWT_EXPIRES_IN_SECONDS", 7 * 24 * 60 * 60),
    },
    frontendUrl,
    payments: {
      keyId: readString(env, "RAZORPAY_KEY_ID", ""),
      keySecret: readString(env, "RAZORPAY_KEY_SECRET", ""),
      webhookSecret: readString(env, "RAZORPAY_WEBHOOK_SECRET", ""),
      currency: readString(env, "PAYMENT_CURRENCY", "INR"),
      returnUrlTemplate: readString(
        env,
        "PAYMENT_RETURN_URL",
        `${frontendUrl}/orders/{orderId}/payment`
      ),
    },
    transactionRetryWindowMs: readInt(env, "TX_RETRY_WINDOW_MS", 30000),
  };

  if (nodeEnv === "production") {
    const missing = [
      ["JWT_SECRET", config.jwt.secret],
      ["RAZORPAY_KEY_ID", config.payments.keyId],
      ["RAZORPAY_KEY_SECRET", config.payments.keySecret],
      ["RAZORPAY_WEBHOOK_SECRET", config.payments.webhookSecret],
    ]
      .filter(([, value]) => value === "")
      .map(([name]) => name);
    if (missing.length > 0) {
      throw new ConfigError(`Missing required environment variables: ${missing.join(", ")}`);
    }
  } else if (config.jwt.secret === "") {
    config.jwt.secret = "development-secret";
  }

  return config;
}

// Reads .env into process.env; values already set in the environment win.
export const loadEnvFile = (): void => {
  dotenv.config();
};
