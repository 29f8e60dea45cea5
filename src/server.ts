import { createApp } from "./app";
import connectDB from "./config/database";
import { loadConfig, loadEnvFile } from "./config/env";
import { createMongoStore } from "./repositories/mongo/store";
import { logger } from "./utils/logger";
import { createRazorpayGateway } from "./utils/razorpay";

loadEnvFile();

// Start server after the database connection is established
const startServer = async (): Promise<void> => {
  const config = loadConfig();
  const connection = await connectDB(config);

  const store = createMongoStore(connection, {
    retryWindowMs: config.transactionRetryWindowMs,
  });
  const gateway = createRazorpayGateway({
    keyId: config.payments.keyId,
    keySecret: config.payments.keySecret,
  });

  const app = createApp({ config, store, gateway });
  app.listen(config.port, () => {
    console.log(`🚀 Server running on port ${config.port}`);
    logger.info("server.started", { port: config.port, env: config.nodeEnv });
  });
};

startServer().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
