import { Connection } from "mongoose";
import { createModels } from "../../models";
import { describeError, logger } from "../../utils/logger";
import { Result } from "../../utils/result";
import { Store, TransactionWork, UnitOfWork } from "../types";
import { createCartRepository } from "./cartRepository";
import { createCategoryRepository } from "./categoryRepository";
import { createOrderRepository } from "./orderRepository";
import { createProductRepository } from "./productRepository";
import { SessionRef, isTransientTransactionError, isUnknownCommitResult } from "./session";
import { createUserRepository } from "./userRepository";

export interface RetryPolicy {
  /** How long a transaction keeps retrying after its first attempt started. */
  windowMs: number;
  /** Backoff before the second attempt; doubles per attempt up to `maxDelayMs`. */
  baseDelayMs: number;
  maxDelayMs: number;
}

/** The part of a driver `ClientSession` the transaction runner drives. */
export interface TransactionSession {
  startTransaction(): void;
  commitTransaction(): Promise<unknown>;
  abortTransaction(): Promise<unknown>;
  inTransaction(): boolean;
  endSession(): Promise<void>;
}

export interface MongoStoreOptions {
  retryWindowMs: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

const backoffDelay = (policy: RetryPolicy, attempt: number, deadline: number): number => {
  const ceiling = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  // Jitter keeps two losers of the same conflict from retrying in lockstep.
  const delay = Math.round(ceiling * (0.5 + Math.random() / 2));
  return Math.max(0, Math.min(delay, deadline - Date.now()));
};

const commitWithRetry = async (session: TransactionSession, deadline: number): Promise<void> => {
  for (;;) {
    try {
      await session.commitTransaction();
      return;
    } catch (error) {
      if (isUnknownCommitResult(error) && Date.now() < deadline) {
        logger.warn("db.transaction.commit_retry", describeError(error));
        continue;
      }
      throw error;
    }
  }
};

/**
 * Runs `body` in a transaction on a fresh session, committing on `ok` and
 * aborting on `err` or a throw.
 *
 * MongoDB does not queue writers: the second transaction to write a document
 * fails at once with a `TransientTransactionError`. Such attempts are rerun
 * with backoff until the holder has committed or `windowMs` runs out, so a
 * rerun sees the committed state.
 */
export async function runTransaction<S extends TransactionSession, T, E>(
  openSession: () => Promise<S>,
  body: (session: S) => Promise<Result<T, E>>,
  policy: RetryPolicy
): Promise<Result<T, E>> {
  const deadline = Date.now() + policy.windowMs;

  for (let attempt = 1; ; attempt++) {
    const session = await openSession();
    let retry = false;
    try {
      session.startTransaction();
      const result = await body(session);
      if (result.ok) {
        await commitWithRetry(session, deadline);
      } else {
        await session.abortTransaction();
      }
      return result;
    } catch (error) {
      if (session.inTransaction()) {
        await session.abortTransaction().catch((abortError: unknown) => {
          logger.error("db.transaction.abort_failed", describeError(abortError));
        });
      }
      if (!isTransientTransactionError(error) || Date.now() >= deadline) {
        throw error;
      }
      logger.warn("db.transaction.retry", { attempt, ...describeError(error) });
      retry = true;
    } finally {
      await session.endSession();
    }

    if (retry) {
      await sleep(backoffDelay(policy, attempt, deadline));
    }
  }
}

export const createMongoStore = (
  connection: Connection,
  { retryWindowMs, retryBaseDelayMs = 10, retryMaxDelayMs = 500 }: MongoStoreOptions
): Store => {
  const models = createModels(connection);
  const policy: RetryPolicy = {
    windowMs: retryWindowMs,
    baseDelayMs: retryBaseDelayMs,
    maxDelayMs: retryMaxDelayMs,
  };

  const bind = (session: SessionRef): UnitOfWork => ({
    users: createUserRepository(models, session),
    categories: createCategoryRepository(models, session),
    products: createProductRepository(models, session),
    carts: createCartRepository(models, session),
    orders: createOrderRepository(models, session),
  });

  return {
    repositories: bind(null),

    transaction<T, E>(work: TransactionWork<T, E>): Promise<Result<T, E>> {
      return runTransaction(
        () => connection.startSession(),
        (session) => work(bind(session)),
        policy
      );
    },
  };
};
