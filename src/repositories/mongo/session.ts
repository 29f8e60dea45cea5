import mongoose from "mongoose";
import { DuplicateKeyError } from "../types";

export type ClientSession = mongoose.mongo.ClientSession;

// null when the repository runs outside a transaction.
export type SessionRef = ClientSession | null;

const OBJECT_ID_RE = /^[0-9a-f]{24}$/i;

// Ids arriving from URLs and webhooks are untrusted; anything that is not a
// 24-char hex string cannot name a document.
export const isObjectId = (id: string): boolean => OBJECT_ID_RE.test(id);

export const toObjectId = (id: string): mongoose.Types.ObjectId =>
  new mongoose.Types.ObjectId(id);

export const isTransientTransactionError = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoError &&
  error.hasErrorLabel("TransientTransactionError");

export const isUnknownCommitResult = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoError &&
  error.hasErrorLabel("UnknownTransactionCommitResult");

const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoServerError && error.code === 11000;

// For `.catch` on a write to a uniquely indexed field.
export const rethrowDuplicateKey =
  (field: string) =>
  (error: unknown): never => {
    if (isDuplicateKeyError(error)) {
      throw new DuplicateKeyError(field);
    }
    throw error;
  };
