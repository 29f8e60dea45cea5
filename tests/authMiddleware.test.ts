import jwt from "jsonwebtoken";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../src/config/env";
import { createAuthMiddleware } from "../src/middlewares/auth";
import { MemoryStore, createMemoryStore } from "./support/memoryStore";
import { createRequest, createResponse } from "./support/http";

const config = loadConfig({ NODE_ENV: "test", JWT_SECRET: "test-secret" });

describe("auth middleware", () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = createMemoryStore();
  });

  const tokenFor = (userId: string, secret = "test-secret") => jwt.sign({ userId }, secret);

  it("resolves a bearer token to the current user", async () => {
    const user = store.seedUser({ email: "ana@example.com" });
    const { authenticate } = createAuthMiddleware(store, config);
    const req = createRequest({ headers: { Authorization: `Bearer ${tokenFor(user.id)}` } });
    const { res } = createResponse();
    const next = vi.fn();

    await authenticate(req, res, next);

    expect(next).toHaveBeenCalledWith();
    expect(req.user).toEqual({ id: user.id, email: "ana@example.com", role: "customer" });
  });

  it("reads the token from the cookie", async () => {
    const user = store.seedUser();
    const { authenticate } = createAuthMiddleware(store, config);
    const req = createRequest({ cookies: { token: tokenFor(user.id) } });
    const next = vi.fn();

    await authenticate(req, createResponse().res, next);

    expect(req.user?.id).toBe(user.id);
  });

  it("answers 401 without a token", async () => {
    const { authenticate } = createAuthMiddleware(store, config);
    const { res, sent } = createResponse();
    const next = vi.fn();

    await authenticate(createRequest(), res, next);

    expect(sent.status).toBe(401);
    expect(sent.body).toEqual({ success: false, error: "Authentication required" });
    expect(next).not.toHaveBeenCalled();
  });

  it("answers 401 for a token signed with another secret", async () => {
    const user = store.seedUser();
    const { authenticate } = createAuthMiddleware(store, config);
    const { res, sent } = createResponse();

    await authenticate(
      createRequest({ headers: { authorization: `Bearer ${tokenFor(user.id, "other-secret")}` } }),
      res,
      vi.fn()
    );

    expect(sent.status).toBe(401);
    expect(sent.body).toEqual({ success: false, error: "Invalid token" });
  });

  it("answers 401 when the user no longer exists", async () => {
    const { authenticate } = createAuthMiddleware(store, config);
    const { res, sent } = createResponse();

    await authenticate(
      createRequest({ headers: { authorization: `Bearer ${tokenFor("f".repeat(24))}` } }),
      res,
      vi.fn()
    );

    expect(sent.status).toBe(401);
    expect(sent.body).toEqual({ success: false, error: "User not found" });
  });

  it("lets only the listed roles through", () => {
    const { authorize } = createAuthMiddleware(store, config);
    const adminOnly = authorize("admin");
    const customer = createRequest();
    customer.user = { id: "u1", email: "c@example.com", role: "customer" };
    const admin = createRequest();
    admin.user = { id: "u2", email: "a@example.com", role: "admin" };
    const denied = createResponse();
    const next = vi.fn();

    adminOnly(customer, denied.res, next);
    adminOnly(admin, createResponse().res, next);

    expect(denied.sent.status).toBe(403);
    expect(next).toHaveBeenCalledTimes(1);
  });
});
