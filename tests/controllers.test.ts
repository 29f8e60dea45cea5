import bcrypt from "bcryptjs";
import jwt from "jsonwebtoken";
import { beforeEach, describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config/env";
import { createAdminController } from "../src/controllers/admin";
import { createAuthController } from "../src/controllers/auth";
import { createCategoriesController } from "../src/controllers/categories";
import { createPaymentsController } from "../src/controllers/payments";
import { createProductsController } from "../src/controllers/products";
import { DuplicateKeyError } from "../src/repositories/types";
import { createOrderService } from "../src/services/orders";
import { createPaymentService } from "../src/services/payments";
import { BadRequestError, ConflictError, NotFoundError, UnauthorizedError } from "../src/utils/errors";
import { MemoryStore, createMemoryStore } from "./support/memoryStore";
import { WEBHOOK_SECRET, createFakeGateway, paymentLinkEvent, sign } from "./support/fixtures";
import { createRequest, createResponse } from "./support/http";

const config = loadConfig({
  NODE_ENV: "test",
  JWT_SECRET: "test-secret",
  RAZORPAY_WEBHOOK_SECRET: WEBHOOK_SECRET,
});

describe("auth controller", () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = createMemoryStore();
  });

  it("creates the user together with an empty cart", async () => {
    const { signup } = createAuthController(store, config);
    const { res, sent } = createResponse();

    await signup(
      createRequest({
        method: "POST",
        body: { email: " Ana@Example.com ", password: "secret123", name: "Ana" },
      }),
      res
    );

    expect(sent.status).toBe(201);
    const [user] = [...store.tables.users.values()];
    expect(user.email).toBe("ana@example.com");
    expect(user.role).toBe("customer");
    expect(await bcrypt.compare("secret123", user.passwordHash)).toBe(true);
    expect(store.cartOf(user.id).items).toEqual([]);
    expect(sent.body).toMatchObject({ success: true, user: { _id: user.id, name: "Ana" } });
  });

  it("creates neither user nor cart when the cart cannot be written", async () => {
    const { signup } = createAuthController(store, config);
    store.failNext("carts.create");

    await expect(
      signup(
        createRequest({ body: { email: "bo@example.com", password: "secret123", name: "Bo" } }),
        createResponse().res
      )
    ).rejects.toThrow("carts.create failed");
    expect(store.tables.users.size).toBe(0);
  });

  it("refuses a second account for the same email", async () => {
    store.seedUser({ email: "ana@example.com" });
    const { signup } = createAuthController(store, config);

    await expect(
      signup(
        createRequest({ body: { email: "ana@example.com", password: "secret123", name: "Ana" } }),
        createResponse().res
      )
    ).rejects.toEqual(new BadRequestError("User already exists"));
  });

  it("answers a signup that loses the unique-email race like a taken email", async () => {
    const { signup } = createAuthController(store, config);
    store.failNext("users.create", new DuplicateKeyError("email"));

    await expect(
      signup(
        createRequest({ body: { email: "cy@example.com", password: "secret123", name: "Cy" } }),
        createResponse().res
      )
    ).rejects.toEqual(new BadRequestError("User already exists"));
    expect(store.tables.users.size).toBe(0);
    expect(store.tables.carts.size).toBe(0);
  });

  it("rejects invalid signup bodies", async () => {
    const { signup } = createAuthController(store, config);

    await expect(
      signup(createRequest({ body: { email: "ana", password: "x" } }), createResponse().res)
    ).rejects.toBeInstanceOf(ZodError);
  });

  it("logs in with a cookie and a token for the user", async () => {
    const user = store.seedUser({
      email: "ana@example.com",
      passwordHash: bcrypt.hashSync("secret123", 4),
    });
    const { login } = createAuthController(store, config);
    const { res, sent } = createResponse();

    await login(
      createRequest({ body: { email: "ana@example.com", password: "secret123" } }),
      res
    );

    const token = sent.cookies.get("token");
    expect(token).toBeDefined();
    expect(jwt.verify(String(token), "test-secret")).toMatchObject({ userId: user.id });
    expect(sent.body).toMatchObject({ success: true, token, user: { _id: user.id } });
  });

  it("refuses a wrong password", async () => {
    store.seedUser({ email: "ana@example.com", passwordHash: bcrypt.hashSync("secret123", 4) });
    const { login } = createAuthController(store, config);

    await expect(
      login(
        createRequest({ body: { email: "ana@example.com", password: "wrong-pass" } }),
        createResponse().res
      )
    ).rejects.toBeInstanceOf(UnauthorizedError);
  });
});

describe("catalog controllers", () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = createMemoryStore();
  });

  it("deletes a category with its products but keeps order snapshots", async () => {
    const user = store.seedUser();
    const doomed = store.seedCategory("Bakery");
    const kept = store.seedCategory("Dairy");
    const bread = store.seedProduct({ categoryId: doomed.id });
    const milk = store.seedProduct({ categoryId: kept.id });
    const order = store.seedOrder({
      userId: user.id,
      items: [{ productId: bread.id, name: bread.name, quantity: 1, priceAtPurchase: bread.price }],
      totalPrice: bread.price,
    });
    const { deleteCategory } = createCategoriesController(store);
    const { res, sent } = createResponse();

    await deleteCategory(createRequest({ params: { id: doomed.id } }), res);

    expect(sent.body).toEqual({ success: true, message: "Category deleted" });
    expect([...store.tables.categories.keys()]).toEqual([kept.id]);
    expect([...store.tables.products.keys()]).toEqual([milk.id]);
    expect(store.order(order.id).items[0].productId).toBe(bread.id);
  });

  it("reports a missing category on delete", async () => {
    const { deleteCategory } = createCategoriesController(store);

    await expect(
      deleteCategory(createRequest({ params: { id: "a".repeat(24) } }), createResponse().res)
    ).rejects.toEqual(new NotFoundError("Category not found"));
  });

  it("refuses a duplicate SKU", async () => {
    const category = store.seedCategory();
    store.seedProduct({ sku: "MLK-1L", categoryId: category.id });
    const { createProduct } = createProductsController(store);

    await expect(
      createProduct(
        createRequest({
          body: { sku: "mlk-1l", name: "Milk", price: 1.5, categoryId: category.id },
        }),
        createResponse().res
      )
    ).rejects.toEqual(new ConflictError("SKU MLK-1L already exists"));
  });

  it("applies only the fields present in a product update", async () => {
    const category = store.seedCategory();
    const product = store.seedProduct({ name: "Milk", price: 1.5, stock: 8, categoryId: category.id });
    const { updateProduct } = createProductsController(store);
    const { res } = createResponse();

    await updateProduct(createRequest({ params: { id: product.id }, body: { price: 1.75 } }), res);

    expect(store.product(product.id)).toMatchObject({ name: "Milk", price: 1.75, stock: 8 });
  });

  it("answers a product create that loses the unique-SKU race with 409", async () => {
    const category = store.seedCategory("Tea");
    const { createProduct } = createProductsController(store);
    store.failNext("products.create", new DuplicateKeyError("sku"));

    await expect(
      createProduct(
        createRequest({
          body: { sku: "tea-9", name: "Oolong", price: 7.5, categoryId: category.id },
        }),
        createResponse().res
      )
    ).rejects.toEqual(new ConflictError("SKU TEA-9 already exists"));
  });

  it("refuses sub-cent prices", async () => {
    const category = store.seedCategory("Tea");
    const { createProduct } = createProductsController(store);

    await expect(
      createProduct(
        createRequest({
          body: { sku: "TEA-3", name: "Sencha", price: 0.333, categoryId: category.id },
        }),
        createResponse().res
      )
    ).rejects.toBeInstanceOf(ZodError);
    expect(store.tables.products.size).toBe(0);
  });

  it("links new products to an existing category only", async () => {
    const { createProduct } = createProductsController(store);

    await expect(
      createProduct(
        createRequest({
          body: { sku: "EGG-6", name: "Eggs", price: 3, categoryId: "b".repeat(24) },
        }),
        createResponse().res
      )
    ).rejects.toEqual(new NotFoundError("Category not found to link product"));
  });
});

describe("payments controller", () => {
  it("hands the raw body and signature header to the webhook handler", async () => {
    const store = createMemoryStore();
    const user = store.seedUser();
    const order = store.seedOrder({ userId: user.id });
    const controller = createPaymentsController(
      createPaymentService(store, createFakeGateway(), {
        webhookSecret: config.payments.webhookSecret,
        currency: config.payments.currency,
        returnUrlTemplate: config.payments.returnUrlTemplate,
      })
    );
    const body = paymentLinkEvent(order.id);
    const { res, sent } = createResponse();

    await controller.handleWebhook(
      createRequest({
        method: "POST",
        body: Buffer.from(body, "utf8"),
        headers: { "X-Razorpay-Signature": sign(body) },
      }),
      res
    );

    expect(sent.body).toEqual({ success: true, received: true, outcome: "applied" });
    expect(store.order(order.id).status).toBe("paid");
  });

  it("answers a forged webhook with 400", async () => {
    const store = createMemoryStore();
    const controller = createPaymentsController(
      createPaymentService(store, createFakeGateway(), {
        webhookSecret: WEBHOOK_SECRET,
        currency: "INR",
        returnUrlTemplate: "{orderId}",
      })
    );

    await expect(
      controller.handleWebhook(
        createRequest({
          body: Buffer.from(paymentLinkEvent("a".repeat(24))),
          headers: { "x-razorpay-signature": "forged" },
        }),
        createResponse().res
      )
    ).rejects.toEqual(new BadRequestError("Invalid signature"));
  });

  it("checks the signature before anything else when no raw body was parsed", async () => {
    const store = createMemoryStore();
    const controller = createPaymentsController(
      createPaymentService(store, createFakeGateway(), {
        webhookSecret: WEBHOOK_SECRET,
        currency: "INR",
        returnUrlTemplate: "{orderId}",
      })
    );

    await expect(
      controller.handleWebhook(
        createRequest({ method: "POST", headers: { "content-type": "text/plain" } }),
        createResponse().res
      )
    ).rejects.toEqual(new BadRequestError("Invalid signature"));
  });
});

describe("admin controller", () => {
  it("updates an order status", async () => {
    const store = createMemoryStore();
    const order = store.seedOrder({ userId: store.seedUser().id, status: "paid" });
    const { updateOrderStatus } = createAdminController(store, createOrderService(store));
    const { res, sent } = createResponse();

    await updateOrderStatus(
      createRequest({ params: { orderId: order.id }, body: { status: "shipped" } }),
      res
    );

    expect(sent.body).toMatchObject({ success: true, order: { id: order.id, status: "shipped" } });
  });

  it("answers an unknown status with 400 and leaves the order as it was", async () => {
    const store = createMemoryStore();
    const order = store.seedOrder({ userId: store.seedUser().id, status: "paid" });
    const { updateOrderStatus } = createAdminController(store, createOrderService(store));

    const rejection = updateOrderStatus(
      createRequest({ params: { orderId: order.id }, body: { status: "lost" } }),
      createResponse().res
    );

    await expect(rejection).rejects.toMatchObject({ statusCode: 400 });
    expect(store.order(order.id).status).toBe("paid");
  });

  it("lists customers without their password hashes", async () => {
    const store = createMemoryStore();
    const customer = store.seedUser({ name: "Ana" });
    store.seedUser({ role: "admin" });
    const { listUsers } = createAdminController(store, createOrderService(store));
    const { res, sent } = createResponse();

    await listUsers(createRequest(), res);

    expect(sent.body).toEqual({
      success: true,
      users: [
        {
          _id: customer.id,
          email: customer.email,
          name: "Ana",
          phone: null,
          createdAt: customer.createdAt,
        },
      ],
    });
  });
});
