import { INITIAL_ORDER_STATUS } from "../models/orderStatus";
import { OrderItemRecord, OrderRecord, Store } from "../repositories/types";
import { logger } from "../utils/logger";
import { roundToMinorUnits, sumLines } from "../utils/money";
import { Result, err, ok } from "../utils/result";
import { AdminAccount, EmptyCart, InsufficientStock } from "./errors";
import { reserveAndDecrement } from "./inventory";
import { CurrentUser, isAdmin } from "./types";
import { OrderView, buildOrderView } from "./views";

export type CreateOrderError = AdminAccount | EmptyCart | InsufficientStock;

// EmptyCart as seen inside the transaction: also says which lines point at
// deleted products, so they can be pruned once the transaction is undone.
interface NothingToOrder {
  type: "EmptyCart";
  cartId: string | null;
  vanishedProductIds: string[];
}

const byId = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Converts a customer's cart into an order in a single transaction.
 *
 * Products are locked and decremented in ascending id order so concurrent
 * checkouts sharing products cannot deadlock. Lines whose product has been
 * deleted are skipped; any line short on stock aborts the whole checkout
 * and rolls back every decrement made so far.
 */
export const createOrderAssembler = (store: Store) => {
  async function createOrderFromCart(
    user: CurrentUser
  ): Promise<Result<OrderView, CreateOrderError>> {
    if (isAdmin(user)) {
      return err({ type: "AdminAccount" });
    }

    const assembled = await store.transaction<OrderRecord, NothingToOrder | InsufficientStock>(
      async (uow) => {
        const cart = await uow.carts.findByUserId(user.id);
        if (!cart || cart.items.length === 0) {
          return err({ type: "EmptyCart", cartId: cart?.id ?? null, vanishedProductIds: [] });
        }

        const lines = [...cart.items].sort((a, b) => byId(a.productId, b.productId));
        const items: OrderItemRecord[] = [];
        const vanishedProductIds: string[] = [];

        for (const line of lines) {
          const reserved = await reserveAndDecrement(uow, line.productId, line.quantity);
          if (!reserved.ok) {
            if (reserved.error.type === "ProductVanished") {
              vanishedProductIds.push(line.productId);
              continue;
            }
            return err(reserved.error);
          }

          const product = reserved.value;
          items.push({
            productId: product.id,
            name: product.name,
            quantity: line.quantity,
            priceAtPurchase: roundToMinorUnits(product.price),
          });
        }

        if (items.length === 0) {
          return err({ type: "EmptyCart", cartId: cart.id, vanishedProductIds });
        }

        const order = await uow.orders.create({
          userId: user.id,
          items,
          totalPrice: sumLines(
            items.map((item) => ({ price: item.priceAtPurchase, quantity: item.quantity }))
          ),
          status: INITIAL_ORDER_STATUS,
        });

        // Only the converted lines; dangling ones stay until they are pruned.
        await uow.carts.removeItems(
          cart.id,
          items.flatMap((item) => (item.productId ? [item.productId] : []))
        );

        return ok(order);
      }
    );

    if (!assembled.ok) {
      const failure = assembled.error;
      if (failure.type === "InsufficientStock") {
        logger.info("checkout.insufficient_stock", {
          userId: user.id,
          productId: failure.productId,
          requested: failure.requested,
          available: failure.available,
        });
        return err(failure);
      }

      if (failure.cartId !== null && failure.vanishedProductIds.length > 0) {
        await pruneVanishedLines(failure.cartId, failure.vanishedProductIds);
      }
      return err({ type: "EmptyCart" });
    }

    const order = assembled.value;
    logger.info("checkout.order_created", {
      userId: user.id,
      orderId: order.id,
      totalPrice: order.totalPrice,
      items: order.items.length,
    });
    return ok(await buildOrderView(store.repositories, order));
  }

  // Lines for deleted products can never be fulfilled.
  async function pruneVanishedLines(cartId: string, productIds: string[]): Promise<void> {
    await store.transaction<null, never>(async (uow) => {
      await uow.carts.removeItems(cartId, productIds);
      return ok(null);
    });
    logger.info("checkout.pruned_vanished_lines", { cartId, productIds });
  }

  return { createOrderFromCart };
};

export type OrderAssembler = ReturnType<typeof createOrderAssembler>;
