import { OrderStatus, isOrderStatus } from "../models/orderStatus";
import { OrderRecord, PageQuery, Store } from "../repositories/types";
import { logger } from "../utils/logger";
import { fromMinorUnits, toMinorUnits } from "../utils/money";
import { Result, err, ok } from "../utils/result";
import { AdminAccount, InvalidStatus, OrderNotFound } from "./errors";
import { CurrentUser, isAdmin } from "./types";
import { OrderView, buildOrderView, buildOrderViews } from "./views";

export interface DashboardStats {
  totalSales: number;
  totalOrders: number;
  totalUsers: number;
  totalProducts: number;
}

const ORDER_NOT_FOUND: OrderNotFound = { type: "OrderNotFound" };

export const createOrderService = (store: Store) => {
  const uow = store.repositories;

  async function listForUser(user: CurrentUser): Promise<Result<OrderView[], AdminAccount>> {
    if (isAdmin(user)) {
      return err({ type: "AdminAccount" });
    }
    const orders = await uow.orders.findByUser(user.id);
    return ok(await buildOrderViews(uow, orders));
  }

  // Another customer's order answers exactly like a missing one.
  async function getForUser(
    user: CurrentUser,
    orderId: string
  ): Promise<Result<OrderView, OrderNotFound>> {
    const order = await uow.orders.findById(orderId);
    if (!order || order.userId !== user.id) {
      return err(ORDER_NOT_FOUND);
    }
    return ok(await buildOrderView(uow, order));
  }

  async function listAll(page: PageQuery): Promise<OrderView[]> {
    return buildOrderViews(uow, await uow.orders.list(page));
  }

  /**
   * Administrative override: any of the known statuses may be set from any
   * state. Unknown values are refused before the order is even read.
   */
  async function updateStatus(
    orderId: string,
    target: string
  ): Promise<Result<OrderView, OrderNotFound | InvalidStatus>> {
    if (!isOrderStatus(target)) {
      return err({ type: "InvalidStatus", value: target });
    }
    const status: OrderStatus = target;

    const updated = await store.transaction<OrderRecord, OrderNotFound>(async (tx) => {
      const order = await tx.orders.findByIdForUpdate(orderId);
      if (!order) {
        return err(ORDER_NOT_FOUND);
      }
      const saved = await tx.orders.update(order.id, { status });
      if (!saved) {
        return err(ORDER_NOT_FOUND);
      }
      logger.info("order.status_updated", { orderId, from: order.status, to: status });
      return ok(saved);
    });

    if (!updated.ok) {
      return updated;
    }
    return ok(await buildOrderView(uow, updated.value));
  }

  async function getDashboardStats(): Promise<DashboardStats> {
    const [totalSales, totalOrders, totalUsers, totalProducts] = await Promise.all([
      uow.orders.totalPaidSales(),
      uow.orders.count(),
      uow.users.countCustomers(),
      uow.products.count(),
    ]);
    return {
      totalSales: fromMinorUnits(toMinorUnits(totalSales)),
      totalOrders,
      totalUsers,
      totalProducts,
    };
  }

  return { listForUser, getForUser, listAll, updateStatus, getDashboardStats };
};

export type OrderService = ReturnType<typeof createOrderService>;
