import { Response } from "express";
import { AuthRequest } from "../middlewares/auth";
import { Store, UserRecord } from "../repositories/types";
import { OrderService } from "../services/orders";
import { pageQuerySchema, updateOrderStatusSchema } from "../validation/schemas";
import { toPage, unwrap } from "./helpers";

const toCustomerSummary = (user: UserRecord) => ({
  _id: user.id,
  email: user.email,
  name: user.name,
  phone: user.phone,
  createdAt: user.createdAt,
});

export const createAdminController = (store: Store, orderService: OrderService) => {
  const listOrders = async (req: AuthRequest, res: Response): Promise<void> => {
    const page = toPage(pageQuerySchema.parse(req.query));
    res.json({ success: true, orders: await orderService.listAll(page) });
  };

  const updateOrderStatus = async (req: AuthRequest, res: Response): Promise<void> => {
    const { status } = updateOrderStatusSchema.parse(req.body);
    const order = unwrap(await orderService.updateStatus(req.params.orderId, status));
    res.json({ success: true, order });
  };

  const listUsers = async (req: AuthRequest, res: Response): Promise<void> => {
    const page = toPage(pageQuerySchema.parse(req.query));
    const users = await store.repositories.users.listCustomers(page);
    res.json({ success: true, users: users.map(toCustomerSummary) });
  };

  const getStats = async (req: AuthRequest, res: Response): Promise<void> => {
    res.json({ success: true, stats: await orderService.getDashboardStats() });
  };

  return { listOrders, updateOrderStatus, listUsers, getStats };
};
