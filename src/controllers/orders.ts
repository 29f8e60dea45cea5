import { Response } from "express";
import { AuthRequest } from "../middlewares/auth";
import { OrderAssembler } from "../services/orderAssembler";
import { OrderService } from "../services/orders";
import { requireUser, unwrap } from "./helpers";

export const createOrdersController = (
  orderAssembler: OrderAssembler,
  orderService: OrderService
) => {
  const createOrder = async (req: AuthRequest, res: Response): Promise<void> => {
    const order = unwrap(await orderAssembler.createOrderFromCart(requireUser(req)));
    res.status(201).json({ success: true, order });
  };

  const getOrders = async (req: AuthRequest, res: Response): Promise<void> => {
    const orders = unwrap(await orderService.listForUser(requireUser(req)));
    res.json({ success: true, orders });
  };

  const getOrder = async (req: AuthRequest, res: Response): Promise<void> => {
    const order = unwrap(await orderService.getForUser(requireUser(req), req.params.orderId));
    res.json({ success: true, order });
  };

  return { createOrder, getOrders, getOrder };
};
