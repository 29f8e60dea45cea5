import { HydratedDocument } from "mongoose";
import { Models } from "../../models";
import { IOrder } from "../../models/Order";
import { OrderRecord, OrderRepository } from "../types";
import { SessionRef, isObjectId, toObjectId } from "./session";

const toOrderRecord = (doc: HydratedDocument<IOrder>): OrderRecord => ({
  id: doc._id.toString(),
  userId: doc.user.toString(),
  items: doc.items.map((item) => ({
    productId: item.product ? item.product.toString() : null,
    name: item.name,
    quantity: item.quantity,
    priceAtPurchase: item.priceAtPurchase,
  })),
  totalPrice: doc.totalPrice,
  status: doc.status,
  paymentSessionId: doc.paymentSessionId ?? null,
  paymentIntentId: doc.paymentIntentId ?? null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export const createOrderRepository = (
  { Order }: Models,
  session: SessionRef
): OrderRepository => ({
  async create(order) {
    const doc = await new Order({
      user: toObjectId(order.userId),
      items: order.items.map((item) => ({
        product: item.productId ? toObjectId(item.productId) : null,
        name: item.name,
        quantity: item.quantity,
        priceAtPurchase: item.priceAtPurchase,
      })),
      totalPrice: order.totalPrice,
      status: order.status,
    }).save({ session });
    return toOrderRecord(doc);
  },

  async findById(id) {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await Order.findById(id).session(session);
    return doc ? toOrderRecord(doc) : null;
  },

  async findByIdForUpdate(id) {
    if (!isObjectId(id)) {
      return null;
    }
    if (!session) {
      const doc = await Order.findById(id);
      return doc ? toOrderRecord(doc) : null;
    }
    // Same write-lock idiom as products: admin status updates and payment
    // webhooks serialize on the order document.
    const doc = await Order.findOneAndUpdate(
      { _id: id },
      { $inc: { lockVersion: 1 } },
      { new: true, session, timestamps: false }
    );
    return doc ? toOrderRecord(doc) : null;
  },

  async findByUser(userId) {
    if (!isObjectId(userId)) {
      return [];
    }
    const docs = await Order.find({ user: userId }).sort({ createdAt: -1 }).session(session);
    return docs.map(toOrderRecord);
  },

  async list({ skip, limit }) {
    const docs = await Order.find()
      .sort({ createdAt: -1 })
      .skip(skip)
      .limit(limit)
      .session(session);
    return docs.map(toOrderRecord);
  },

  async update(id, patch) {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await Order.findById(id).session(session);
    if (!doc) {
      return null;
    }
    if (patch.status !== undefined) {
      doc.status = patch.status;
    }
    if (patch.paymentSessionId !== undefined) {
      doc.paymentSessionId = patch.paymentSessionId;
    }
    if (patch.paymentIntentId !== undefined) {
      doc.paymentIntentId = patch.paymentIntentId;
    }
    await doc.save();
    return toOrderRecord(doc);
  },

  async count() {
    return Order.countDocuments().session(session).exec();
  },

  async totalPaidSales() {
    const [row] = await Order.aggregate<{ total: number }>([
      { $match: { status: "paid" } },
      { $group: { _id: null, total: { $sum: "$totalPrice" } } },
    ]).session(session);
    return row ? row.total : 0;
  },
});
