import mongoose, { Connection, Model, Schema } from "mongoose";
import { ORDER_STATUSES, OrderStatus } from "./orderStatus";

// Orders are immutable snapshots of a cart: items and totals are written
// once by checkout. Only status and the payment ids change afterwards.

export interface IOrderItem {
  // No ref: the product may be deleted later, the snapshot stays valid.
  product: mongoose.Types.ObjectId | null;
  name: string;
  quantity: number;
  priceAtPurchase: number;
}

export interface IOrder {
  user: mongoose.Types.ObjectId;
  items: IOrderItem[];
  totalPrice: number;
  status: OrderStatus;
  paymentSessionId?: string;
  paymentIntentId?: string;
  lockVersion: number;
  createdAt: Date;
  updatedAt: Date;
}

const OrderItemSchema = new Schema<IOrderItem>(
  {
    product: {
      type: Schema.Types.ObjectId,
      default: null,
    },
    name: {
      type: String,
      required: true,
    },
    quantity: {
      type: Number,
      required: true,
      min: 1,
    },
    priceAtPurchase: {
      type: Number,
      required: true,
      min: 0,
    },
  },
  { _id: false }
);

const OrderSchema = new Schema<IOrder>(
  {
    user: {
      type: Schema.Types.ObjectId,
      ref: "User",
      required: true,
    },
    items: {
      type: [OrderItemSchema],
      immutable: true,
    },
    totalPrice: {
      type: Number,
      required: true,
      min: 0,
      immutable: true,
    },
    status: {
      type: String,
      enum: [...ORDER_STATUSES],
      default: "pending_payment",
    },
    // Unique only when present: sparse indexes skip documents without the field.
    paymentSessionId: {
      type: String,
      unique: true,
      sparse: true,
    },
    paymentIntentId: {
      type: String,
      unique: true,
      sparse: true,
    },
    lockVersion: {
      type: Number,
      default: 0,
    },
  },
  {
    timestamps: true,
  }
);

OrderSchema.index({ user: 1, createdAt: -1 });
OrderSchema.index({ status: 1 });

export type OrderModel = Model<IOrder>;

export const getOrderModel = (connection: Connection): OrderModel => {
  if (connection.models.Order) {
    return connection.models.Order as OrderModel;
  }
  return connection.model<IOrder>("Order", OrderSchema);
};
