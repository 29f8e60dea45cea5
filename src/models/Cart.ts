import mongoose, { Connection, Model, Schema } from "mongoose";

// One cart per customer, created at signup. Lines reference products by id
// and are unique per product.

export interface ICartItem {
  product: mongoose.Types.ObjectId;
  quantity: number;
}

export interface ICart {
  user: mongoose.Types.ObjectId;
  items: ICartItem[];
  updatedAt: Date;
}

const CartItemSchema = new Schema<ICartItem>(
  {
    product: {
      type: Schema.Types.ObjectId,
      ref: "Product",
      required: true,
    },
    quantity: {
      type: Number,
      required: true,
      min: 1,
      default: 1,
    },
  },
  { _id: false }
);

const CartSchema = new Schema<ICart>(
  {
    user: {
      type: Schema.Types.ObjectId,
      ref: "User",
      required: true,
      unique: true,
    },
    items: [CartItemSchema],
  },
  {
    timestamps: { createdAt: false, updatedAt: true },
  }
);

export type CartModel = Model<ICart>;

export const getCartModel = (connection: Connection): CartModel => {
  if (connection.models.Cart) {
    return connection.models.Cart as CartModel;
  }
  return connection.model<ICart>("Cart", CartSchema);
};
