import mongoose, { Connection, Model, Schema } from "mongoose";

export interface IProduct {
  sku: string;
  name: string;
  description?: string;
  imageUrl?: string;
  category: mongoose.Types.ObjectId;
  price: number;
  stock: number;
  // Bumped inside a transaction to take the document's write lock.
  lockVersion: number;
  createdAt: Date;
  updatedAt: Date;
}

const ProductSchema = new Schema<IProduct>(
  {
    sku: {
      type: String,
      required: true,
      unique: true,
      trim: true,
      uppercase: true,
    },
    name: {
      type: String,
      required: true,
      trim: true,
    },
    description: {
      type: String,
      trim: true,
    },
    imageUrl: {
      type: String,
      trim: true,
    },
    category: {
      type: Schema.Types.ObjectId,
      ref: "Category",
      required: true,
    },
    price: {
      type: Number,
      required: true,
      min: 0,
    },
    stock: {
      type: Number,
      required: true,
      min: 0,
      default: 0,
      validate: {
        validator: Number.isInteger,
        message: "stock must be an integer",
      },
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

ProductSchema.index({ category: 1, price: 1 });

export type ProductModel = Model<IProduct>;

export const getProductModel = (connection: Connection): ProductModel => {
  if (connection.models.Product) {
    return connection.models.Product as ProductModel;
  }
  return connection.model<IProduct>("Product", ProductSchema);
};
