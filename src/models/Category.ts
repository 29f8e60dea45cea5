import { Connection, Model, Schema } from "mongoose";

export interface ICategory {
  title: string;
  description?: string;
  createdAt: Date;
  updatedAt: Date;
}

const CategorySchema = new Schema<ICategory>(
  {
    title: {
      type: String,
      required: true,
      trim: true,
    },
    description: {
      type: String,
      trim: true,
    },
  },
  {
    timestamps: true,
  }
);

CategorySchema.index({ title: 1 });

export type CategoryModel = Model<ICategory>;

export const getCategoryModel = (connection: Connection): CategoryModel => {
  if (connection.models.Category) {
    return connection.models.Category as CategoryModel;
  }
  return connection.model<ICategory>("Category", CategorySchema);
};
