import { Connection, Model, Schema } from "mongoose";
import { UserRole } from "../repositories/types";

export interface IUser {
  email: string;
  password: string;
  name: string;
  phone?: string;
  role: UserRole;
  createdAt: Date;
  updatedAt: Date;
}

const UserSchema = new Schema<IUser>(
  {
    email: {
      type: String,
      required: true,
      unique: true,
      lowercase: true,
      trim: true,
    },
    password: {
      type: String,
      required: true,
    },
    name: {
      type: String,
      required: true,
      trim: true,
    },
    phone: {
      type: String,
      trim: true,
    },
    role: {
      type: String,
      enum: ["customer", "admin"],
      default: "customer",
    },
  },
  {
    timestamps: true,
  }
);

export type UserModel = Model<IUser>;

export const getUserModel = (connection: Connection): UserModel => {
  if (connection.models.User) {
    return connection.models.User as UserModel;
  }
  return connection.model<IUser>("User", UserSchema);
};
