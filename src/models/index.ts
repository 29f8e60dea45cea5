import { Connection } from "mongoose";
import { CartModel, getCartModel } from "./Cart";
import { CategoryModel, getCategoryModel } from "./Category";
import { OrderModel, getOrderModel } from "./Order";
import { ProductModel, getProductModel } from "./Product";
import { UserModel, getUserModel } from "./User";

export interface Models {
  User: UserModel;
  Category: CategoryModel;
  Product: ProductModel;
  Cart: CartModel;
  Order: OrderModel;
}

export const createModels = (connection: Connection): Models => ({
  User: getUserModel(connection),
  Category: getCategoryModel(connection),
  Product: getProductModel(connection),
  Cart: getCartModel(connection),
  Order: getOrderModel(connection),
});
