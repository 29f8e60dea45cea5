import { HydratedDocument } from "mongoose";
import { Models } from "../../models";
import { ICart } from "../../models/Cart";
import { CartRecord, CartRepository } from "../types";
import { SessionRef, isObjectId, toObjectId } from "./session";

const toCartRecord = (doc: HydratedDocument<ICart>): CartRecord => ({
  id: doc._id.toString(),
  userId: doc.user.toString(),
  items: doc.items.map((item) => ({
    productId: item.product.toString(),
    quantity: item.quantity,
  })),
});

export const createCartRepository = (
  { Cart }: Models,
  session: SessionRef
): CartRepository => ({
  async findByUserId(userId) {
    if (!isObjectId(userId)) {
      return null;
    }
    const doc = await Cart.findOne({ user: userId }).session(session);
    return doc ? toCartRecord(doc) : null;
  },

  async create(userId) {
    const doc = await new Cart({ user: toObjectId(userId), items: [] }).save({ session });
    return toCartRecord(doc);
  },

  async upsertItem(cartId, productId, quantity) {
    const product = toObjectId(productId);
    const updated = await Cart.updateOne(
      { _id: cartId, "items.product": product },
      { $set: { "items.$.quantity": quantity } },
      { session }
    );
    if (updated.matchedCount > 0) {
      return;
    }
    // The $ne guard keeps (cart, product) unique if two requests race here.
    await Cart.updateOne(
      { _id: cartId, "items.product": { $ne: product } },
      { $push: { items: { product, quantity } } },
      { session }
    );
  },

  async removeItem(cartId, productId) {
    if (!isObjectId(productId)) {
      return false;
    }
    const product = toObjectId(productId);
    const result = await Cart.updateOne(
      { _id: cartId, "items.product": product },
      { $pull: { items: { product } } },
      { session }
    );
    return result.modifiedCount > 0;
  },

  async removeItems(cartId, productIds) {
    const products = productIds.filter(isObjectId).map(toObjectId);
    if (products.length === 0) {
      return;
    }
    await Cart.updateOne(
      { _id: cartId },
      { $pull: { items: { product: { $in: products } } } },
      { session }
    );
  },

  async clear(cartId) {
    await Cart.updateOne({ _id: cartId }, { $set: { items: [] } }, { session });
  },
});
