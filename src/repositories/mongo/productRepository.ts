import { HydratedDocument } from "mongoose";
import { Models } from "../../models";
import { IProduct } from "../../models/Product";
import { ProductRecord, ProductRepository } from "../types";
import { SessionRef, isObjectId, rethrowDuplicateKey, toObjectId } from "./session";

const toProductRecord = (doc: HydratedDocument<IProduct>): ProductRecord => ({
  id: doc._id.toString(),
  sku: doc.sku,
  name: doc.name,
  description: doc.description ?? null,
  imageUrl: doc.imageUrl ?? null,
  price: doc.price,
  stock: doc.stock,
  categoryId: doc.category.toString(),
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export const createProductRepository = (
  { Product }: Models,
  session: SessionRef
): ProductRepository => ({
  async findById(id) {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await Product.findById(id).session(session);
    return doc ? toProductRecord(doc) : null;
  },

  async findByIds(ids) {
    const valid = ids.filter(isObjectId);
    if (valid.length === 0) {
      return [];
    }
    const docs = await Product.find({ _id: { $in: valid } }).session(session);
    return docs.map(toProductRecord);
  },

  async findBySku(sku) {
    const doc = await Product.findOne({ sku: sku.trim().toUpperCase() }).session(session);
    return doc ? toProductRecord(doc) : null;
  },

  async findByIdForUpdate(id) {
    if (!isObjectId(id)) {
      return null;
    }
    if (!session) {
      const doc = await Product.findById(id);
      return doc ? toProductRecord(doc) : null;
    }
    // MongoDB has no SELECT ... FOR UPDATE: writing to the document inside
    // the transaction takes its write lock, so a concurrent transaction
    // touching it hits a write conflict and is retried after we commit.
    const doc = await Product.findOneAndUpdate(
      { _id: id },
      { $inc: { lockVersion: 1 } },
      { new: true, session, timestamps: false }
    );
    return doc ? toProductRecord(doc) : null;
  },

  async list({ skip, limit, categoryId }) {
    if (categoryId !== undefined && !isObjectId(categoryId)) {
      return { items: [], total: 0 };
    }
    const filter = categoryId !== undefined ? { category: toObjectId(categoryId) } : {};
    const [docs, total] = await Promise.all([
      Product.find(filter)
        .sort({ createdAt: -1 })
        .skip(skip)
        .limit(limit)
        .session(session),
      Product.countDocuments(filter).session(session).exec(),
    ]);
    return { items: docs.map(toProductRecord), total };
  },

  async create(product) {
    const doc = await new Product({
      sku: product.sku,
      name: product.name,
      description: product.description ?? undefined,
      imageUrl: product.imageUrl ?? undefined,
      category: toObjectId(product.categoryId),
      price: product.price,
      stock: product.stock,
    })
      .save({ session })
      .catch(rethrowDuplicateKey("sku"));
    return toProductRecord(doc);
  },

  async update(id, patch) {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await Product.findById(id).session(session);
    if (!doc) {
      return null;
    }
    if (patch.sku !== undefined) {
      doc.sku = patch.sku;
    }
    if (patch.name !== undefined) {
      doc.name = patch.name;
    }
    if (patch.description !== undefined) {
      doc.description = patch.description ?? undefined;
    }
    if (patch.imageUrl !== undefined) {
      doc.imageUrl = patch.imageUrl ?? undefined;
    }
    if (patch.price !== undefined) {
      doc.price = patch.price;
    }
    if (patch.stock !== undefined) {
      doc.stock = patch.stock;
    }
    if (patch.categoryId !== undefined) {
      doc.category = toObjectId(patch.categoryId);
    }
    await doc.save().catch(rethrowDuplicateKey("sku"));
    return toProductRecord(doc);
  },

  async delete(id) {
    if (!isObjectId(id)) {
      return false;
    }
    const result = await Product.deleteOne({ _id: id }).session(session);
    return result.deletedCount > 0;
  },

  async deleteByCategory(categoryId) {
    if (!isObjectId(categoryId)) {
      return 0;
    }
    const result = await Product.deleteMany({ category: categoryId }).session(session);
    return result.deletedCount;
  },

  async count() {
    return Product.countDocuments().session(session).exec();
  },
});
