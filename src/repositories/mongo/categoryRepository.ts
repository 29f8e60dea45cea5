import { HydratedDocument } from "mongoose";
import { Models } from "../../models";
import { ICategory } from "../../models/Category";
import { CategoryRecord, CategoryRepository } from "../types";
import { SessionRef, isObjectId } from "./session";

const toCategoryRecord = (doc: HydratedDocument<ICategory>): CategoryRecord => ({
  id: doc._id.toString(),
  title: doc.title,
  description: doc.description ?? null,
});

export const createCategoryRepository = (
  { Category }: Models,
  session: SessionRef
): CategoryRepository => ({
  async findById(id) {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await Category.findById(id).session(session);
    return doc ? toCategoryRecord(doc) : null;
  },

  async list({ skip, limit }) {
    const docs = await Category.find()
      .sort({ title: 1 })
      .skip(skip)
      .limit(limit)
      .session(session);
    return docs.map(toCategoryRecord);
  },

  async create(category) {
    const doc = await new Category({
      title: category.title,
      description: category.description ?? undefined,
    }).save({ session });
    return toCategoryRecord(doc);
  },

  async update(id, patch) {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await Category.findById(id).session(session);
    if (!doc) {
      return null;
    }
    if (patch.title !== undefined) {
      doc.title = patch.title;
    }
    if (patch.description !== undefined) {
      doc.description = patch.description ?? undefined;
    }
    await doc.save();
    return toCategoryRecord(doc);
  },

  async delete(id) {
    if (!isObjectId(id)) {
      return false;
    }
    const result = await Category.deleteOne({ _id: id }).session(session);
    return result.deletedCount > 0;
  },
});
