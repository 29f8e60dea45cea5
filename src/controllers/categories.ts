import { Response } from "express";
import { AuthRequest } from "../middlewares/auth";
import { CategoryPatch, CategoryRecord, Store } from "../repositories/types";
import { NotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";
import { err, ok } from "../utils/result";
import {
  categoryCreateSchema,
  categoryUpdateSchema,
  pageQuerySchema,
} from "../validation/schemas";
import { toPage } from "./helpers";

const CATEGORY_NOT_FOUND = { type: "CategoryNotFound" } as const;

export const createCategoriesController = (store: Store) => {
  const { categories } = store.repositories;

  const getCategories = async (req: AuthRequest, res: Response): Promise<void> => {
    const page = toPage(pageQuerySchema.parse(req.query));
    res.json({ success: true, categories: await categories.list(page) });
  };

  const getCategory = async (req: AuthRequest, res: Response): Promise<void> => {
    const category = await categories.findById(req.params.id);
    if (!category) {
      throw new NotFoundError("Category not found");
    }
    res.json({ success: true, category });
  };

  const createCategory = async (req: AuthRequest, res: Response): Promise<void> => {
    const { title, description } = categoryCreateSchema.parse(req.body);
    const category = await categories.create({ title, description: description ?? null });
    res.status(201).json({ success: true, category });
  };

  const updateCategory = async (req: AuthRequest, res: Response): Promise<void> => {
    const body = categoryUpdateSchema.parse(req.body);
    const patch: CategoryPatch = {};
    if (body.title !== undefined) {
      patch.title = body.title;
    }
    if (body.description !== undefined) {
      patch.description = body.description;
    }

    const category = await categories.update(req.params.id, patch);
    if (!category) {
      throw new NotFoundError("Category not found");
    }
    res.json({ success: true, category });
  };

  // Products of the category go with it; orders keep their snapshots.
  const deleteCategory = async (req: AuthRequest, res: Response): Promise<void> => {
    const deleted = await store.transaction<
      { category: CategoryRecord; products: number },
      typeof CATEGORY_NOT_FOUND
    >(async (tx) => {
      const category = await tx.categories.findById(req.params.id);
      if (!category) {
        return err(CATEGORY_NOT_FOUND);
      }
      const products = await tx.products.deleteByCategory(category.id);
      await tx.categories.delete(category.id);
      return ok({ category, products });
    });
    if (!deleted.ok) {
      throw new NotFoundError("Category not found");
    }

    logger.info("catalog.category_deleted", {
      categoryId: deleted.value.category.id,
      products: deleted.value.products,
    });
    res.json({ success: true, message: "Category deleted" });
  };

  return { getCategories, getCategory, createCategory, updateCategory, deleteCategory };
};
