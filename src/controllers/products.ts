import { Response } from "express";
import { AuthRequest } from "../middlewares/auth";
import { DuplicateKeyError, ProductPatch, Store } from "../repositories/types";
import { BadRequestError, ConflictError, NotFoundError } from "../utils/errors";
import {
  productCreateSchema,
  productListQuerySchema,
  productUpdateSchema,
} from "../validation/schemas";
import { toPage } from "./helpers";

export const createProductsController = (store: Store) => {
  const { products, categories } = store.repositories;

  const ensureCategory = async (categoryId: string): Promise<void> => {
    if (!(await categories.findById(categoryId))) {
      throw new NotFoundError("Category not found to link product");
    }
  };

  const ensureSkuFree = async (sku: string, productId?: string): Promise<void> => {
    const owner = await products.findBySku(sku);
    if (owner && owner.id !== productId) {
      throw new ConflictError(`SKU ${owner.sku} already exists`);
    }
  };

  // Two writers can both pass ensureSkuFree; the unique index decides.
  const skuTaken =
    (sku: string | undefined) =>
    (error: unknown): never => {
      if (error instanceof DuplicateKeyError) {
        throw new ConflictError(
          sku ? `SKU ${sku.toUpperCase()} already exists` : "SKU already exists"
        );
      }
      throw error;
    };

  const getProducts = async (req: AuthRequest, res: Response): Promise<void> => {
    const query = productListQuerySchema.parse(req.query);
    const { items, total } = await products.list({
      ...toPage(query),
      categoryId: query.category,
    });

    res.json({
      success: true,
      products: items,
      pagination: {
        page: query.page,
        limit: query.limit,
        total,
        pages: Math.ceil(total / query.limit),
      },
    });
  };

  const getProduct = async (req: AuthRequest, res: Response): Promise<void> => {
    const product = await products.findById(req.params.id);
    if (!product) {
      throw new NotFoundError("Product not found");
    }
    res.json({ success: true, product });
  };

  const createProduct = async (req: AuthRequest, res: Response): Promise<void> => {
    const body = productCreateSchema.parse(req.body);
    await ensureCategory(body.categoryId);
    await ensureSkuFree(body.sku);

    const product = await products
      .create({
        sku: body.sku,
        name: body.name,
        description: body.description ?? null,
        imageUrl: body.imageUrl ?? null,
        price: body.price,
        stock: body.stock,
        categoryId: body.categoryId,
      })
      .catch(skuTaken(body.sku));
    res.status(201).json({ success: true, product });
  };

  const updateProduct = async (req: AuthRequest, res: Response): Promise<void> => {
    const body = productUpdateSchema.parse(req.body);
    const patch: ProductPatch = {};
    if (body.sku !== undefined) {
      await ensureSkuFree(body.sku, req.params.id);
      patch.sku = body.sku;
    }
    if (body.name !== undefined) {
      patch.name = body.name;
    }
    if (body.description !== undefined) {
      patch.description = body.description;
    }
    if (body.imageUrl !== undefined) {
      patch.imageUrl = body.imageUrl;
    }
    if (body.price !== undefined) {
      patch.price = body.price;
    }
    if (body.stock !== undefined) {
      patch.stock = body.stock;
    }
    if (body.categoryId !== undefined) {
      await ensureCategory(body.categoryId);
      patch.categoryId = body.categoryId;
    }
    if (Object.keys(patch).length === 0) {
      throw new BadRequestError("No fields to update");
    }

    const product = await products.update(req.params.id, patch).catch(skuTaken(body.sku));
    if (!product) {
      throw new NotFoundError("Product not found");
    }
    res.json({ success: true, product });
  };

  // Cart lines and order items that reference the product are left alone.
  const deleteProduct = async (req: AuthRequest, res: Response): Promise<void> => {
    const deleted = await products.delete(req.params.id);
    if (!deleted) {
      throw new NotFoundError("Product not found");
    }
    res.json({ success: true, message: "Product deleted" });
  };

  return { getProducts, getProduct, createProduct, updateProduct, deleteProduct };
};
