import { ProductRecord, UnitOfWork } from "../repositories/types";
import { Result, err, ok } from "../utils/result";
import { InsufficientStock, ProductVanished } from "./errors";

/**
 * Takes `quantity` units of a product out of stock.
 *
 * Must run inside the caller's transaction: the product is read under its
 * row lock, so two checkouts racing for the last units are serialized and
 * the second one sees the decremented stock. On failure the stock is left
 * untouched. Returns the product with its new stock.
 */
export async function reserveAndDecrement(
  uow: UnitOfWork,
  productId: string,
  quantity: number
): Promise<Result<ProductRecord, ProductVanished | InsufficientStock>> {
  const product = await uow.products.findByIdForUpdate(productId);
  if (!product) {
    return err({ type: "ProductVanished", productId });
  }

  if (product.stock < quantity) {
    return err({
      type: "InsufficientStock",
      productId,
      productName: product.name,
      requested: quantity,
      available: product.stock,
    });
  }

  const updated = await uow.products.update(productId, {
    stock: product.stock - quantity,
  });
  if (!updated) {
    return err({ type: "ProductVanished", productId });
  }
  return ok(updated);
}
