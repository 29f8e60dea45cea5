import { CartRecord, Store } from "../repositories/types";
import { Result, err, ok } from "../utils/result";
import {
  AdminAccount,
  InsufficientStock,
  ItemNotInCart,
  ProductNotFound,
} from "./errors";
import { CurrentUser, isAdmin } from "./types";
import { CartView, buildCartView } from "./views";

export interface SetQuantityOutcome {
  /** true when a quantity <= 0 removed the line. */
  removed: boolean;
  cart: CartView;
}

const ADMIN_ACCOUNT: AdminAccount = { type: "AdminAccount" };

/**
 * Staging area for purchases. Stock checks here are advisory: nothing is
 * reserved until checkout, which re-validates under lock.
 */
export const createCartService = (store: Store) => {
  const uow = store.repositories;

  // Carts are created at signup; this covers accounts that predate that.
  const ensureCart = async (userId: string): Promise<CartRecord> =>
    (await uow.carts.findByUserId(userId)) ?? uow.carts.create(userId);

  const viewCart = async (userId: string): Promise<CartView> =>
    buildCartView(uow, await ensureCart(userId));

  async function getCart(user: CurrentUser): Promise<Result<CartView, AdminAccount>> {
    if (isAdmin(user)) {
      return err(ADMIN_ACCOUNT);
    }
    return ok(await viewCart(user.id));
  }

  async function addOrMerge(
    user: CurrentUser,
    productId: string,
    quantity: number
  ): Promise<Result<CartView, AdminAccount | ProductNotFound | InsufficientStock>> {
    if (isAdmin(user)) {
      return err(ADMIN_ACCOUNT);
    }

    const product = await uow.products.findById(productId);
    if (!product) {
      return err({ type: "ProductNotFound", productId });
    }

    const cart = await ensureCart(user.id);
    const existing = cart.items.find((item) => item.productId === product.id);
    const newQuantity = (existing?.quantity ?? 0) + quantity;

    if (newQuantity > product.stock) {
      return err({
        type: "InsufficientStock",
        productId: product.id,
        productName: product.name,
        requested: newQuantity,
        available: product.stock,
      });
    }

    await uow.carts.upsertItem(cart.id, product.id, newQuantity);
    return ok(await viewCart(user.id));
  }

  async function setQuantity(
    user: CurrentUser,
    productId: string,
    quantity: number
  ): Promise<
    Result<SetQuantityOutcome, AdminAccount | ItemNotInCart | ProductNotFound | InsufficientStock>
  > {
    if (isAdmin(user)) {
      return err(ADMIN_ACCOUNT);
    }

    const cart = await ensureCart(user.id);

    if (quantity <= 0) {
      await uow.carts.removeItem(cart.id, productId);
      return ok({ removed: true, cart: await viewCart(user.id) });
    }

    if (!cart.items.some((item) => item.productId === productId)) {
      return err({ type: "ItemNotInCart", productId });
    }

    const product = await uow.products.findById(productId);
    if (!product) {
      return err({ type: "ProductNotFound", productId });
    }

    if (quantity > product.stock) {
      return err({
        type: "InsufficientStock",
        productId: product.id,
        productName: product.name,
        requested: quantity,
        available: product.stock,
      });
    }

    await uow.carts.upsertItem(cart.id, product.id, quantity);
    return ok({ removed: false, cart: await viewCart(user.id) });
  }

  async function remove(
    user: CurrentUser,
    productId: string
  ): Promise<Result<CartView, AdminAccount | ItemNotInCart>> {
    if (isAdmin(user)) {
      return err(ADMIN_ACCOUNT);
    }

    const cart = await ensureCart(user.id);
    const removed = await uow.carts.removeItem(cart.id, productId);
    if (!removed) {
      return err({ type: "ItemNotInCart", productId });
    }
    return ok(await viewCart(user.id));
  }

  async function clear(user: CurrentUser): Promise<Result<CartView, AdminAccount>> {
    if (isAdmin(user)) {
      return err(ADMIN_ACCOUNT);
    }

    const cart = await ensureCart(user.id);
    await uow.carts.clear(cart.id);
    return ok(await viewCart(user.id));
  }

  return { getCart, addOrMerge, setQuantity, remove, clear };
};

export type CartService = ReturnType<typeof createCartService>;
