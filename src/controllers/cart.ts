import { Response } from "express";
import { AuthRequest } from "../middlewares/auth";
import { CartService } from "../services/cart";
import { addCartItemSchema, setCartQuantitySchema } from "../validation/schemas";
import { requireUser, unwrap } from "./helpers";

export const createCartController = (cartService: CartService) => {
  const getCart = async (req: AuthRequest, res: Response): Promise<void> => {
    const cart = unwrap(await cartService.getCart(requireUser(req)));
    res.json({ success: true, cart });
  };

  const addToCart = async (req: AuthRequest, res: Response): Promise<void> => {
    const { productId, quantity } = addCartItemSchema.parse(req.body);
    const cart = unwrap(await cartService.addOrMerge(requireUser(req), productId, quantity));
    res.json({ success: true, cart });
  };

  const updateCartItem = async (req: AuthRequest, res: Response): Promise<void> => {
    const { quantity } = setCartQuantitySchema.parse(req.body);
    const outcome = unwrap(
      await cartService.setQuantity(requireUser(req), req.params.productId, quantity)
    );

    res.json({
      success: true,
      ...(outcome.removed ? { message: "Item removed from cart" } : {}),
      cart: outcome.cart,
    });
  };

  const removeFromCart = async (req: AuthRequest, res: Response): Promise<void> => {
    const cart = unwrap(await cartService.remove(requireUser(req), req.params.productId));
    res.json({ success: true, message: "Item removed from cart", cart });
  };

  const clearCart = async (req: AuthRequest, res: Response): Promise<void> => {
    const cart = unwrap(await cartService.clear(requireUser(req)));
    res.json({ success: true, message: "Cart cleared", cart });
  };

  return { getCart, addToCart, updateCartItem, removeFromCart, clearCart };
};
