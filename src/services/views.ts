import { OrderStatus } from "../models/orderStatus";
import { CartRecord, OrderRecord, ProductRecord, UnitOfWork } from "../repositories/types";
import { lineTotal, sumLines } from "../utils/money";

// Fully materialized trees handed to the HTTP layer. Products are fetched
// with one explicit lookup per tree; nothing is loaded lazily later.

export interface CartLineView {
  productId: string;
  quantity: number;
  /** null when the product was deleted after it was added. */
  product: ProductRecord | null;
  lineTotal: number;
}

export interface CartView {
  id: string;
  items: CartLineView[];
  totalPrice: number;
}

export interface OrderItemView {
  productId: string | null;
  name: string;
  quantity: number;
  priceAtPurchase: number;
  lineTotal: number;
  product: ProductRecord | null;
}

export interface OrderView {
  id: string;
  userId: string;
  status: OrderStatus;
  totalPrice: number;
  paymentSessionId: string | null;
  paymentIntentId: string | null;
  items: OrderItemView[];
  createdAt: Date;
  updatedAt: Date;
}

const loadProducts = async (
  uow: UnitOfWork,
  ids: Array<string | null>
): Promise<Map<string, ProductRecord>> => {
  const unique = [...new Set(ids.filter((id): id is string => id !== null))];
  const products = await uow.products.findByIds(unique);
  return new Map(products.map((product) => [product.id, product]));
};

export async function buildCartView(uow: UnitOfWork, cart: CartRecord): Promise<CartView> {
  const products = await loadProducts(
    uow,
    cart.items.map((item) => item.productId)
  );

  const items = cart.items.map((item) => {
    const product = products.get(item.productId) ?? null;
    return {
      productId: item.productId,
      quantity: item.quantity,
      product,
      lineTotal: product ? lineTotal(product.price, item.quantity) : 0,
    };
  });

  const priced = items.flatMap((item) =>
    item.product ? [{ price: item.product.price, quantity: item.quantity }] : []
  );

  return { id: cart.id, items, totalPrice: sumLines(priced) };
}

export async function buildOrderViews(
  uow: UnitOfWork,
  orders: OrderRecord[]
): Promise<OrderView[]> {
  const products = await loadProducts(
    uow,
    orders.flatMap((order) => order.items.map((item) => item.productId))
  );

  return orders.map((order) => ({
    id: order.id,
    userId: order.userId,
    status: order.status,
    totalPrice: order.totalPrice,
    paymentSessionId: order.paymentSessionId,
    paymentIntentId: order.paymentIntentId,
    createdAt: order.createdAt,
    updatedAt: order.updatedAt,
    items: order.items.map((item) => ({
      productId: item.productId,
      name: item.name,
      quantity: item.quantity,
      priceAtPurchase: item.priceAtPurchase,
      lineTotal: lineTotal(item.priceAtPurchase, item.quantity),
      product: item.productId ? products.get(item.productId) ?? null : null,
    })),
  }));
}

export async function buildOrderView(uow: UnitOfWork, order: OrderRecord): Promise<OrderView> {
  const [view] = await buildOrderViews(uow, [order]);
  return view;
}
