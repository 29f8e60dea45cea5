import { OrderStatus } from "../models/orderStatus";
import { Result } from "../utils/result";

// Plain records handed out by the repositories. Ids are hex strings; the
// store adapters own the conversion to and from their native ids.

export type UserRole = "customer" | "admin";

export interface UserRecord {
  id: string;
  email: string;
  passwordHash: string;
  name: string;
  phone: string | null;
  role: UserRole;
  createdAt: Date;
}

export interface NewUser {
  email: string;
  passwordHash: string;
  name: string;
  phone: string | null;
  role: UserRole;
}

export interface CategoryRecord {
  id: string;
  title: string;
  description: string | null;
}

export interface NewCategory {
  title: string;
  description: string | null;
}

export interface CategoryPatch {
  title?: string;
  description?: string | null;
}

export interface ProductRecord {
  id: string;
  sku: string;
  name: string;
  description: string | null;
  imageUrl: string | null;
  price: number;
  stock: number;
  categoryId: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewProduct {
  sku: string;
  name: string;
  description: string | null;
  imageUrl: string | null;
  price: number;
  stock: number;
  categoryId: string;
}

/** Partial product update: a field is applied only when present. */
export interface ProductPatch {
  sku?: string;
  name?: string;
  description?: string | null;
  imageUrl?: string | null;
  price?: number;
  stock?: number;
  categoryId?: string;
}

export interface ProductListQuery {
  skip: number;
  limit: number;
  categoryId?: string;
}

export interface CartLine {
  productId: string;
  quantity: number;
}

export interface CartRecord {
  id: string;
  userId: string;
  items: CartLine[];
}

export interface OrderItemRecord {
  /** Dangles once the product is deleted; name and price stay authoritative. */
  productId: string | null;
  name: string;
  quantity: number;
  priceAtPurchase: number;
}

export interface OrderRecord {
  id: string;
  userId: string;
  items: OrderItemRecord[];
  totalPrice: number;
  status: OrderStatus;
  paymentSessionId: string | null;
  paymentIntentId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewOrder {
  userId: string;
  items: OrderItemRecord[];
  totalPrice: number;
  status: OrderStatus;
}

export interface OrderPatch {
  status?: OrderStatus;
  paymentSessionId?: string;
  paymentIntentId?: string;
}

export interface PageQuery {
  skip: number;
  limit: number;
}

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  create(user: NewUser): Promise<UserRecord>;
  listCustomers(page: PageQuery): Promise<UserRecord[]>;
  countCustomers(): Promise<number>;
}

export interface CategoryRepository {
  findById(id: string): Promise<CategoryRecord | null>;
  list(page: PageQuery): Promise<CategoryRecord[]>;
  create(category: NewCategory): Promise<CategoryRecord>;
  update(id: string, patch: CategoryPatch): Promise<CategoryRecord | null>;
  delete(id: string): Promise<boolean>;
}

export interface ProductRepository {
  findById(id: string): Promise<ProductRecord | null>;
  findByIds(ids: string[]): Promise<ProductRecord[]>;
  findBySku(sku: string): Promise<ProductRecord | null>;
  /**
   * Reads the product and holds its write lock until the surrounding
   * transaction ends. Outside a transaction it behaves like `findById`.
   */
  findByIdForUpdate(id: string): Promise<ProductRecord | null>;
  list(query: ProductListQuery): Promise<{ items: ProductRecord[]; total: number }>;
  create(product: NewProduct): Promise<ProductRecord>;
  update(id: string, patch: ProductPatch): Promise<ProductRecord | null>;
  delete(id: string): Promise<boolean>;
  deleteByCategory(categoryId: string): Promise<number>;
  count(): Promise<number>;
}

export interface CartRepository {
  findByUserId(userId: string): Promise<CartRecord | null>;
  create(userId: string): Promise<CartRecord>;
  upsertItem(cartId: string, productId: string, quantity: number): Promise<void>;
  removeItem(cartId: string, productId: string): Promise<boolean>;
  removeItems(cartId: string, productIds: string[]): Promise<void>;
  clear(cartId: string): Promise<void>;
}

export interface OrderRepository {
  create(order: NewOrder): Promise<OrderRecord>;
  findById(id: string): Promise<OrderRecord | null>;
  /** Locked read, see `ProductRepository.findByIdForUpdate`. */
  findByIdForUpdate(id: string): Promise<OrderRecord | null>;
  findByUser(userId: string): Promise<OrderRecord[]>;
  list(page: PageQuery): Promise<OrderRecord[]>;
  update(id: string, patch: OrderPatch): Promise<OrderRecord | null>;
  count(): Promise<number>;
  totalPaidSales(): Promise<number>;
}

export interface UnitOfWork {
  users: UserRepository;
  categories: CategoryRepository;
  products: ProductRepository;
  carts: CartRepository;
  orders: OrderRepository;
}

export type TransactionWork<T, E> = (uow: UnitOfWork) => Promise<Result<T, E>>;

/**
 * Persistence handle created once at startup and passed down explicitly.
 *
 * `repositories` run each call on its own; `transaction` runs `work`
 * against repositories bound to a single transaction that commits when the
 * work resolves to `ok`, and rolls back when it resolves to `err` or throws.
 */
export interface Store {
  repositories: UnitOfWork;
  transaction<T, E>(work: TransactionWork<T, E>): Promise<Result<T, E>>;
}

/** Thrown by `create` when a unique field (user email, product SKU) is already taken. */
export class DuplicateKeyError extends Error {
  constructor(public readonly field: string) {
    super(`Duplicate value for ${field}`);
    this.name = "DuplicateKeyError";
  }
}
