// Business failures returned (never thrown) by the services. Controllers map
// them to HTTP responses in utils/errors.ts.

export interface AdminAccount {
  type: "AdminAccount";
}

export interface ProductNotFound {
  type: "ProductNotFound";
  productId: string;
}

export interface ProductVanished {
  type: "ProductVanished";
  productId: string;
}

export interface InsufficientStock {
  type: "InsufficientStock";
  productId: string;
  productName: string;
  requested: number;
  available: number;
}

export interface ItemNotInCart {
  type: "ItemNotInCart";
  productId: string;
}

export interface EmptyCart {
  type: "EmptyCart";
}

export interface OrderNotFound {
  type: "OrderNotFound";
}

export interface InvalidStatus {
  type: "InvalidStatus";
  value: string;
}

export interface AlreadyPaid {
  type: "AlreadyPaid";
}

export interface OrderNotPayable {
  type: "OrderNotPayable";
  status: string;
}

export interface InvalidSignature {
  type: "InvalidSignature";
}

export interface MalformedPayload {
  type: "MalformedPayload";
  reason: string;
}

export type DomainError =
  | AdminAccount
  | ProductNotFound
  | ProductVanished
  | InsufficientStock
  | ItemNotInCart
  | EmptyCart
  | OrderNotFound
  | InvalidStatus
  | AlreadyPaid
  | OrderNotPayable
  | InvalidSignature
  | MalformedPayload;
