import { DomainError } from "../services/errors";
import { ORDER_STATUSES } from "../models/orderStatus";

export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, message, details);
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = "Authentication required") {
    super(401, message);
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = "Access denied") {
    super(403, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
  }
}

export class ConflictError extends HttpError {
  constructor(message: string) {
    super(409, message);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const fromDomainError = (error: DomainError): HttpError => {
  switch (error.type) {
    case "AdminAccount":
      return new ForbiddenError("Admin accounts do not have a cart or orders");
    case "ProductNotFound":
    case "ProductVanished":
      return new NotFoundError("Product not found");
    case "InsufficientStock":
      return new BadRequestError(`Insufficient stock for ${error.productName}`, {
        productId: error.productId,
        requested: error.requested,
        available: error.available,
      });
    case "ItemNotInCart":
      return new NotFoundError("Product not found in cart");
    case "EmptyCart":
      return new BadRequestError("Cannot create an order from an empty cart");
    case "OrderNotFound":
      return new NotFoundError("Order not found");
    case "InvalidStatus":
      return new BadRequestError(
        `Invalid status "${error.value}". Allowed: ${ORDER_STATUSES.join(", ")}`
      );
    case "AlreadyPaid":
      return new BadRequestError("Order has already been paid");
    case "OrderNotPayable":
      return new BadRequestError(`Order cannot be paid while ${error.status}`);
    case "InvalidSignature":
      return new BadRequestError("Invalid signature");
    case "MalformedPayload":
      return new BadRequestError("Invalid payload");
  }
};
