import { Response, NextFunction } from "express";
import { AuthRequest } from "../middlewares/auth";
import { DomainError } from "../services/errors";
import { CurrentUser } from "../services/types";
import { UnauthorizedError, fromDomainError } from "../utils/errors";
import { Result } from "../utils/result";

export type Handler = (req: AuthRequest, res: Response) => Promise<void>;

// Express 4 does not await handlers; forward rejections to the error handler.
export const asyncHandler =
  (handler: Handler) =>
  (req: AuthRequest, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

export const requireUser = (req: AuthRequest): CurrentUser => {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
};

export const unwrap = <T>(result: Result<T, DomainError>): T => {
  if (!result.ok) {
    throw fromDomainError(result.error);
  }
  return result.value;
};

export const toPage = ({ page, limit }: { page: number; limit: number }) => ({
  skip: (page - 1) * limit,
  limit,
});
