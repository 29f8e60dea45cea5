import { Request, Response, NextFunction } from "express";
import jwt from "jsonwebtoken";
import { AppConfig } from "../config/env";
import { Store, UserRole } from "../repositories/types";
import { CurrentUser } from "../services/types";

export interface AuthRequest extends Request {
  user?: CurrentUser;
}

const readToken = (req: Request): string | null => {
  const cookieToken: unknown = req.cookies?.token;
  if (typeof cookieToken === "string" && cookieToken !== "") {
    return cookieToken;
  }
  const header = req.headers.authorization;
  if (header?.startsWith("Bearer ")) {
    return header.slice("Bearer ".length);
  }
  return null;
};

export const createAuthMiddleware = (store: Store, config: AppConfig) => {
  const authenticate = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    const token = readToken(req);
    if (!token) {
      res.status(401).json({ success: false, error: "Authentication required" });
      return;
    }

    let userId: string;
    try {
      const decoded = jwt.verify(token, config.jwt.secret);
      if (typeof decoded !== "object" || typeof decoded.userId !== "string") {
        res.status(401).json({ success: false, error: "Invalid token" });
        return;
      }
      userId = decoded.userId;
    } catch (error) {
      if (error instanceof jwt.JsonWebTokenError) {
        res.status(401).json({ success: false, error: "Invalid token" });
        return;
      }
      next(error);
      return;
    }

    try {
      const user = await store.repositories.users.findById(userId);
      if (!user) {
        res.status(401).json({ success: false, error: "User not found" });
        return;
      }

      req.user = { id: user.id, email: user.email, role: user.role };
      next();
    } catch (error) {
      next(error);
    }
  };

  const authorize = (...roles: UserRole[]) => {
    return (req: AuthRequest, res: Response, next: NextFunction): void => {
      if (!req.user) {
        res.status(401).json({ success: false, error: "Authentication required" });
        return;
      }

      if (!roles.includes(req.user.role)) {
        res.status(403).json({ success: false, error: "Access denied" });
        return;
      }

      next();
    };
  };

  return { authenticate, authorize };
};

export type AuthMiddleware = ReturnType<typeof createAuthMiddleware>;
