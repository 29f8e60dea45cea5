import { Response } from "express";
import bcrypt from "bcryptjs";
import jwt from "jsonwebtoken";
import { AppConfig } from "../config/env";
import { AuthRequest } from "../middlewares/auth";
import { DuplicateKeyError, Store, UserRecord } from "../repositories/types";
import { BadRequestError, NotFoundError, UnauthorizedError } from "../utils/errors";
import { logger } from "../utils/logger";
import { ok } from "../utils/result";
import { loginSchema, signupSchema } from "../validation/schemas";
import { requireUser, unwrap } from "./helpers";

const toPublicUser = (user: UserRecord) => ({
  _id: user.id,
  email: user.email,
  name: user.name,
  phone: user.phone,
  role: user.role,
  createdAt: user.createdAt,
});

export const createAuthController = (store: Store, config: AppConfig) => {
  const { users } = store.repositories;

  const generateToken = (userId: string): string =>
    jwt.sign({ userId }, config.jwt.secret, {
      expiresIn: config.jwt.expiresInSeconds,
    });

  const setTokenCookie = (res: Response, token: string): void => {
    res.cookie("token", token, {
      httpOnly: true,
      secure: config.nodeEnv === "production",
      sameSite: "lax",
      maxAge: config.jwt.expiresInSeconds * 1000,
    });
  };

  const signup = async (req: AuthRequest, res: Response): Promise<void> => {
    const { email, password, name, phone } = signupSchema.parse(req.body);

    const existingUser = await users.findByEmail(email);
    if (existingUser) {
      throw new BadRequestError("User already exists");
    }

    const passwordHash = await bcrypt.hash(password, 10);

    // Every customer gets exactly one cart, created with the account. A
    // concurrent signup for the same email loses on the unique index.
    const created = await store
      .transaction<UserRecord, never>(async (tx) => {
        const user = await tx.users.create({
          email,
          passwordHash,
          name,
          phone: phone ?? null,
          role: "customer",
        });
        await tx.carts.create(user.id);
        return ok(user);
      })
      .catch((error: unknown) => {
        if (error instanceof DuplicateKeyError) {
          throw new BadRequestError("User already exists");
        }
        throw error;
      });
    const user = unwrap(created);

    logger.info("auth.signup", { userId: user.id });
    res.status(201).json({ success: true, user: toPublicUser(user) });
  };

  const login = async (req: AuthRequest, res: Response): Promise<void> => {
    const { email, password } = loginSchema.parse(req.body);

    const user = await users.findByEmail(email);
    if (!user) {
      throw new UnauthorizedError("Invalid credentials");
    }

    const isPasswordValid = await bcrypt.compare(password, user.passwordHash);
    if (!isPasswordValid) {
      throw new UnauthorizedError("Invalid credentials");
    }

    const token = generateToken(user.id);
    setTokenCookie(res, token);

    res.json({ success: true, token, user: toPublicUser(user) });
  };

  const logout = async (req: AuthRequest, res: Response): Promise<void> => {
    res.cookie("token", "", {
      httpOnly: true,
      expires: new Date(0),
    });

    res.json({ success: true, message: "Logged out successfully" });
  };

  const getMe = async (req: AuthRequest, res: Response): Promise<void> => {
    const user = await users.findById(requireUser(req).id);
    if (!user) {
      throw new NotFoundError("User not found");
    }

    res.json({ success: true, user: toPublicUser(user) });
  };

  return { signup, login, logout, getMe };
};
