import { UserRole } from "../repositories/types";

/** Caller resolved by the authentication middleware. */
export interface CurrentUser {
  id: string;
  email: string;
  role: UserRole;
}

export const isAdmin = (user: CurrentUser): boolean => user.role === "admin";
