import { Request } from "express";
import { AuthError } from "../errors";

export const ROLES = ["user", "admin"] as const;
export type Role = (typeof ROLES)[number];

export const isRole = (value: unknown): value is Role =>
  typeof value === "string" && (ROLES as readonly string[]).includes(value);

// "." and ".." are excluded: usernames become directory names
export const USERNAME_PATTERN = /^(?!\.{1,2}$)[A-Za-z0-9._-]{1,64}$/;

export interface UserRecord {
  username: string;
  passwordHash: string;
  role: Role;
  createdAt: string;
  updatedAt: string;
}

// what an admin gets to see
export type PublicUser = Omit<UserRecord, "passwordHash">;

export const toPublicUser = ({ passwordHash: _hash, ...rest }: UserRecord): PublicUser => rest;

// the identity carried by a verified session token
export interface SessionUser {
  username: string;
  role: Role;
}

declare global {
  namespace Express {
    interface Request {
      user?: SessionUser;
    }
  }
}

export const requireSession = (req: Request): SessionUser => {
  if (!req.user) {
    throw new AuthError("Not authenticated");
  }
  return req.user;
};
