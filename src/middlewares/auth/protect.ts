import { NextFunction, Request, Response } from "express";
import { AppConfig } from "../../config/env";
import { UserService } from "../../services/userService";
import { AuthError } from "../../utils/errors";
import { ACCESS_COOKIE, verifySessionToken } from "../../utils/helpers/generateToken";
import asyncHandler from "../asyncHandler";

const readToken = (req: Request): string | undefined => {
  const authHeader = req.headers.authorization;
  if (authHeader && authHeader.startsWith("Bearer ")) {
    return authHeader.slice("Bearer ".length).trim();
  }
  const cookie: unknown = req.cookies?.[ACCESS_COOKIE];
  return typeof cookie === "string" && cookie.length > 0 ? cookie : undefined;
};

/**
 * Verifies the session token and re-reads the user, so deleted users and
 * changed roles take effect before the token expires.
 */
export const createProtect = (config: AppConfig, users: UserService) =>
  asyncHandler(async (req: Request, _res: Response, next: NextFunction) => {
    const token = readToken(req);
    if (!token) {
      throw new AuthError("Access denied: no token provided");
    }

    const claims = verifySessionToken(config, token);
    const user = await users.findSessionUser(claims.username);
    if (!user) {
      throw new AuthError("Access denied: user not found");
    }

    req.user = user;
    next();
  });
