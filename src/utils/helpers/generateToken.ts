import { CookieOptions, Response } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { AppConfig } from "../../config/env";
import { AuthError } from "../errors";
import { ROLES, SessionUser } from "../types/Usertype";

export const ACCESS_COOKIE = "access_token";

const sessionClaims = z.object({
  username: z.string().min(1),
  role: z.enum(ROLES),
});

const cookieOptions = (config: AppConfig): CookieOptions => ({
  httpOnly: true,
  secure: config.nodeEnv === "production",
  sameSite: "lax",
});

export const signSessionToken = (config: AppConfig, user: SessionUser): string =>
  jwt.sign({ username: user.username, role: user.role }, config.jwt.secret, {
    expiresIn: config.jwt.expiresInSeconds,
  });

export const verifySessionToken = (config: AppConfig, token: string): SessionUser => {
  let decoded: unknown;
  try {
    decoded = jwt.verify(token, config.jwt.secret);
  } catch (error) {
    throw new AuthError(error instanceof jwt.TokenExpiredError ? "Session expired" : "Invalid session token");
  }
  const claims = sessionClaims.safeParse(decoded);
  if (!claims.success) {
    throw new AuthError("Invalid session token");
  }
  return claims.data;
};

// signs the session and sets it as a cookie; the token is also returned for bearer use
export const generateToken = (res: Response, config: AppConfig, user: SessionUser): string => {
  const accessToken = signSessionToken(config, user);
  res.cookie(ACCESS_COOKIE, accessToken, cookieOptions(config));
  return accessToken;
};

export const clearToken = (res: Response, config: AppConfig): void => {
  res.clearCookie(ACCESS_COOKIE, cookieOptions(config));
};
