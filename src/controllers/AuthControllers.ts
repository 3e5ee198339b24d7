import { Request, Response } from "express";
import { AppContext } from "../context";
import asyncHandler from "../middlewares/asyncHandler";
import { clearToken, generateToken } from "../utils/helpers/generateToken";
import { requireSession } from "../utils/types/Usertype";
import { loginBody, parseInput } from "../utils/validators";

export const createAuthControllers = ({ config, users }: AppContext) => ({
  // POST /login
  loginUser: asyncHandler(async (req: Request, res: Response) => {
    const { username, password } = parseInput(loginBody, req.body);

    const user = await users.verify(username, password);
    const accessToken = generateToken(res, config, user);

    res.status(200).json({
      success: true,
      message: "Login successful",
      username: user.username,
      role: user.role,
      accessToken,
    });
  }),

  // POST /logout
  logoutUser: (_req: Request, res: Response) => {
    clearToken(res, config);
    res.status(200).json({ success: true, message: "User logged out successfully" });
  },

  // GET /session
  sessionInfo: (req: Request, res: Response) => {
    res.status(200).json({ success: true, user: requireSession(req) });
  },
});
