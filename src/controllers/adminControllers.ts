import { Request, Response } from "express";
import { AppContext } from "../context";
import asyncHandler from "../middlewares/asyncHandler";
import { toApplicationResponse } from "../utils/types/ApplicationTypes";
import { requireSession } from "../utils/types/Usertype";
import {
  createUserBody,
  pagingQuery,
  parseInput,
  updateUserBody,
  usernameParam,
} from "../utils/validators";

export const createAdminControllers = ({ users, applications }: AppContext) => ({
  // GET /admin/users
  listUsers: asyncHandler(async (_req: Request, res: Response) => {
    const list = await users.listUsers();
    res.status(200).json({ success: true, count: list.length, users: list });
  }),

  // POST /admin/users
  createUser: asyncHandler(async (req: Request, res: Response) => {
    const body = parseInput(createUserBody, req.body);
    const user = await users.createUser(body);
    res.status(201).json({ success: true, user });
  }),

  // PUT /admin/users/:username
  updateUser: asyncHandler(async (req: Request, res: Response) => {
    const { username } = parseInput(usernameParam, req.params);
    const body = parseInput(updateUserBody, req.body ?? {});
    const user = await users.updateUser(username, body);
    res.status(200).json({ success: true, user });
  }),

  // DELETE /admin/users/:username
  deleteUser: asyncHandler(async (req: Request, res: Response) => {
    const { username } = parseInput(usernameParam, req.params);
    await users.deleteUser(username, requireSession(req));
    res.status(200).json({ success: true });
  }),

  // GET /admin/applications/:username
  getUserApplications: asyncHandler(async (req: Request, res: Response) => {
    const { username } = parseInput(usernameParam, req.params);
    const query = parseInput(pagingQuery, req.query);

    const page = await applications.adminListAny(username, { limit: query.limit, offset: query.offset });
    res.status(200).json({
      username,
      applications: page.applications.map(toApplicationResponse),
      total: page.total,
      limit: page.limit,
      offset: page.offset,
    });
  }),
});
