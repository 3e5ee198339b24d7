import { Request, Response } from "express";
import { AppContext } from "../context";
import asyncHandler from "../middlewares/asyncHandler";
import { uploadedFile } from "../middlewares/fileUpload";
import { ForbiddenError } from "../utils/errors";
import { toApplicationResponse } from "../utils/types/ApplicationTypes";
import { requireSession } from "../utils/types/Usertype";
import {
  createApplicationBody,
  idParam,
  pagingQuery,
  parseInput,
  updateApplicationBody,
} from "../utils/validators";

export const createApplicationControllers = ({ applications }: AppContext) => ({
  // GET /applications?limit=&offset=
  getApplications: asyncHandler(async (req: Request, res: Response) => {
    const { username } = requireSession(req);
    const query = parseInput(pagingQuery, req.query);

    // the session decides whose rows are read; a mismatching query is refused
    if (query.username !== undefined && query.username !== username) {
      throw new ForbiddenError("Users can only access their own applications");
    }

    const page = await applications.list(username, { limit: query.limit, offset: query.offset });
    res.status(200).json({
      username,
      applications: page.applications.map(toApplicationResponse),
      total: page.total,
      limit: page.limit,
      offset: page.offset,
    });
  }),

  // GET /applications/:id
  getApplication: asyncHandler(async (req: Request, res: Response) => {
    const { username } = requireSession(req);
    const { id } = parseInput(idParam, req.params);

    const application = await applications.get(username, id);
    res.status(200).json({ success: true, application: toApplicationResponse(application) });
  }),

  // POST /applications (multipart)
  createApplication: asyncHandler(async (req: Request, res: Response) => {
    const { username } = requireSession(req);
    const body = parseInput(createApplicationBody, req.body);

    const application = await applications.create(username, {
      company: body.company,
      jobDescription: body.jobdescription,
      status: body.status,
      category: body.category,
      file: uploadedFile(req),
    });
    res.status(201).json({ success: true, application: toApplicationResponse(application) });
  }),

  // PUT /applications/:id (multipart)
  updateApplication: asyncHandler(async (req: Request, res: Response) => {
    const { username } = requireSession(req);
    const { id } = parseInput(idParam, req.params);
    const body = parseInput(updateApplicationBody, req.body ?? {});

    const application = await applications.update(username, id, {
      company: body.company,
      jobDescription: body.jobdescription,
      status: body.status,
      category: body.category,
      file: uploadedFile(req),
    });
    res.status(200).json({ success: true, application: toApplicationResponse(application) });
  }),

  // DELETE /applications/:id
  deleteApplication: asyncHandler(async (req: Request, res: Response) => {
    const { username } = requireSession(req);
    const { id } = parseInput(idParam, req.params);

    await applications.remove(username, id);
    res.status(200).json({ success: true });
  }),
});
