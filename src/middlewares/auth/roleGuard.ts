import { NextFunction, Request, Response } from "express";
import { ForbiddenError } from "../../utils/errors";
import { requireSession } from "../../utils/types/Usertype";

export const adminOnly = (req: Request, _res: Response, next: NextFunction) => {
  if (requireSession(req).role !== "admin") {
    next(new ForbiddenError("Admin access required"));
    return;
  }
  next();
};
