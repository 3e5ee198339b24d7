import { NextFunction, Request, RequestHandler, Response } from "express";

// forwards rejected promises to the error middleware
const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };

export default asyncHandler;
