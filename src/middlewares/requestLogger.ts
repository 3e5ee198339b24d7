import { NextFunction, Request, Response } from "express";
import { logError, logInfo, logWarn } from "../utils/logger";

export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = process.hrtime.bigint();
  res.on("finish", () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    const message = `${req.method} ${req.originalUrl} -> ${res.statusCode} (${durationMs.toFixed(2)}ms)`;
    if (res.statusCode >= 500) {
      logError(message);
    } else if (res.statusCode >= 400) {
      logWarn(message);
    } else {
      logInfo(message);
    }
  });
  next();
}
