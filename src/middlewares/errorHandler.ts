import { NextFunction, Request, Response } from "express";
import multer from "multer";
import { AppError, StorageError } from "../utils/errors";
import { logError } from "../utils/logger";

const BODY_ERROR_MESSAGES: Record<string, string> = {
  "entity.parse.failed": "Malformed request body",
  "entity.too.large": "Request body is too large",
};

// body-parser and http-errors mark client faults with a 4xx status and expose: true
const clientError = (err: unknown): { status: number; message: string } | null => {
  if (typeof err !== "object" || err === null) return null;
  if (!("status" in err) || typeof err.status !== "number" || err.status < 400 || err.status >= 500) return null;
  if (!("expose" in err) || err.expose !== true) return null;

  const type = "type" in err && typeof err.type === "string" ? err.type : "";
  const message = "message" in err && typeof err.message === "string" ? err.message : "Bad request";
  return { status: err.status, message: BODY_ERROR_MESSAGES[type] ?? message };
};

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError) {
    if (err.status >= 500) {
      logError(err.message, err instanceof StorageError ? err.reason : undefined);
    }
    res.status(err.status).json({ success: false, message: err.message });
    return;
  }

  if (err instanceof multer.MulterError) {
    const message = err.code === "LIMIT_FILE_SIZE" ? "File is too large" : err.message;
    res.status(400).json({ success: false, message });
    return;
  }

  const client = clientError(err);
  if (client) {
    res.status(client.status).json({ success: false, message: client.message });
    return;
  }

  logError("Unhandled error", err);
  res.status(500).json({ success: false, message: "Server error" });
}
