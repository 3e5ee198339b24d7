import { Request } from "express";
import multer from "multer";
import { ValidationError } from "../utils/errors";
import { isAllowedUpload } from "../utils/helpers/fileTypes";
import { IncomingFile } from "../utils/types/ApplicationTypes";

export const FILE_FIELD = "file";

export const createUpload = (maxBytes: number) =>
  multer({
    storage: multer.memoryStorage(),
    fileFilter: (_req, file, cb) => {
      if (isAllowedUpload(file.originalname)) {
        cb(null, true);
      } else {
        cb(new ValidationError("Only PDF, DOC, DOCX, TXT or audio files are allowed"));
      }
    },
    limits: {
      fileSize: maxBytes,
      files: 1,
    },
  });

// multer decodes multipart file names as latin1; browsers send UTF-8
const decodeFilename = (name: string): string => Buffer.from(name, "latin1").toString("utf8");

export const uploadedFile = (req: Request): IncomingFile | undefined =>
  req.file ? { originalName: decodeFilename(req.file.originalname), buffer: req.file.buffer } : undefined;
