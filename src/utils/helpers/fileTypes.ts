import { UploadCategory } from "../types/ApplicationTypes";

const DOCUMENT_TYPES: Record<string, string> = {
  pdf: "application/pdf",
  doc: "application/msword",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  txt: "text/plain",
};

const AUDIO_TYPES: Record<string, string> = {
  mp3: "audio/mpeg",
  m4a: "audio/mp4",
  wav: "audio/wav",
  webm: "audio/webm",
  ogg: "audio/ogg",
};

export const extensionOf = (filename: string): string => {
  const dot = filename.lastIndexOf(".");
  return dot > 0 ? filename.slice(dot + 1).toLowerCase() : "";
};

export const contentTypeFor = (filename: string): string => {
  const ext = extensionOf(filename);
  return DOCUMENT_TYPES[ext] ?? AUDIO_TYPES[ext] ?? "application/octet-stream";
};

export const isAllowedUpload = (filename: string): boolean => {
  const ext = extensionOf(filename);
  return ext in DOCUMENT_TYPES || ext in AUDIO_TYPES;
};

export const isAllowedFor = (category: UploadCategory, filename: string): boolean => {
  const ext = extensionOf(filename);
  return category === "audio-note" ? ext in AUDIO_TYPES : ext in DOCUMENT_TYPES;
};

export const allowedExtensionsFor = (category: UploadCategory): string[] =>
  Object.keys(category === "audio-note" ? AUDIO_TYPES : DOCUMENT_TYPES);
