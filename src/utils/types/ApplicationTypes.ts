export const UPLOAD_CATEGORIES = ["resume", "job_description", "audio-note"] as const;
export type UploadCategory = (typeof UPLOAD_CATEGORIES)[number];

export const DEFAULT_STATUS = "applied";

export interface ApplicationRecord {
  id: number;
  username: string;
  company: string;
  jobDescription: string;
  originalFilename: string;
  // ISO-8601 creation time
  timestamp: string;
  downloadLink: string;
  viewLink: string;
  status: string;
}

export type ApplicationDraft = Omit<ApplicationRecord, "id">;

export type ApplicationPatch = Partial<
  Pick<ApplicationRecord, "company" | "jobDescription" | "status" | "originalFilename" | "downloadLink" | "viewLink">
>;

export interface IncomingFile {
  originalName: string;
  buffer: Buffer;
}

export interface ApplicationPage {
  applications: ApplicationRecord[];
  total: number;
  limit: number | null;
  offset: number;
}

// wire shape; keys follow the CSV columns
export interface ApplicationResponse {
  id: number;
  username: string;
  company: string;
  jobdescription: string;
  filename: string;
  timestamp: string;
  download_link: string;
  view_link: string;
  status: string;
}

export const toApplicationResponse = (record: ApplicationRecord): ApplicationResponse => ({
  id: record.id,
  username: record.username,
  company: record.company,
  jobdescription: record.jobDescription,
  filename: record.originalFilename,
  timestamp: record.timestamp,
  download_link: record.downloadLink,
  view_link: record.viewLink,
  status: record.status,
});
