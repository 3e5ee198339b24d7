import { ApplicationPatch, ApplicationRecord } from "../utils/types/ApplicationTypes";

const toMillis = (timestamp: string): number => {
  const parsed = Date.parse(timestamp);
  return Number.isNaN(parsed) ? 0 : parsed;
};

export const byNewestFirst = (a: ApplicationRecord, b: ApplicationRecord): number =>
  toMillis(b.timestamp) - toMillis(a.timestamp) || b.id - a.id;

export const nextApplicationId = (rows: ApplicationRecord[]): number =>
  rows.reduce((max, row) => Math.max(max, row.id), 0) + 1;

// only the fields the caller supplied
export const compactPatch = (patch: ApplicationPatch): ApplicationPatch => {
  const result: ApplicationPatch = {};
  if (patch.company !== undefined) result.company = patch.company;
  if (patch.jobDescription !== undefined) result.jobDescription = patch.jobDescription;
  if (patch.status !== undefined) result.status = patch.status;
  if (patch.originalFilename !== undefined) result.originalFilename = patch.originalFilename;
  if (patch.downloadLink !== undefined) result.downloadLink = patch.downloadLink;
  if (patch.viewLink !== undefined) result.viewLink = patch.viewLink;
  return result;
};
