import { rm } from "fs/promises";
import path from "path";
import {
  ApplicationDraft,
  ApplicationPatch,
  ApplicationRecord,
  DEFAULT_STATUS,
} from "../../utils/types/ApplicationTypes";
import { logWarn } from "../../utils/logger";
import { byNewestFirst, compactPatch, nextApplicationId } from "../applicationOrder";
import { ApplicationStore } from "../types";
import { fileExists } from "../../utils/helpers/fsHelpers";
import { CsvRow, readCsv, writeCsv } from "./csvFile";

export const APPLICATION_COLUMNS = [
  "id",
  "company",
  "jobdescription",
  "filename",
  "timestamp",
  "download_link",
  "view_link",
  "status",
] as const;

const toRecord = (row: CsvRow, username: string): ApplicationRecord => ({
  id: Number(row.id),
  username,
  company: row.company,
  jobDescription: row.jobdescription,
  originalFilename: row.filename,
  timestamp: row.timestamp,
  downloadLink: row.download_link,
  // older files predate the view_link column
  viewLink: row.view_link || row.download_link,
  status: row.status || DEFAULT_STATUS,
});

const toRow = (record: ApplicationRecord): CsvRow => ({
  id: String(record.id),
  company: record.company,
  jobdescription: record.jobDescription,
  filename: record.originalFilename,
  timestamp: record.timestamp,
  download_link: record.downloadLink,
  view_link: record.viewLink,
  status: record.status,
});

/**
 * One CSV file per user. Every mutation reads the whole collection and
 * rewrites it newest first; callers serialize writes per owner.
 */
export class CsvApplicationStore implements ApplicationStore {
  constructor(private readonly dataDir: string) {}

  fileFor(username: string): string {
    return path.join(this.dataDir, `applications_${username}.csv`);
  }

  // rows with an unusable id are kept aside and written back untouched
  private async read(username: string): Promise<{ records: ApplicationRecord[]; unreadable: CsvRow[] }> {
    const rows = await readCsv(this.fileFor(username), APPLICATION_COLUMNS);
    const records: ApplicationRecord[] = [];
    const unreadable: CsvRow[] = [];
    for (const row of rows) {
      const record = toRecord(row, username);
      if (!Number.isInteger(record.id) || record.id < 1) {
        logWarn(`Skipping application row with invalid id "${row.id}" for ${username}`);
        unreadable.push(row);
        continue;
      }
      records.push(record);
    }
    return { records, unreadable };
  }

  private async write(username: string, records: ApplicationRecord[], unreadable: CsvRow[] = []): Promise<void> {
    const sorted = [...records].sort(byNewestFirst);
    await writeCsv(this.fileFor(username), APPLICATION_COLUMNS, [...sorted.map(toRow), ...unreadable]);
  }

  async list(username: string): Promise<ApplicationRecord[]> {
    return (await this.read(username)).records.sort(byNewestFirst);
  }

  async find(username: string, id: number): Promise<ApplicationRecord | null> {
    const { records } = await this.read(username);
    return records.find((record) => record.id === id) ?? null;
  }

  async insert(draft: ApplicationDraft): Promise<ApplicationRecord> {
    const { records, unreadable } = await this.read(draft.username);
    const record: ApplicationRecord = { ...draft, id: nextApplicationId(records) };
    records.push(record);
    await this.write(draft.username, records, unreadable);
    return record;
  }

  async update(username: string, id: number, patch: ApplicationPatch): Promise<ApplicationRecord | null> {
    const { records, unreadable } = await this.read(username);
    const index = records.findIndex((record) => record.id === id);
    if (index === -1) return null;

    const updated: ApplicationRecord = { ...records[index], ...compactPatch(patch), id, username };
    records[index] = updated;
    await this.write(username, records, unreadable);
    return updated;
  }

  async remove(username: string, id: number): Promise<boolean> {
    const { records, unreadable } = await this.read(username);
    const remaining = records.filter((record) => record.id !== id);
    if (remaining.length === records.length) return false;

    await this.write(username, remaining, unreadable);
    return true;
  }

  async ensureCollection(username: string): Promise<void> {
    if (!(await fileExists(this.fileFor(username)))) {
      await this.write(username, []);
    }
  }

  async dropCollection(username: string): Promise<void> {
    await rm(this.fileFor(username), { force: true });
  }
}
