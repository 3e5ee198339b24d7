import path from "path";
import { ConflictError } from "../../utils/errors";
import { logWarn } from "../../utils/logger";
import { isRole, Role, UserRecord } from "../../utils/types/Usertype";
import { CredentialStore } from "../types";
import { CsvRow, readCsv, writeCsv } from "./csvFile";

// "password" holds the hash; the column name is kept for older files
export const USER_COLUMNS = ["username", "password", "role", "created_at", "updated_at"] as const;

const toRecord = (row: CsvRow): UserRecord => {
  let role: Role = "user";
  if (isRole(row.role)) {
    role = row.role;
  } else {
    logWarn(`Unknown role "${row.role}" for ${row.username}, treating as user`);
  }
  return {
    username: row.username,
    passwordHash: row.password,
    role,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
};

const toRow = (record: UserRecord): CsvRow => ({
  username: record.username,
  password: record.passwordHash,
  role: record.role,
  created_at: record.createdAt,
  updated_at: record.updatedAt,
});

export class CsvCredentialStore implements CredentialStore {
  readonly file: string;

  constructor(dataDir: string) {
    this.file = path.join(dataDir, "users.csv");
  }

  private async read(): Promise<UserRecord[]> {
    const rows = await readCsv(this.file, USER_COLUMNS);
    return rows.filter((row) => row.username.length > 0).map(toRecord);
  }

  private async write(records: UserRecord[]): Promise<void> {
    await writeCsv(this.file, USER_COLUMNS, records.map(toRow));
  }

  async list(): Promise<UserRecord[]> {
    return (await this.read()).sort((a, b) => a.username.localeCompare(b.username));
  }

  async find(username: string): Promise<UserRecord | null> {
    return (await this.read()).find((record) => record.username === username) ?? null;
  }

  async count(): Promise<number> {
    return (await this.read()).length;
  }

  async create(record: UserRecord): Promise<void> {
    const records = await this.read();
    if (records.some((existing) => existing.username === record.username)) {
      throw new ConflictError("Username already exists");
    }
    records.push(record);
    await this.write(records);
  }

  async update(
    username: string,
    patch: { passwordHash?: string; role?: Role; updatedAt: string },
  ): Promise<UserRecord | null> {
    const records = await this.read();
    const index = records.findIndex((record) => record.username === username);
    if (index === -1) return null;

    const current = records[index];
    const updated: UserRecord = {
      ...current,
      passwordHash: patch.passwordHash ?? current.passwordHash,
      role: patch.role ?? current.role,
      updatedAt: patch.updatedAt,
    };
    records[index] = updated;
    await this.write(records);
    return updated;
  }

  async remove(username: string): Promise<boolean> {
    const records = await this.read();
    const remaining = records.filter((record) => record.username !== username);
    if (remaining.length === records.length) return false;

    await this.write(remaining);
    return true;
  }
}
