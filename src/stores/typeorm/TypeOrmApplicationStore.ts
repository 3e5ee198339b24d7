import { DataSource, Repository } from "typeorm";
import { Application } from "../../Entities/Application";
import { ApplicationDraft, ApplicationPatch, ApplicationRecord } from "../../utils/types/ApplicationTypes";
import { compactPatch } from "../applicationOrder";
import { ApplicationStore } from "../types";

const toRecord = (row: Application): ApplicationRecord => ({
  id: row.id,
  username: row.username,
  company: row.company,
  jobDescription: row.jobDescription,
  originalFilename: row.originalFilename,
  timestamp: row.timestamp.toISOString(),
  downloadLink: row.downloadLink,
  viewLink: row.viewLink || row.downloadLink,
  status: row.status,
});

/**
 * Row-level store over the `applications` table. Id assignment and the insert
 * share one transaction.
 */
export class TypeOrmApplicationStore implements ApplicationStore {
  private readonly repo: Repository<Application>;

  constructor(private readonly dataSource: DataSource) {
    this.repo = dataSource.getRepository(Application);
  }

  async list(username: string): Promise<ApplicationRecord[]> {
    const rows = await this.repo.find({
      where: { username },
      order: { timestamp: "DESC", id: "DESC" },
    });
    return rows.map(toRecord);
  }

  async find(username: string, id: number): Promise<ApplicationRecord | null> {
    const row = await this.repo.findOne({ where: { username, id } });
    return row ? toRecord(row) : null;
  }

  async insert(draft: ApplicationDraft): Promise<ApplicationRecord> {
    return this.dataSource.transaction(async (manager) => {
      const max = await manager.maximum(Application, "id", { username: draft.username });
      const row = manager.create(Application, {
        ...draft,
        id: (max ?? 0) + 1,
        timestamp: new Date(draft.timestamp),
      });
      return toRecord(await manager.save(row));
    });
  }

  async update(username: string, id: number, patch: ApplicationPatch): Promise<ApplicationRecord | null> {
    const row = await this.repo.findOne({ where: { username, id } });
    if (!row) return null;

    this.repo.merge(row, compactPatch(patch));
    return toRecord(await this.repo.save(row));
  }

  async remove(username: string, id: number): Promise<boolean> {
    if (!(await this.repo.exists({ where: { username, id } }))) return false;

    await this.repo.delete({ username, id });
    return true;
  }

  // rows are created on demand; a user with no rows has an empty collection
  async ensureCollection(): Promise<void> {}

  async dropCollection(username: string): Promise<void> {
    await this.repo.delete({ username });
  }
}
