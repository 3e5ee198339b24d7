import { DataSource, Repository } from "typeorm";
import { User } from "../../Entities/User";
import { ConflictError } from "../../utils/errors";
import { isRole, Role, UserRecord } from "../../utils/types/Usertype";
import { CredentialStore } from "../types";

const toRecord = (row: User): UserRecord => ({
  username: row.username,
  passwordHash: row.passwordHash,
  role: isRole(row.role) ? row.role : "user",
  createdAt: row.createdAt.toISOString(),
  updatedAt: row.updatedAt.toISOString(),
});

export class TypeOrmCredentialStore implements CredentialStore {
  private readonly repo: Repository<User>;

  constructor(dataSource: DataSource) {
    this.repo = dataSource.getRepository(User);
  }

  async list(): Promise<UserRecord[]> {
    const rows = await this.repo.find({ order: { username: "ASC" } });
    return rows.map(toRecord);
  }

  async find(username: string): Promise<UserRecord | null> {
    const row = await this.repo.findOne({ where: { username } });
    return row ? toRecord(row) : null;
  }

  async count(): Promise<number> {
    return this.repo.count();
  }

  async create(record: UserRecord): Promise<void> {
    if (await this.repo.exists({ where: { username: record.username } })) {
      throw new ConflictError("Username already exists");
    }
    await this.repo.insert({
      username: record.username,
      passwordHash: record.passwordHash,
      role: record.role,
      createdAt: new Date(record.createdAt),
      updatedAt: new Date(record.updatedAt),
    });
  }

  async update(
    username: string,
    patch: { passwordHash?: string; role?: Role; updatedAt: string },
  ): Promise<UserRecord | null> {
    const row = await this.repo.findOne({ where: { username } });
    if (!row) return null;

    if (patch.passwordHash !== undefined) row.passwordHash = patch.passwordHash;
    if (patch.role !== undefined) row.role = patch.role;
    return toRecord(await this.repo.save(row));
  }

  async remove(username: string): Promise<boolean> {
    if (!(await this.repo.exists({ where: { username } }))) return false;

    await this.repo.delete({ username });
    return true;
  }
}
