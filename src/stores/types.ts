import { ApplicationDraft, ApplicationPatch, ApplicationRecord } from "../utils/types/ApplicationTypes";
import { Role, UserRecord } from "../utils/types/Usertype";

/**
 * Per-user application collections. Every call is scoped to one owner; no
 * method reads or writes rows of another username.
 */
export interface ApplicationStore {
  /** Rows of one owner, newest first. */
  list(username: string): Promise<ApplicationRecord[]>;
  find(username: string, id: number): Promise<ApplicationRecord | null>;
  /** Assigns the next id of the owner's collection. */
  insert(draft: ApplicationDraft): Promise<ApplicationRecord>;
  update(username: string, id: number, patch: ApplicationPatch): Promise<ApplicationRecord | null>;
  remove(username: string, id: number): Promise<boolean>;
  ensureCollection(username: string): Promise<void>;
  dropCollection(username: string): Promise<void>;
}

export interface CredentialStore {
  list(): Promise<UserRecord[]>;
  find(username: string): Promise<UserRecord | null>;
  count(): Promise<number>;
  create(record: UserRecord): Promise<void>;
  update(
    username: string,
    patch: { passwordHash?: string; role?: Role; updatedAt: string },
  ): Promise<UserRecord | null>;
  remove(username: string): Promise<boolean>;
}

export interface Stores {
  driver: "csv" | "postgres";
  applications: ApplicationStore;
  credentials: CredentialStore;
  close(): Promise<void>;
}
