import { ApplicationStore, CredentialStore } from "../stores/types";
import { NotFoundError, ValidationError } from "../utils/errors";
import { allowedExtensionsFor, isAllowedFor } from "../utils/helpers/fileTypes";
import { logInfo } from "../utils/logger";
import { OwnerLock } from "../utils/ownerLock";
import { UploadAdapter, UploadedFile } from "../utils/storage/uploadAdapter";
import {
  ApplicationPage,
  ApplicationPatch,
  ApplicationRecord,
  DEFAULT_STATUS,
  IncomingFile,
  UPLOAD_CATEGORIES,
  UploadCategory,
} from "../utils/types/ApplicationTypes";

export interface Paging {
  limit?: number;
  offset?: number;
}

export interface CreateApplicationInput {
  company?: string;
  jobDescription?: string;
  status?: string;
  category?: string;
  file?: IncomingFile;
}

export interface UpdateApplicationInput {
  company?: string;
  jobDescription?: string;
  status?: string;
  category?: string;
  file?: IncomingFile;
}

const MAX_STATUS_LENGTH = 50;

const isCategory = (value: string): value is UploadCategory =>
  (UPLOAD_CATEGORIES as readonly string[]).includes(value);

const requireCompany = (company: string | undefined): string => {
  const trimmed = company?.trim() ?? "";
  if (!trimmed) {
    throw new ValidationError("company is required");
  }
  return trimmed;
};

const normalizeStatus = (status: string): string => {
  const trimmed = status.trim();
  if (trimmed.length > MAX_STATUS_LENGTH) {
    throw new ValidationError(`status must be at most ${MAX_STATUS_LENGTH} characters`);
  }
  return trimmed || DEFAULT_STATUS;
};

const checkPaging = ({ limit, offset }: Paging): void => {
  for (const [name, value] of [
    ["limit", limit],
    ["offset", offset],
  ] as const) {
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      throw new ValidationError(`${name} must be a non-negative integer`);
    }
  }
};

/**
 * Owns the lifecycle of application rows. Every call is scoped to the
 * session's username; writes for one owner are serialized, writes for
 * different owners are not.
 */
export class ApplicationService {
  private readonly locks = new OwnerLock();

  constructor(
    private readonly store: ApplicationStore,
    private readonly credentials: Pick<CredentialStore, "find">,
    private readonly uploads: UploadAdapter,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async list(username: string, paging: Paging = {}): Promise<ApplicationPage> {
    checkPaging(paging);
    const rows = await this.store.list(username);
    const offset = paging.offset ?? 0;
    const end = paging.limit === undefined ? undefined : offset + paging.limit;

    return {
      applications: rows.slice(offset, end),
      total: rows.length,
      limit: paging.limit ?? null,
      offset,
    };
  }

  // cross-user read for admins; the route layer enforces the role
  async adminListAny(username: string, paging: Paging = {}): Promise<ApplicationPage> {
    if (!(await this.credentials.find(username))) {
      throw new NotFoundError("User not found");
    }
    return this.list(username, paging);
  }

  async get(username: string, id: number): Promise<ApplicationRecord> {
    const record = await this.store.find(username, id);
    if (!record) {
      throw new NotFoundError("Application not found");
    }
    return record;
  }

  async create(username: string, input: CreateApplicationInput): Promise<ApplicationRecord> {
    const company = requireCompany(input.company);
    const status = input.status === undefined ? DEFAULT_STATUS : normalizeStatus(input.status);
    const stored = input.file ? await this.storeFile(username, input.file, input.category) : null;

    const record = await this.locks.run(username, () =>
      this.store.insert({
        username,
        company,
        jobDescription: input.jobDescription ?? "",
        originalFilename: input.file?.originalName ?? "",
        timestamp: this.clock().toISOString(),
        downloadLink: stored?.downloadLink ?? "",
        viewLink: stored?.viewLink ?? "",
        status,
      }),
    );
    logInfo(`Application ${record.id} created for ${username}`);
    return record;
  }

  async update(username: string, id: number, input: UpdateApplicationInput): Promise<ApplicationRecord> {
    // fail before uploading anything for a row that is not there
    await this.get(username, id);

    const patch: ApplicationPatch = {};
    if (input.company !== undefined) patch.company = requireCompany(input.company);
    if (input.jobDescription !== undefined) patch.jobDescription = input.jobDescription;
    if (input.status !== undefined) patch.status = normalizeStatus(input.status);

    if (input.file) {
      const stored = await this.storeFile(username, input.file, input.category);
      patch.originalFilename = input.file.originalName;
      patch.downloadLink = stored.downloadLink;
      patch.viewLink = stored.viewLink;
    }

    const updated = await this.locks.run(username, () => this.store.update(username, id, patch));
    if (!updated) {
      throw new NotFoundError("Application not found");
    }
    return updated;
  }

  async remove(username: string, id: number): Promise<void> {
    const removed = await this.locks.run(username, () => this.store.remove(username, id));
    if (!removed) {
      throw new NotFoundError("Application not found");
    }
    logInfo(`Application ${id} deleted for ${username}`);
  }

  async ensureCollection(username: string): Promise<void> {
    await this.locks.run(username, () => this.store.ensureCollection(username));
  }

  async dropCollection(username: string): Promise<void> {
    await this.locks.run(username, () => this.store.dropCollection(username));
  }

  private async storeFile(username: string, file: IncomingFile, rawCategory = "resume"): Promise<UploadedFile> {
    if (!isCategory(rawCategory)) {
      throw new ValidationError(`category must be one of ${UPLOAD_CATEGORIES.join(", ")}`);
    }
    if (!isAllowedFor(rawCategory, file.originalName)) {
      throw new ValidationError(
        `Only ${allowedExtensionsFor(rawCategory).join(", ")} files are allowed for ${rawCategory}`,
      );
    }
    return this.uploads.upload(username, rawCategory, file.originalName, file.buffer);
  }
}
