import { StorageError } from "../errors";
import { contentTypeFor } from "../helpers/fileTypes";
import { logError, logInfo, logWarn } from "../logger";
import { UploadCategory } from "../types/ApplicationTypes";
import { LocalDiskProvider } from "./LocalDisk";
import { ProviderKind, StorageProvider, StoredFile } from "./types";

export interface UploadedFile extends StoredFile {
  provider: ProviderKind;
  // true when the bound cloud provider failed and the file went to local disk
  fallback: boolean;
}

const UNSAFE = /[^A-Za-z0-9._-]/g;

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

export const formatStamp = (at: Date): string =>
  `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}_` +
  `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}${pad(at.getUTCMilliseconds(), 3)}`;

/**
 * `{owner}/{category}/{name}_{stamp}.{ext}`, with directory parts dropped from
 * the original name and unsafe characters replaced by `_`.
 */
export const buildObjectPath = (owner: string, category: UploadCategory, filename: string, at: Date): string => {
  const leaf = filename.split(/[\\/]/).pop() ?? "";
  const dot = leaf.lastIndexOf(".");
  const base = (dot > 0 ? leaf.slice(0, dot) : leaf).replace(UNSAFE, "_") || "file";
  const ext = dot > 0 ? leaf.slice(dot + 1).replace(UNSAFE, "_") : "";

  const name = `${base}_${formatStamp(at)}${ext ? `.${ext}` : ""}`;
  return `${owner.replace(UNSAFE, "_")}/${category}/${name}`;
};

export class UploadAdapter {
  constructor(
    private readonly provider: StorageProvider,
    private readonly local: LocalDiskProvider,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  get providerKind(): ProviderKind {
    return this.provider.kind;
  }

  async upload(owner: string, category: UploadCategory, filename: string, content: Buffer): Promise<UploadedFile> {
    const objectPath = buildObjectPath(owner, category, filename, this.clock());
    const contentType = contentTypeFor(filename);

    if (this.provider.kind !== "local") {
      try {
        const stored = await this.provider.upload(objectPath, content, contentType);
        logInfo(`Uploaded ${objectPath} to ${this.provider.kind}`);
        return { ...stored, provider: this.provider.kind, fallback: false };
      } catch (error) {
        logWarn(
          `Upload of ${objectPath} to ${this.provider.kind} failed, storing locally`,
          error instanceof Error ? error.message : error,
        );
      }
    }

    try {
      const stored = await this.local.upload(objectPath, content);
      return { ...stored, provider: "local", fallback: this.provider.kind !== "local" };
    } catch (error) {
      logError(`Local storage of ${objectPath} failed`, error);
      throw new StorageError("File could not be stored", error);
    }
  }
}
