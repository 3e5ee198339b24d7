import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { StorageProvider, StoredFile } from "./types";

export const LOCAL_UPLOADS_ROUTE = "/uploads";

/**
 * Stores files under a root directory served by the app at /uploads. Always
 * available; also the fallback target when a cloud upload fails.
 */
export class LocalDiskProvider implements StorageProvider {
  readonly kind = "local";
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  resolve(objectPath: string): string {
    const target = path.resolve(this.rootDir, objectPath);
    if (!target.startsWith(this.rootDir + path.sep)) {
      throw new Error(`Refusing to write outside ${this.rootDir}: ${objectPath}`);
    }
    return target;
  }

  async upload(objectPath: string, content: Buffer): Promise<StoredFile> {
    const target = this.resolve(objectPath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);

    const link = `${LOCAL_UPLOADS_ROUTE}/${objectPath}`;
    return { viewLink: link, downloadLink: link, storagePath: target };
  }
}
