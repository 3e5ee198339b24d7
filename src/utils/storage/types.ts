import { CloudProviderKind } from "../../config/env";

export type ProviderKind = CloudProviderKind | "local";

export interface StoredFile {
  viewLink: string;
  downloadLink: string;
  // provider-side location: blob key, bucket path, drive file id or disk path
  storagePath: string;
}

export interface StorageProvider {
  readonly kind: ProviderKind;
  upload(objectPath: string, content: Buffer, contentType: string): Promise<StoredFile>;
}
