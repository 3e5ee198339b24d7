import { readFile } from "fs/promises";
import path from "path";
import { AppConfig, CloudProviderKind } from "../../config/env";
import { fileExists } from "../helpers/fsHelpers";
import { logDebug, logInfo, logWarn } from "../logger";
import { AzureBlobProvider } from "./AzureBlob";
import { GoogleDriveProvider, parseServiceAccount } from "./GoogleDrive";
import { LocalDiskProvider } from "./LocalDisk";
import { S3Provider } from "./S3";
import { SupabaseProvider } from "./Supabase";

// exactly one of these is bound per process
export type BoundProvider =
  | GoogleDriveProvider
  | AzureBlobProvider
  | SupabaseProvider
  | S3Provider
  | LocalDiskProvider;

interface Candidate {
  // all required settings are present
  configured(config: AppConfig): Promise<boolean>;
  // throws when the settings are present but malformed
  build(config: AppConfig): Promise<BoundProvider>;
}

const candidates: Record<CloudProviderKind, Candidate> = {
  "google-drive": {
    configured: (config) => fileExists(path.resolve(config.googleDrive.serviceAccountPath)),
    build: async (config) => {
      const raw = await readFile(path.resolve(config.googleDrive.serviceAccountPath), "utf8");
      return new GoogleDriveProvider(parseServiceAccount(raw), config.googleDrive.folderId);
    },
  },
  "azure-blob": {
    configured: async ({ azure }) => Boolean(azure.account && azure.accessKey && azure.container),
    build: async ({ azure }) =>
      new AzureBlobProvider({
        account: azure.account ?? "",
        accessKey: azure.accessKey ?? "",
        container: azure.container,
        sasExpiryMinutes: azure.sasExpiryMinutes,
      }),
  },
  supabase: {
    configured: async ({ supabase }) => Boolean(supabase.url && supabase.key && supabase.bucket),
    build: async ({ supabase }) =>
      new SupabaseProvider({
        url: supabase.url ?? "",
        key: supabase.key ?? "",
        bucket: supabase.bucket,
      }),
  },
  s3: {
    configured: async ({ s3 }) => Boolean(s3.bucket && s3.region && s3.accessKeyId && s3.secretAccessKey),
    build: async ({ s3 }) =>
      new S3Provider({
        bucket: s3.bucket ?? "",
        region: s3.region,
        accessKeyId: s3.accessKeyId ?? "",
        secretAccessKey: s3.secretAccessKey ?? "",
        endpoint: s3.endpoint,
        forcePathStyle: s3.forcePathStyle,
        presignExpirySeconds: s3.presignExpirySeconds,
      }),
  },
};

/**
 * Walks the configured priority list and binds the first provider whose
 * settings are present and well formed. Malformed settings are logged and
 * skipped; local disk is bound when no cloud provider qualifies.
 */
export async function selectStorageProvider(
  config: AppConfig,
  local: LocalDiskProvider = new LocalDiskProvider(config.uploads.dir),
): Promise<BoundProvider> {
  for (const kind of config.storagePriority) {
    const candidate = candidates[kind];

    if (!(await candidate.configured(config))) {
      logDebug(`Storage provider ${kind} not configured`);
      continue;
    }

    try {
      const provider = await candidate.build(config);
      logInfo(`Storage provider bound: ${kind}`);
      return provider;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logWarn(`Storage provider ${kind} has invalid settings, skipping: ${reason}`);
    }
  }

  logInfo(`Storage provider bound: local (${local.rootDir})`);
  return local;
}
