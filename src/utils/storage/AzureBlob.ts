import {
  BlobSASPermissions,
  BlobServiceClient,
  ContainerClient,
  StorageSharedKeyCredential,
  generateBlobSASQueryParameters,
} from "@azure/storage-blob";
import path from "path";
import { StorageProvider, StoredFile } from "./types";

export interface AzureBlobOptions {
  account: string;
  accessKey: string;
  container: string;
  sasExpiryMinutes: number;
}

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;
const ACCOUNT_NAME = /^[a-z0-9]{3,24}$/;

export class AzureBlobProvider implements StorageProvider {
  readonly kind = "azure-blob";
  private readonly credential: StorageSharedKeyCredential;
  private readonly containerClient: ContainerClient;
  private containerReady: Promise<unknown> | null = null;

  constructor(private readonly options: AzureBlobOptions) {
    if (!ACCOUNT_NAME.test(options.account)) {
      throw new Error("AZURE_STORAGE_ACCOUNT is not a valid storage account name");
    }
    if (!BASE64.test(options.accessKey) || options.accessKey.length % 4 !== 0) {
      throw new Error("AZURE_STORAGE_ACCESS_KEY is not valid base64");
    }
    this.credential = new StorageSharedKeyCredential(options.account, options.accessKey);
    const service = new BlobServiceClient(`https://${options.account}.blob.core.windows.net`, this.credential);
    this.containerClient = service.getContainerClient(options.container);
  }

  // created once per process; a failed attempt is retried on the next upload
  private async ensureContainer(): Promise<void> {
    if (!this.containerReady) {
      this.containerReady = this.containerClient.createIfNotExists();
    }
    try {
      await this.containerReady;
    } catch (error) {
      this.containerReady = null;
      throw error;
    }
  }

  readSasUrl(blobName: string, attachmentName?: string): string {
    const expiresOn = new Date(Date.now() + this.options.sasExpiryMinutes * 60 * 1000);
    const sasToken = generateBlobSASQueryParameters(
      {
        containerName: this.options.container,
        blobName,
        permissions: BlobSASPermissions.parse("r"),
        expiresOn,
        contentDisposition: attachmentName ? `attachment; filename="${attachmentName}"` : undefined,
      },
      this.credential,
    ).toString();

    return `${this.containerClient.getBlockBlobClient(blobName).url}?${sasToken}`;
  }

  async upload(objectPath: string, content: Buffer, contentType: string): Promise<StoredFile> {
    await this.ensureContainer();

    const blob = this.containerClient.getBlockBlobClient(objectPath);
    await blob.uploadData(content, {
      blobHTTPHeaders: { blobContentType: contentType },
    });

    return {
      viewLink: this.readSasUrl(objectPath),
      downloadLink: this.readSasUrl(objectPath, path.posix.basename(objectPath)),
      storagePath: `${this.options.container}/${objectPath}`,
    };
  }
}
