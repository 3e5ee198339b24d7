import { GetObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import path from "path";
import { StorageProvider, StoredFile } from "./types";

export interface S3Options {
  bucket: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  endpoint?: string;
  forcePathStyle: boolean;
  presignExpirySeconds: number;
}

const BUCKET_NAME = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;

export class S3Provider implements StorageProvider {
  readonly kind = "s3";
  readonly client: S3Client;

  constructor(private readonly options: S3Options) {
    if (!BUCKET_NAME.test(options.bucket)) {
      throw new Error(`S3_BUCKET "${options.bucket}" is not a valid bucket name`);
    }
    if (options.endpoint) {
      // throws on a malformed endpoint
      new URL(options.endpoint);
    }
    this.client = new S3Client({
      region: options.region,
      endpoint: options.endpoint,
      forcePathStyle: options.forcePathStyle,
      credentials: {
        accessKeyId: options.accessKeyId,
        secretAccessKey: options.secretAccessKey,
      },
    });
  }

  private presign(key: string, attachmentName?: string): Promise<string> {
    const command = new GetObjectCommand({
      Bucket: this.options.bucket,
      Key: key,
      ResponseContentDisposition: attachmentName ? `attachment; filename="${attachmentName}"` : undefined,
    });
    return getSignedUrl(this.client, command, { expiresIn: this.options.presignExpirySeconds });
  }

  async upload(objectPath: string, content: Buffer, contentType: string): Promise<StoredFile> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.options.bucket,
        Key: objectPath,
        Body: content,
        ContentType: contentType,
        ContentLength: content.length,
      }),
    );

    return {
      viewLink: await this.presign(objectPath),
      downloadLink: await this.presign(objectPath, path.posix.basename(objectPath)),
      storagePath: `${this.options.bucket}/${objectPath}`,
    };
  }
}
