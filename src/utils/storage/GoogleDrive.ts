import { drive_v3, google } from "googleapis";
import { PassThrough } from "stream";
import { z } from "zod";
import { StorageProvider, StoredFile } from "./types";

const SCOPES = ["https://www.googleapis.com/auth/drive.file"];

const serviceAccountSchema = z.object({
  client_email: z.string().email(),
  private_key: z.string().includes("PRIVATE KEY"),
});

export type ServiceAccountKey = z.infer<typeof serviceAccountSchema>;

/**
 * Parses the contents of a service-account key file. Throws when the file is
 * not JSON or lacks the client email / private key pair.
 */
export const parseServiceAccount = (raw: string): ServiceAccountKey => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new Error("service account file is not valid JSON");
  }
  const parsed = serviceAccountSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`service account file is missing ${parsed.error.issues.map((i) => i.path.join(".")).join(", ")}`);
  }
  return parsed.data;
};

export class GoogleDriveProvider implements StorageProvider {
  readonly kind = "google-drive";
  private readonly drive: drive_v3.Drive;

  constructor(
    key: ServiceAccountKey,
    private readonly folderId?: string,
  ) {
    const auth = new google.auth.GoogleAuth({ credentials: key, scopes: SCOPES });
    this.drive = google.drive({ version: "v3", auth });
  }

  async upload(objectPath: string, content: Buffer, contentType: string): Promise<StoredFile> {
    const bufferStream = new PassThrough();
    bufferStream.end(content);

    const response = await this.drive.files.create({
      requestBody: {
        name: objectPath,
        mimeType: contentType,
        parents: this.folderId ? [this.folderId] : undefined,
      },
      media: {
        mimeType: contentType,
        body: bufferStream,
      },
      fields: "id",
    });

    const fileId = response.data.id;
    if (!fileId) {
      throw new Error("Google Drive returned no file id");
    }

    // anyone with the link can read
    await this.drive.permissions.create({
      fileId,
      requestBody: { role: "reader", type: "anyone" },
    });

    return {
      viewLink: `https://drive.google.com/file/d/${fileId}/view`,
      downloadLink: `https://drive.google.com/uc?export=download&id=${fileId}`,
      storagePath: fileId,
    };
  }
}
