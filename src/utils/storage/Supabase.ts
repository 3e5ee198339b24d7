import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { StorageProvider, StoredFile } from "./types";

export interface SupabaseOptions {
  url: string;
  key: string;
  bucket: string;
}

export class SupabaseProvider implements StorageProvider {
  readonly kind = "supabase";
  private readonly client: SupabaseClient;

  constructor(private readonly options: SupabaseOptions) {
    const parsed = new URL(options.url);
    if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
      throw new Error("SUPABASE_URL must be an http(s) URL");
    }
    this.client = createClient(options.url, options.key, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
  }

  async upload(objectPath: string, content: Buffer, contentType: string): Promise<StoredFile> {
    const bucket = this.client.storage.from(this.options.bucket);

    const { error } = await bucket.upload(objectPath, content, { contentType, upsert: true });
    if (error) {
      throw error;
    }

    // public buckets serve one URL for viewing and downloading
    const { data } = bucket.getPublicUrl(objectPath);
    return {
      viewLink: data.publicUrl,
      downloadLink: data.publicUrl,
      storagePath: `${this.options.bucket}/${objectPath}`,
    };
  }
}
