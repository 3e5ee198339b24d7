import { z } from "zod";
import { LOG_LEVELS, LogLevel } from "../utils/logger";

export const PROVIDER_KINDS = ["google-drive", "azure-blob", "supabase", "s3"] as const;
export type CloudProviderKind = (typeof PROVIDER_KINDS)[number];

export type StoreDriver = "csv" | "postgres";

export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: LogLevel;
  corsOrigins: string[];
  jwt: {
    secret: string;
    expiresInSeconds: number;
  };
  store: {
    driver: StoreDriver;
    dataDir: string;
    databaseUrl?: string;
    ssl: boolean;
    synchronize: boolean;
  };
  uploads: {
    dir: string;
    maxBytes: number;
  };
  admin: {
    username: string;
    password: string;
  };
  storagePriority: CloudProviderKind[];
  googleDrive: {
    serviceAccountPath: string;
    folderId?: string;
  };
  azure: {
    account?: string;
    accessKey?: string;
    container: string;
    sasExpiryMinutes: number;
  };
  supabase: {
    url?: string;
    key?: string;
    bucket: string;
  };
  s3: {
    bucket?: string;
    region: string;
    accessKeyId?: string;
    secretAccessKey?: string;
    endpoint?: string;
    forcePathStyle: boolean;
    presignExpirySeconds: number;
  };
}

export const DEFAULT_ADMIN_PASSWORD = "admin123";
const DEV_JWT_SECRET = "dev-jwt-secret-change-me";

// blank values in .env files count as unset
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const flag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .optional()
    .transform((value) => (value === undefined ? fallback : ["true", "1", "yes"].includes(value)));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const list = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );

const envSchema = z
  .object({
    PORT: positiveInt(8000),
    NODE_ENV: z.string().default("development"),
    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
    CORS_ORIGINS: list("*"),
    JWT_SECRET: optionalString,
    JWT_EXPIRES_IN: positiveInt(8 * 60 * 60),

    STORE_DRIVER: z.enum(["csv", "postgres"]).default("csv"),
    DATA_DIR: z.string().default("./data"),
    DATABASE_URL: optionalString,
    DB_SSL: flag(false),
    DB_SYNCHRONIZE: flag(true),

    UPLOADS_DIR: z.string().default("./uploads"),
    MAX_UPLOAD_MB: positiveInt(10),

    ADMIN_USERNAME: z.string().default("admin"),
    ADMIN_PASSWORD: z.string().min(1).default(DEFAULT_ADMIN_PASSWORD),

    STORAGE_PRIORITY: list(PROVIDER_KINDS.join(",")).pipe(z.array(z.enum(PROVIDER_KINDS))),

    GOOGLE_SERVICE_ACCOUNT_PATH: z.string().default("./service-account.json"),
    GOOGLE_DRIVE_FOLDER_ID: optionalString,

    AZURE_STORAGE_ACCOUNT: optionalString,
    AZURE_STORAGE_ACCESS_KEY: optionalString,
    AZURE_STORAGE_CONTAINER: z.string().default("uploads"),
    AZURE_SAS_EXPIRY_MINUTES: positiveInt(60),

    SUPABASE_URL: optionalString,
    SUPABASE_KEY: optionalString,
    SUPABASE_BUCKET: z.string().default("pdfs"),

    S3_BUCKET: optionalString,
    S3_REGION: z.string().default("us-east-1"),
    S3_ACCESS_KEY: optionalString,
    S3_SECRET_KEY: optionalString,
    S3_ENDPOINT: optionalString,
    S3_FORCE_PATH_STYLE: flag(false),
    S3_PRESIGN_EXPIRY_SECONDS: positiveInt(3600),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === "production" && !env.JWT_SECRET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["JWT_SECRET"],
        message: "JWT_SECRET is required in production",
      });
    }
    if (env.STORE_DRIVER === "postgres" && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "DATABASE_URL is required when STORE_DRIVER=postgres",
      });
    }
  });

/**
 * Builds the process configuration from environment variables. Throws with
 * every offending key listed when validation fails.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Missing or invalid environment variables: ${issues}`);
  }

  const e = parsed.data;

  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    corsOrigins: e.CORS_ORIGINS,
    jwt: {
      secret: e.JWT_SECRET ?? DEV_JWT_SECRET,
      expiresInSeconds: e.JWT_EXPIRES_IN,
    },
    store: {
      driver: e.STORE_DRIVER,
      dataDir: e.DATA_DIR,
      databaseUrl: e.DATABASE_URL,
      ssl: e.DB_SSL,
      synchronize: e.DB_SYNCHRONIZE,
    },
    uploads: {
      dir: e.UPLOADS_DIR,
      maxBytes: e.MAX_UPLOAD_MB * 1024 * 1024,
    },
    admin: {
      username: e.ADMIN_USERNAME,
      password: e.ADMIN_PASSWORD,
    },
    // duplicates keep their first position
    storagePriority: [...new Set(e.STORAGE_PRIORITY)],
    googleDrive: {
      serviceAccountPath: e.GOOGLE_SERVICE_ACCOUNT_PATH,
      folderId: e.GOOGLE_DRIVE_FOLDER_ID,
    },
    azure: {
      account: e.AZURE_STORAGE_ACCOUNT,
      accessKey: e.AZURE_STORAGE_ACCESS_KEY,
      container: e.AZURE_STORAGE_CONTAINER,
      sasExpiryMinutes: e.AZURE_SAS_EXPIRY_MINUTES,
    },
    supabase: {
      url: e.SUPABASE_URL,
      key: e.SUPABASE_KEY,
      bucket: e.SUPABASE_BUCKET,
    },
    s3: {
      bucket: e.S3_BUCKET,
      region: e.S3_REGION,
      accessKeyId: e.S3_ACCESS_KEY,
      secretAccessKey: e.S3_SECRET_KEY,
      endpoint: e.S3_ENDPOINT,
      forcePathStyle: e.S3_FORCE_PATH_STYLE,
      presignExpirySeconds: e.S3_PRESIGN_EXPIRY_SECONDS,
    },
  };
};
