import path from "path";
import { DataSource } from "typeorm";
import { AppConfig } from "../config/env";
import { createDataSource } from "../config/data-source";
import { logInfo } from "../utils/logger";
import { CsvApplicationStore } from "./csv/CsvApplicationStore";
import { CsvCredentialStore } from "./csv/CsvCredentialStore";
import { TypeOrmApplicationStore } from "./typeorm/TypeOrmApplicationStore";
import { TypeOrmCredentialStore } from "./typeorm/TypeOrmCredentialStore";
import { Stores } from "./types";

export const createCsvStores = (dataDir: string): Stores => ({
  driver: "csv",
  applications: new CsvApplicationStore(dataDir),
  credentials: new CsvCredentialStore(dataDir),
  close: async () => undefined,
});

export const createTypeOrmStores = (dataSource: DataSource): Stores => ({
  driver: "postgres",
  applications: new TypeOrmApplicationStore(dataSource),
  credentials: new TypeOrmCredentialStore(dataSource),
  close: async () => {
    if (dataSource.isInitialized) {
      await dataSource.destroy();
    }
  },
});

export async function openStores(config: AppConfig): Promise<Stores> {
  if (config.store.driver === "postgres") {
    const dataSource = createDataSource(config);
    await dataSource.initialize();
    logInfo("Database connected");
    return createTypeOrmStores(dataSource);
  }

  const dataDir = path.resolve(config.store.dataDir);
  logInfo(`Using CSV store in ${dataDir}`);
  return createCsvStores(dataDir);
}
