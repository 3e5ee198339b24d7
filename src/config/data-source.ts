import { DataSource } from "typeorm";
import { Application } from "../Entities/Application";
import { User } from "../Entities/User";
import { AppConfig } from "./env";

export const ENTITIES = [User, Application];

export const createDataSource = (config: AppConfig): DataSource =>
  new DataSource({
    type: "postgres",
    url: config.store.databaseUrl,
    synchronize: config.store.synchronize,
    logging: false,
    ssl: config.store.ssl ? { rejectUnauthorized: false } : false,
    entities: ENTITIES,
  });
