import "reflect-metadata";
import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { seedAdmin } from "./config/seed";
import { buildContext } from "./context";
import { openStores } from "./stores";
import { logError, logInfo, setLogLevel } from "./utils/logger";
import { LocalDiskProvider } from "./utils/storage/LocalDisk";
import { selectStorageProvider } from "./utils/storage/selectProvider";

dotenv.config();

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const stores = await openStores(config);
  const local = new LocalDiskProvider(config.uploads.dir);
  const provider = await selectStorageProvider(config, local);
  const ctx = buildContext(config, stores, provider, local);

  await seedAdmin(ctx.users, config);

  const app = createApp(ctx);
  const server = app.listen(config.port, () => {
    logInfo(`Server is running on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    logInfo(`${signal} received, shutting down`);
    server.close(() => {
      stores
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logError("Failed to close stores", error);
          process.exit(1);
        });
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  logError("Startup failed", error);
  process.exit(1);
});
