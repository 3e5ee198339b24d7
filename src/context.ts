import { AppConfig } from "./config/env";
import { ApplicationService } from "./services/applicationService";
import { UserService } from "./services/userService";
import { Stores } from "./stores/types";
import { LocalDiskProvider } from "./utils/storage/LocalDisk";
import { StorageProvider } from "./utils/storage/types";
import { UploadAdapter } from "./utils/storage/uploadAdapter";

/**
 * Everything a request handler needs, built once at startup and handed to
 * the route factories.
 */
export interface AppContext {
  config: AppConfig;
  stores: Stores;
  uploads: UploadAdapter;
  local: LocalDiskProvider;
  applications: ApplicationService;
  users: UserService;
}

export const buildContext = (
  config: AppConfig,
  stores: Stores,
  provider: StorageProvider,
  local: LocalDiskProvider,
  clock: () => Date = () => new Date(),
): AppContext => {
  const uploads = new UploadAdapter(provider, local, clock);
  const applications = new ApplicationService(stores.applications, stores.credentials, uploads, clock);
  const users = new UserService(stores.credentials, applications, clock);
  return { config, stores, uploads, local, applications, users };
};
