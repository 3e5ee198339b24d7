import { UserService } from "../services/userService";
import { logInfo, logWarn } from "../utils/logger";
import { AppConfig, DEFAULT_ADMIN_PASSWORD } from "./env";

// creates the first admin when the credential store is empty
export const seedAdmin = async (users: UserService, config: AppConfig): Promise<boolean> => {
  if ((await users.count()) > 0) {
    return false;
  }

  await users.createUser({
    username: config.admin.username,
    password: config.admin.password,
    role: "admin",
  });
  logInfo(`Seeded admin user "${config.admin.username}"`);

  if (config.admin.password === DEFAULT_ADMIN_PASSWORD) {
    logWarn("Admin account uses the default password; set ADMIN_PASSWORD");
  }
  return true;
};
