import { CredentialStore } from "../stores/types";
import { AuthError, NotFoundError, ValidationError } from "../utils/errors";
import { hashPassword, isLegacyHash, verifyPassword } from "../utils/helpers/password";
import { logInfo, logWarn } from "../utils/logger";
import { OwnerLock } from "../utils/ownerLock";
import { PublicUser, Role, SessionUser, toPublicUser, USERNAME_PATTERN, UserRecord } from "../utils/types/Usertype";
import { ApplicationService } from "./applicationService";

// the users file is a single collection
const USERS_KEY = "users";

export interface CreateUserInput {
  username: string;
  password: string;
  role?: Role;
}

export interface UpdateUserInput {
  password?: string;
  role?: Role;
}

export class UserService {
  private readonly lock = new OwnerLock();

  constructor(
    private readonly credentials: CredentialStore,
    private readonly applications: ApplicationService,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Checks a username/password pair. Legacy hashes are upgraded to bcrypt on a
   * successful check.
   */
  async verify(username: string, password: string): Promise<SessionUser> {
    const user = await this.credentials.find(username);
    if (!user || !(await verifyPassword(password, user.passwordHash))) {
      logWarn(`Failed login attempt for ${username}`);
      throw new AuthError("Invalid credentials");
    }

    if (isLegacyHash(user.passwordHash)) {
      const passwordHash = await hashPassword(password);
      const upgraded = await this.lock.run(USERS_KEY, async () => {
        // a reset that landed since the check wins
        const current = await this.credentials.find(username);
        if (!current || current.passwordHash !== user.passwordHash) return false;
        await this.credentials.update(username, { passwordHash, updatedAt: this.clock().toISOString() });
        return true;
      });
      if (upgraded) {
        logInfo(`Upgraded stored password hash for ${username}`);
      }
    }

    return { username: user.username, role: user.role };
  }

  async findSessionUser(username: string): Promise<SessionUser | null> {
    const user = await this.credentials.find(username);
    return user ? { username: user.username, role: user.role } : null;
  }

  async listUsers(): Promise<PublicUser[]> {
    return (await this.credentials.list()).map(toPublicUser);
  }

  async count(): Promise<number> {
    return this.credentials.count();
  }

  async createUser(input: CreateUserInput): Promise<PublicUser> {
    if (!USERNAME_PATTERN.test(input.username)) {
      throw new ValidationError("username may only contain letters, digits, '.', '_' and '-'");
    }
    if (!input.password) {
      throw new ValidationError("password is required");
    }

    const now = this.clock().toISOString();
    const record: UserRecord = {
      username: input.username,
      passwordHash: await hashPassword(input.password),
      role: input.role ?? "user",
      createdAt: now,
      updatedAt: now,
    };
    await this.lock.run(USERS_KEY, () => this.credentials.create(record));
    await this.applications.ensureCollection(record.username);

    logInfo(`User ${record.username} created with role ${record.role}`);
    return toPublicUser(record);
  }

  async updateUser(username: string, input: UpdateUserInput): Promise<PublicUser> {
    const passwordHash = input.password ? await hashPassword(input.password) : undefined;

    const updated = await this.lock.run(USERS_KEY, () =>
      this.credentials.update(username, {
        passwordHash,
        role: input.role,
        updatedAt: this.clock().toISOString(),
      }),
    );
    if (!updated) {
      throw new NotFoundError("User not found");
    }
    return toPublicUser(updated);
  }

  async deleteUser(username: string, actor: SessionUser): Promise<void> {
    if (username === actor.username) {
      throw new ValidationError("Admins cannot delete their own account");
    }

    const removed = await this.lock.run(USERS_KEY, () => this.credentials.remove(username));
    if (!removed) {
      throw new NotFoundError("User not found");
    }
    await this.applications.dropCollection(username);
    logInfo(`User ${username} deleted with their applications`);
  }
}
