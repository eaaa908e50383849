import { logger } from "../config/logger.js";
import { isUniqueViolation } from "../db/index.js";
import { conflict, DomainError, validationError } from "../domain/errors.js";
import { hashToken, type IApiTokenRepository } from "./api-token-repository.js";
import { assertNewPassword, hashPassword, verifyPassword } from "./password.js";
import type { IUserRepository, User } from "./user-repository.js";

export interface Registration {
  username: string;
  email: string;
  password: string;
  confirmPassword: string;
  firstName?: string;
  lastName?: string;
}

const USERNAME_TAKEN = "A user with that username already exists.";
const INVALID_CREDENTIALS = "Invalid username or password";

/** Registration, credential exchange and logout. */
export class CredentialService {
  constructor(
    private readonly users: IUserRepository,
    private readonly tokens: IApiTokenRepository,
  ) {}

  /** New accounts are always readers; elevated roles come from role applications. */
  async register(input: Registration): Promise<{ user: User; token: string }> {
    const username = input.username.trim();
    const email = input.email.trim();
    if (!username) throw validationError("Username is required.", { username: ["This field may not be blank."] });
    if (!email) throw validationError("Email is required.", { email: ["This field may not be blank."] });
    assertNewPassword(input.password, input.confirmPassword);

    if (await this.users.getByUsername(username)) throw conflict(USERNAME_TAKEN);

    let user: User;
    try {
      user = await this.users.create({
        username,
        email,
        passwordHash: await hashPassword(input.password),
        firstName: input.firstName?.trim(),
        lastName: input.lastName?.trim(),
      });
    } catch (err) {
      if (isUniqueViolation(err)) throw conflict(USERNAME_TAKEN);
      throw err;
    }

    const token = await this.tokens.issue(user.id, "registration");
    logger.info("User registered", { userId: user.id, username });
    return { user, token };
  }

  /** Exchange a username and password for a new API token. */
  async exchangeCredentials(username: string, password: string): Promise<string> {
    const user = await this.users.getByUsername(username.trim());
    const stored = user ? await this.users.getPasswordHash(user.id) : null;
    if (!user || !stored || !(await verifyPassword(password, stored))) {
      logger.warn("Credential exchange failed", { username });
      throw new DomainError("UNAUTHENTICATED", INVALID_CREDENTIALS);
    }
    return this.tokens.issue(user.id, "login");
  }

  async revokeToken(token: string): Promise<boolean> {
    return this.tokens.revokeByHash(hashToken(token));
  }
}
