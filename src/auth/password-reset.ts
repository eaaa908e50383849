import { randomBytes } from "node:crypto";
import { logger } from "../config/logger.js";
import type { DrizzleDb } from "../db/index.js";
import { notFound, validationError } from "../domain/errors.js";
import type { NotificationDispatcher } from "../email/notification-dispatcher.js";
import { DrizzleApiTokenRepository, hashToken } from "./api-token-repository.js";
import { assertNewPassword, hashPassword } from "./password.js";
import { DrizzleResetTokenRepository, type IResetTokenRepository } from "./reset-token-repository.js";
import { DrizzleUserRepository, type IUserRepository } from "./user-repository.js";

export const RESET_TOKEN_TTL_MS = 5 * 60 * 1000;

export type ResetTokenState = "valid" | "expired" | "invalid";

export interface PasswordResetDeps {
  /** Runs the reset itself: token, password and API tokens change together. */
  db: DrizzleDb;
  users: IUserRepository;
  resetTokens: IResetTokenRepository;
  notifications: NotificationDispatcher;
  appBaseUrl: string;
  now?: () => number;
}

export function resetUrlFor(appBaseUrl: string, token: string): string {
  return `${appBaseUrl.replace(/\/+$/, "")}/reset_password/${token}/`;
}

/**
 * Email-link password reset. Only the SHA-256 digest of a token is stored;
 * tokens are single-use and expire five minutes after issue.
 */
export class PasswordResetService {
  private readonly now: () => number;

  constructor(private readonly deps: PasswordResetDeps) {
    this.now = deps.now ?? Date.now;
  }

  async requestReset(email: string): Promise<{ expiresAt: number }> {
    const user = await this.deps.users.getByEmail(email.trim());
    if (!user) throw notFound("No user with this email exists.");

    const token = randomBytes(16).toString("base64url");
    const expiresAt = this.now() + RESET_TOKEN_TTL_MS;
    await this.deps.resetTokens.create(user.id, hashToken(token), expiresAt);

    const report = await this.deps.notifications.passwordReset(user, resetUrlFor(this.deps.appBaseUrl, token));
    if (report.failed.length > 0) {
      logger.warn("Password reset link could not be emailed", { userId: user.id });
    }
    return { expiresAt };
  }

  async checkToken(token: string): Promise<ResetTokenState> {
    const record = await this.deps.resetTokens.getByHash(hashToken(token));
    if (!record || record.used) return "invalid";
    return record.expiresAt <= this.now() ? "expired" : "valid";
  }

  async resetPassword(token: string, password: string, confirmPassword: string): Promise<void> {
    const record = await this.deps.resetTokens.getByHash(hashToken(token));
    if (!record || record.used) throw notFound("Invalid or expired reset link.");
    if (record.expiresAt <= this.now()) throw validationError("This reset link has expired.");
    assertNewPassword(password, confirmPassword);

    const passwordHash = await hashPassword(password);
    const revoked = await this.deps.db.transaction(async (tx) => {
      if (!(await new DrizzleResetTokenRepository(tx).consume(record.id))) {
        throw notFound("Invalid or expired reset link.");
      }
      await new DrizzleUserRepository(tx).setPasswordHash(record.userId, passwordHash);
      return new DrizzleApiTokenRepository(tx).revokeAllForUser(record.userId);
    });
    logger.info("Password reset", { userId: record.userId, revokedTokens: revoked });
  }
}
