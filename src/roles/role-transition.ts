/**
 * Role transitions: the one place a user's role changes.
 *
 * Both entry points (a staff decision on an application and the
 * administrative role edit) run the role update and the subscription
 * deactivation in a single transaction, so a non-reader never keeps an
 * active subscription.
 */

import { logger } from "../config/logger.js";
import { type DrizzleDb, isUniqueViolation } from "../db/index.js";
import { DrizzleUserRepository, type User } from "../auth/user-repository.js";
import { conflict, notFound } from "../domain/errors.js";
import type { AppliableRole, ReviewDecision, Role } from "../domain/types.js";
import type { DispatchReport, NotificationDispatcher } from "../email/notification-dispatcher.js";
import { DrizzleProfileRepository } from "../org/profile-repository.js";
import { DrizzleSubscriptionRepository } from "../subscriptions/subscription-repository.js";
import { DrizzleRoleApplicationRepository, type RoleApplication } from "./role-application-repository.js";

export interface CreatedProfile {
  kind: AppliableRole;
  id: string;
}

export interface RoleDecisionResult {
  application: RoleApplication;
  role: Role;
  /** Profile the user holds for the new role, or null when none could be attached. */
  profile: CreatedProfile | null;
  deactivated: { journalists: number; publishers: number };
  notification: DispatchReport;
}

export interface RoleAssignmentResult {
  user: User;
  deactivated: { journalists: number; publishers: number };
}

export interface RoleDecisionOptions {
  /** Publisher the new editor or journalist joins. Ignored for other roles. */
  publisherId?: string | null;
  /** Staff user id recorded on the application. */
  decidedBy: string;
}

export function publisherNameFor(username: string): string {
  return `${username} Publishing`;
}

const NO_CHANGES = { journalists: 0, publishers: 0 };

export class RoleTransitionHandler {
  constructor(
    private readonly db: DrizzleDb,
    private readonly notifications: NotificationDispatcher,
  ) {}

  /**
   * Enact a staff decision on a role application.
   *
   * Approval sets the application status, the user's role, deactivates every
   * subscription and gets-or-creates the role profile, all in one transaction.
   * The user is notified after commit. Repeating a decision is harmless;
   * reversing one is a conflict.
   */
  async applyRoleDecision(
    applicationId: string,
    decision: ReviewDecision,
    options: RoleDecisionOptions,
  ): Promise<RoleDecisionResult> {
    const applications = new DrizzleRoleApplicationRepository(this.db);
    const application = await applications.getById(applicationId);
    if (!application) throw notFound("Role application not found.");
    if (application.status !== "pending" && application.status !== decision) {
      throw conflict(`This application has already been ${application.status}.`);
    }

    const publisherId = options.publisherId || null;
    if (publisherId) {
      const publisher = await new DrizzleProfileRepository(this.db).getPublisherById(publisherId);
      if (!publisher) throw notFound("Publisher not found.");
    }

    const users = new DrizzleUserRepository(this.db);
    const user = await users.getById(application.userId);
    if (!user) throw notFound("Applicant not found.");

    if (decision === "rejected") {
      const updated = await this.db.transaction((tx) =>
        recordDecision(new DrizzleRoleApplicationRepository(tx), application.id, "rejected", options.decidedBy),
      );
      logger.info("Role application rejected", { applicationId, userId: user.id, role: application.appliedRole });
      const notification = await this.notifications.roleDecision(user, application.appliedRole, "rejected");
      return {
        application: updated,
        role: user.role,
        profile: null,
        deactivated: NO_CHANGES,
        notification,
      };
    }

    const outcome = await this.runApproval(application, user, publisherId, options.decidedBy);
    logger.info("Role application approved", {
      applicationId,
      userId: user.id,
      role: application.appliedRole,
      profileId: outcome.profile?.id ?? null,
      deactivated: outcome.deactivated,
    });
    if (!outcome.profile) {
      logger.warn("Role granted without a profile: no publisher was selected", {
        applicationId,
        userId: user.id,
        role: application.appliedRole,
      });
    }

    const notification = await this.notifications.roleDecision(user, application.appliedRole, "approved");
    return { ...outcome, role: application.appliedRole, notification };
  }

  /** Administrative role edit. No profile is created and nobody is notified. */
  async assignRole(userId: string, role: Role): Promise<RoleAssignmentResult> {
    const result = await this.db.transaction(async (tx) => {
      const users = new DrizzleUserRepository(tx);
      const user = await users.getById(userId);
      if (!user) throw notFound("User not found.");
      await users.setRole(userId, role);
      const deactivated =
        role === "reader" ? NO_CHANGES : await new DrizzleSubscriptionRepository(tx).deactivateAllForReader(userId);
      return { user: { ...user, role }, deactivated };
    });
    logger.info("User role assigned", { userId, role, deactivated: result.deactivated });
    return result;
  }

  private async runApproval(
    application: RoleApplication,
    user: User,
    publisherId: string | null,
    decidedBy: string,
  ): Promise<Omit<RoleDecisionResult, "role" | "notification">> {
    try {
      return await this.db.transaction(async (tx) => {
        const updated = await recordDecision(
          new DrizzleRoleApplicationRepository(tx),
          application.id,
          "approved",
          decidedBy,
        );
        await new DrizzleUserRepository(tx).setRole(user.id, application.appliedRole);
        const deactivated = await new DrizzleSubscriptionRepository(tx).deactivateAllForReader(user.id);
        const profile = await attachProfile(new DrizzleProfileRepository(tx), application.appliedRole, user, publisherId);
        return { application: updated, profile, deactivated };
      });
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw conflict(`A publisher named "${publisherNameFor(user.username)}" already exists.`);
      }
      throw err;
    }
  }
}

/** Move an application that is still pending or already carries this decision. */
async function recordDecision(
  applications: DrizzleRoleApplicationRepository,
  id: string,
  decision: ReviewDecision,
  decidedBy: string,
): Promise<RoleApplication> {
  const updated = await applications.setStatus(id, decision, decidedBy, ["pending", decision]);
  if (!updated) throw conflict("This application has already been decided.");
  return updated;
}

async function attachProfile(
  profiles: DrizzleProfileRepository,
  role: AppliableRole,
  user: User,
  publisherId: string | null,
): Promise<CreatedProfile | null> {
  switch (role) {
    case "publisher": {
      const publisher = await profiles.getOrCreatePublisher(user.id, publisherNameFor(user.username));
      return { kind: role, id: publisher.id };
    }
    case "editor": {
      if (!publisherId) return null;
      const editor = await profiles.getOrCreateEditor(user.id, publisherId);
      return { kind: role, id: editor.id };
    }
    case "journalist": {
      if (!publisherId) return null;
      const journalist = await profiles.getOrCreateJournalist(user.id, publisherId);
      return { kind: role, id: journalist.id };
    }
  }
}
