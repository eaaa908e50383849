import type { AuthUser } from "../auth/index.js";
import { type DrizzleDb, isUniqueViolation } from "../db/index.js";
import { conflict, forbidden, validationError } from "../domain/errors.js";
import type { AppliableRole, ApplicationStatus } from "../domain/types.js";
import { logger } from "../config/logger.js";
import { DrizzleProfileRepository, type Publisher } from "../org/profile-repository.js";
import { DrizzleSubscriptionRepository } from "../subscriptions/subscription-repository.js";
import {
  DrizzleRoleApplicationRepository,
  type RoleApplication,
  type RoleApplicationWithUser,
} from "./role-application-repository.js";

export interface ApplicationStatusView {
  hasPending: boolean;
  pending: RoleApplication | null;
  /** Active subscriptions that an approval would deactivate. */
  activeSubscriptions: { journalists: number; publishers: number };
}

export interface StaffApplicationsView {
  applications: RoleApplicationWithUser[];
  byStatus: Record<ApplicationStatus, RoleApplicationWithUser[]>;
  counts: Record<ApplicationStatus, number> & { total: number };
  publishers: Publisher[];
}

export class RoleApplicationService {
  constructor(private readonly db: DrizzleDb) {}

  /** A reader asks for an elevated role. One pending application per user. */
  async submit(user: AuthUser, appliedRole: AppliableRole, motivation: string): Promise<RoleApplication> {
    if (user.role !== "reader") throw forbidden("Only readers can apply for new roles.");
    const text = motivation.trim();
    if (!text) throw validationError("Motivation is required.", { motivation: ["This field may not be blank."] });

    try {
      const application = await this.db.transaction(async (tx) => {
        const applications = new DrizzleRoleApplicationRepository(tx);
        if (await applications.getPendingForUser(user.id)) {
          throw conflict("You already have a pending application.");
        }
        return applications.create(user.id, appliedRole, text);
      });
      logger.info("Role application submitted", { applicationId: application.id, userId: user.id, appliedRole });
      return application;
    } catch (err) {
      if (isUniqueViolation(err)) throw conflict("You already have a pending application.");
      throw err;
    }
  }

  async status(user: AuthUser): Promise<ApplicationStatusView> {
    const [pending, activeSubscriptions] = await Promise.all([
      new DrizzleRoleApplicationRepository(this.db).getPendingForUser(user.id),
      new DrizzleSubscriptionRepository(this.db).activeCounts(user.id),
    ]);
    return { hasPending: pending !== null, pending, activeSubscriptions };
  }

  /** Everything a staff member needs to decide applications. */
  async staffView(): Promise<StaffApplicationsView> {
    const [applications, publishers] = await Promise.all([
      new DrizzleRoleApplicationRepository(this.db).listAll(),
      new DrizzleProfileRepository(this.db).listPublishers(),
    ]);
    const byStatus: Record<ApplicationStatus, RoleApplicationWithUser[]> = {
      pending: [],
      approved: [],
      rejected: [],
    };
    for (const application of applications) byStatus[application.status].push(application);
    return {
      applications,
      byStatus,
      counts: {
        total: applications.length,
        pending: byStatus.pending.length,
        approved: byStatus.approved.length,
        rejected: byStatus.rejected.length,
      },
      publishers: publishers.items,
    };
  }
}
