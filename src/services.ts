import { Pool } from "pg";
import { DrizzleApiTokenRepository, type IApiTokenRepository } from "./auth/api-token-repository.js";
import { CredentialService } from "./auth/credentials.js";
import { PasswordResetService } from "./auth/password-reset.js";
import { DrizzleResetTokenRepository } from "./auth/reset-token-repository.js";
import { DrizzleUserRepository, type IUserRepository } from "./auth/user-repository.js";
import { config } from "./config/index.js";
import { ArticleReviewService } from "./content/article-review-service.js";
import { DrizzleArticleRepository } from "./content/article-repository.js";
import { ContentService } from "./content/content-service.js";
import { DrizzleNewsletterRepository } from "./content/newsletter-repository.js";
import { VisibilityFilter } from "./content/visibility.js";
import { createDb, type DrizzleDb } from "./db/index.js";
import { createEmailSender, type EmailSender } from "./email/client.js";
import { NotificationDispatcher } from "./email/notification-dispatcher.js";
import { DashboardService } from "./org/dashboard-service.js";
import { DrizzleProfileRepository, type IProfileRepository } from "./org/profile-repository.js";
import { RoleApplicationService } from "./roles/role-application-service.js";
import { RoleTransitionHandler } from "./roles/role-transition.js";
import { type SocialPoster, XClient } from "./social/x-client.js";
import { DrizzleSubscriptionRepository } from "./subscriptions/subscription-repository.js";
import { SubscriptionService } from "./subscriptions/subscription-service.js";

/** Everything the HTTP layer calls into. */
export interface AppServices {
  db: DrizzleDb;
  users: IUserRepository;
  tokens: IApiTokenRepository;
  profiles: IProfileRepository;
  notifications: NotificationDispatcher;
  credentials: CredentialService;
  passwordReset: PasswordResetService;
  visibility: VisibilityFilter;
  content: ContentService;
  review: ArticleReviewService;
  subscriptions: SubscriptionService;
  roleApplications: RoleApplicationService;
  roleTransitions: RoleTransitionHandler;
  dashboards: DashboardService;
}

export interface ServiceOptions {
  email: EmailSender;
  social: SocialPoster;
  appBaseUrl: string;
  /** Clock for reset-token expiry. Defaults to Date.now. */
  now?: () => number;
}

/** Wire repositories and services over one database handle. */
export function createServices(db: DrizzleDb, options: ServiceOptions): AppServices {
  const users = new DrizzleUserRepository(db);
  const tokens = new DrizzleApiTokenRepository(db);
  const profiles = new DrizzleProfileRepository(db);
  const articles = new DrizzleArticleRepository(db);
  const newsletters = new DrizzleNewsletterRepository(db);
  const subscriptionRepo = new DrizzleSubscriptionRepository(db);

  const notifications = new NotificationDispatcher(options.email, subscriptionRepo, options.social);
  const visibility = new VisibilityFilter(articles, newsletters, subscriptionRepo);

  return {
    db,
    users,
    tokens,
    profiles,
    notifications,
    credentials: new CredentialService(users, tokens),
    passwordReset: new PasswordResetService({
      db,
      users,
      resetTokens: new DrizzleResetTokenRepository(db),
      notifications,
      appBaseUrl: options.appBaseUrl,
      now: options.now,
    }),
    visibility,
    content: new ContentService(articles, newsletters, profiles, subscriptionRepo, notifications),
    review: new ArticleReviewService(articles, profiles, notifications),
    subscriptions: new SubscriptionService(subscriptionRepo, profiles, visibility),
    roleApplications: new RoleApplicationService(db),
    roleTransitions: new RoleTransitionHandler(db, notifications),
    dashboards: new DashboardService(profiles, articles, newsletters, subscriptionRepo),
  };
}

// ---------------------------------------------------------------------------
// Process-wide singletons. Nothing connects at import time.
// ---------------------------------------------------------------------------

let _pool: Pool | null = null;
let _services: AppServices | null = null;

export function getPool(): Pool {
  if (!_pool) {
    _pool = new Pool({ connectionString: config.databaseUrl });
  }
  return _pool;
}

export function getServices(): AppServices {
  if (!_services) {
    _services = createServices(createDb(getPool()), {
      email: createEmailSender(config.email),
      social: new XClient(config.social),
      appBaseUrl: config.appBaseUrl,
    });
  }
  return _services;
}

export async function closePool(): Promise<void> {
  if (_pool) {
    const pool = _pool;
    _pool = null;
    _services = null;
    await pool.end();
  }
}
