import type { AuthUser } from "../auth/index.js";
import type { ArticleListItem } from "../content/article-repository.js";
import type { VisibilityFilter } from "../content/visibility.js";
import { forbidden, notFound } from "../domain/errors.js";
import type { IProfileRepository } from "../org/profile-repository.js";
import type {
  BrowseJournalist,
  BrowsePublisher,
  ISubscriptionRepository,
  JournalistSubscriptionView,
  PublisherSubscriptionView,
  SubscribeOutcome,
  SubscriptionTarget,
  UnsubscribeOutcome,
} from "./subscription-repository.js";

export const RECENT_ARTICLES_LIMIT = 10;

export interface ToggleResult<O> {
  outcome: O;
  target: SubscriptionTarget & { name: string };
  message: string;
}

export interface MySubscriptions {
  journalists: JournalistSubscriptionView[];
  publishers: PublisherSubscriptionView[];
  recentArticles: ArticleListItem[];
  total: number;
}

const SUBSCRIBE_MESSAGES: Record<SubscribeOutcome, (name: string, kind: string) => string> = {
  subscribed: (name) => `Successfully subscribed to ${name}!`,
  resubscribed: (name) => `Re-subscribed to ${name}!`,
  already_subscribed: (_name, kind) => `You are already subscribed to this ${kind}.`,
};

const UNSUBSCRIBE_MESSAGES: Record<UnsubscribeOutcome, (name: string, kind: string) => string> = {
  unsubscribed: (name) => `Successfully unsubscribed from ${name}.`,
  not_subscribed: (_name, kind) => `You are not subscribed to this ${kind}.`,
};

export class SubscriptionService {
  constructor(
    private readonly subscriptions: ISubscriptionRepository,
    private readonly profiles: IProfileRepository,
    private readonly visibility: VisibilityFilter,
  ) {}

  async subscribe(user: AuthUser, target: SubscriptionTarget): Promise<ToggleResult<SubscribeOutcome>> {
    if (user.role !== "reader") throw forbidden(`Only readers can subscribe to ${target.kind}s.`);
    const name = await this.targetName(target);
    const outcome = await this.subscriptions.subscribe(user.id, target);
    return { outcome, target: { ...target, name }, message: SUBSCRIBE_MESSAGES[outcome](name, target.kind) };
  }

  async unsubscribe(user: AuthUser, target: SubscriptionTarget): Promise<ToggleResult<UnsubscribeOutcome>> {
    if (user.role !== "reader") throw forbidden("Only readers can manage subscriptions.");
    const name = await this.targetName(target);
    const outcome = await this.subscriptions.unsubscribe(user.id, target);
    return { outcome, target: { ...target, name }, message: UNSUBSCRIBE_MESSAGES[outcome](name, target.kind) };
  }

  async mySubscriptions(user: AuthUser): Promise<MySubscriptions> {
    if (user.role !== "reader") throw forbidden("Only readers can view subscriptions.");
    const [journalists, publishers, recent] = await Promise.all([
      this.subscriptions.listActiveJournalistSubscriptions(user.id),
      this.subscriptions.listActivePublisherSubscriptions(user.id),
      this.visibility.visibleArticles(user, { limit: RECENT_ARTICLES_LIMIT, offset: 0 }),
    ]);
    return {
      journalists,
      publishers,
      recentArticles: recent.items,
      total: journalists.length + publishers.length,
    };
  }

  async browseJournalists(user: AuthUser): Promise<BrowseJournalist[]> {
    if (user.role !== "reader") throw forbidden("Only readers can browse journalists.");
    return this.subscriptions.browseJournalists(user.id);
  }

  async browsePublishers(user: AuthUser): Promise<BrowsePublisher[]> {
    if (user.role !== "reader") throw forbidden("Only readers can browse publishers.");
    return this.subscriptions.browsePublishers(user.id);
  }

  private async targetName(target: SubscriptionTarget): Promise<string> {
    if (target.kind === "journalist") {
      const journalist = await this.profiles.getJournalistSummary(target.id);
      if (!journalist) throw notFound("Journalist not found.");
      return journalist.name;
    }
    const publisher = await this.profiles.getPublisherById(target.id);
    if (!publisher) throw notFound("Publisher not found.");
    return publisher.name;
  }
}
