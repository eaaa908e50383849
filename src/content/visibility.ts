/**
 * Visibility filter: which articles and newsletters a user may read.
 *
 * Readers see approved articles (and all newsletters) of the journalists and
 * publishers they actively subscribe to. Every other role sees all approved
 * articles and all newsletters. The detail path is looser than the lists:
 * journalists and editors may open any article whatever its status.
 */

import type { AuthUser } from "../auth/index.js";
import { forbidden } from "../domain/errors.js";
import type { ArticleStatus, PageResult, PageWindow } from "../domain/types.js";
import type { ISubscriptionRepository } from "../subscriptions/subscription-repository.js";
import type { ArticleListItem, IArticleRepository } from "./article-repository.js";
import type { ContentListItem } from "./content-queries.js";
import type { INewsletterRepository } from "./newsletter-repository.js";

export type Viewer = Pick<AuthUser, "id" | "role">;

/** Approved articles are public to any viewer; journalists and editors may open any status. */
export function canViewArticleDetail(viewer: Viewer | null, article: { status: ArticleStatus }): boolean {
  if (article.status === "approved") return true;
  return viewer !== null && (viewer.role === "editor" || viewer.role === "journalist");
}

export class VisibilityFilter {
  constructor(
    private readonly articles: IArticleRepository,
    private readonly newsletters: INewsletterRepository,
    private readonly subscriptions: ISubscriptionRepository,
  ) {}

  visibleArticles(viewer: Viewer, window?: PageWindow): Promise<PageResult<ArticleListItem>> {
    return this.articles.listApproved(viewer.role === "reader" ? { subscriberId: viewer.id } : {}, window);
  }

  visibleNewsletters(viewer: Viewer, window?: PageWindow): Promise<PageResult<ContentListItem>> {
    return this.newsletters.list(viewer.role === "reader" ? { subscriberId: viewer.id } : {}, window);
  }

  /** Approved articles of one journalist. Readers must hold an active subscription to them. */
  async articlesByJournalist(viewer: Viewer, journalistId: string): Promise<ArticleListItem[]> {
    if (viewer.role === "reader") {
      const subscribed = await this.subscriptions.isActive(viewer.id, { kind: "journalist", id: journalistId });
      if (!subscribed) throw forbidden("You are not subscribed to this journalist");
    }
    const result = await this.articles.listApproved({ journalistId });
    return result.items;
  }

  /** Approved articles of one publisher. Readers must hold an active subscription to it. */
  async articlesByPublisher(viewer: Viewer, publisherId: string): Promise<ArticleListItem[]> {
    if (viewer.role === "reader") {
      const subscribed = await this.subscriptions.isActive(viewer.id, { kind: "publisher", id: publisherId });
      if (!subscribed) throw forbidden("You are not subscribed to this publisher");
    }
    const result = await this.articles.listApproved({ publisherId });
    return result.items;
  }
}
