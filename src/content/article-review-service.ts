import type { AuthUser } from "../auth/index.js";
import { logger } from "../config/logger.js";
import { conflict, forbidden, notFound } from "../domain/errors.js";
import type { ArticleStatus, ReviewDecision } from "../domain/types.js";
import type { DispatchReport, NotificationDispatcher } from "../email/notification-dispatcher.js";
import type { IProfileRepository } from "../org/profile-repository.js";
import type { Article, IArticleRepository } from "./article-repository.js";

export interface ReviewResult {
  article: Article;
  notification: DispatchReport;
}

const VERBS: Record<ReviewDecision, string> = { approved: "approve", rejected: "reject" };

/**
 * pending -> approved | rejected, by an editor of the article's publisher.
 * The status change is stored first; notifications follow and cannot undo it.
 */
export class ArticleReviewService {
  constructor(
    private readonly articles: IArticleRepository,
    private readonly profiles: IProfileRepository,
    private readonly notifications: NotificationDispatcher,
  ) {}

  approve(user: AuthUser, articleId: string): Promise<ReviewResult> {
    return this.review(user, articleId, "approved");
  }

  reject(user: AuthUser, articleId: string): Promise<ReviewResult> {
    return this.review(user, articleId, "rejected");
  }

  async review(user: AuthUser, articleId: string, decision: ReviewDecision): Promise<ReviewResult> {
    const article = await this.articles.getById(articleId);
    if (!article) throw notFound("Article not found.");

    const editor = user.role === "editor" ? await this.profiles.getEditorByUserId(user.id) : null;
    if (!editor || editor.publisherId !== article.publisherId) {
      throw forbidden(`You cannot ${VERBS[decision]} this article.`);
    }
    if (article.status !== "pending") {
      throw conflict(`This article has already been ${article.status}.`);
    }

    const updated = await this.articles.setStatus(articleId, decision, "pending");
    if (!updated) throw conflict("This article has already been reviewed.");
    logger.info(`Article ${decision}`, { articleId, editorId: editor.id });

    const detail = await this.articles.getDetail(articleId);
    const notification = detail
      ? await this.notifications.articleReviewed(detail, decision)
      : { sent: [], failed: [] };
    return { article: updated, notification };
  }

  /** Staff re-assignment of any status, bypassing the review rules. Sends nothing. */
  async setStatus(articleId: string, status: ArticleStatus, actorId: string): Promise<Article> {
    const updated = await this.articles.setStatus(articleId, status);
    if (!updated) throw notFound("Article not found.");
    logger.info("Article status set by staff", { articleId, status, actorId });
    return updated;
  }
}
