import type { AuthUser } from "../auth/index.js";
import { logger } from "../config/logger.js";
import { forbidden, notFound, validationError } from "../domain/errors.js";
import type { DispatchReport, NotificationDispatcher } from "../email/notification-dispatcher.js";
import type { IProfileRepository } from "../org/profile-repository.js";
import type { ISubscriptionRepository } from "../subscriptions/subscription-repository.js";
import type { Article, ArticleDetail, IArticleRepository } from "./article-repository.js";
import { type ContentChanges, type ContentDetail, MAX_TITLE_LENGTH } from "./content-queries.js";
import type { INewsletterRepository, Newsletter } from "./newsletter-repository.js";
import { canViewArticleDetail } from "./visibility.js";

export type ContentKind = "article" | "newsletter";

export interface ContentInput {
  title?: string;
  content?: string;
}

export interface SubscriptionFlags {
  subscribedToJournalist: boolean;
  subscribedToPublisher: boolean;
}

export type ArticleView = ArticleDetail & { subscription?: SubscriptionFlags };
export type NewsletterView = ContentDetail & { subscription?: SubscriptionFlags; canEdit: boolean };

/** Trim and check title/content. With `partial`, absent fields are allowed. */
export function cleanContentInput(input: ContentInput, partial = false): ContentChanges {
  const errors: Record<string, string[]> = {};
  const changes: ContentChanges = {};

  if (input.title !== undefined || !partial) {
    const title = (input.title ?? "").trim();
    if (!title) errors.title = ["This field may not be blank."];
    else if (title.length > MAX_TITLE_LENGTH) {
      errors.title = [`Ensure this field has no more than ${MAX_TITLE_LENGTH} characters.`];
    } else changes.title = title;
  }
  if (input.content !== undefined || !partial) {
    const content = (input.content ?? "").trim();
    if (!content) errors.content = ["This field may not be blank."];
    else changes.content = content;
  }

  const fields = Object.keys(errors);
  if (fields.length > 0) {
    throw validationError(`Invalid ${fields.join(" and ")}.`, errors);
  }
  return changes;
}

export class ContentService {
  constructor(
    private readonly articles: IArticleRepository,
    private readonly newsletters: INewsletterRepository,
    private readonly profiles: IProfileRepository,
    private readonly subscriptions: ISubscriptionRepository,
    private readonly notifications: NotificationDispatcher,
  ) {}

  // ---------------------------------------------------------------------------
  // Articles
  // ---------------------------------------------------------------------------

  /** Journalist and publisher come from the caller's profile; status always starts pending. */
  async createArticle(user: AuthUser, input: ContentInput): Promise<ArticleDetail> {
    const journalist = await this.profiles.getJournalistByUserId(user.id);
    if (!journalist) throw forbidden("Only journalists can create articles");
    const fields = cleanContentInput(input);
    const article = await this.articles.create({
      title: fields.title ?? "",
      content: fields.content ?? "",
      journalistId: journalist.id,
      publisherId: journalist.publisherId,
    });
    logger.info("Article submitted", { articleId: article.id, journalistId: journalist.id });
    return this.requireArticleDetail(article.id);
  }

  async getArticle(user: AuthUser, id: string): Promise<ArticleView> {
    const detail = await this.articles.getDetail(id);
    if (!detail || !canViewArticleDetail(user, detail)) throw notFound("Article not found.");
    if (user.role !== "reader") return detail;
    return { ...detail, subscription: await this.subscriptionFlags(user, detail) };
  }

  async updateArticle(user: AuthUser, id: string, input: ContentInput): Promise<ArticleDetail> {
    const article = await this.articles.getById(id);
    if (!article) throw notFound("Article not found.");
    await this.assertCanModify(user, "article", article, "edit");
    await this.articles.update(id, cleanContentInput(input, true));
    return this.requireArticleDetail(id);
  }

  async deleteArticle(user: AuthUser, id: string): Promise<void> {
    const article = await this.articles.getById(id);
    if (!article) throw notFound("Article not found.");
    await this.assertCanModify(user, "article", article, "delete");
    await this.articles.delete(id);
    logger.info("Article deleted", { articleId: id, by: user.id });
  }

  // ---------------------------------------------------------------------------
  // Newsletters
  // ---------------------------------------------------------------------------

  /** Newsletters publish immediately: the author gets a confirmation and subscribers are notified. */
  async createNewsletter(
    user: AuthUser,
    input: ContentInput,
  ): Promise<{ newsletter: ContentDetail; notification: DispatchReport }> {
    const journalist = await this.profiles.getJournalistByUserId(user.id);
    if (!journalist) throw forbidden("Only journalists can create newsletters");
    const fields = cleanContentInput(input);
    const created = await this.newsletters.create({
      title: fields.title ?? "",
      content: fields.content ?? "",
      journalistId: journalist.id,
      publisherId: journalist.publisherId,
    });
    const newsletter = await this.requireNewsletterDetail(created.id);
    logger.info("Newsletter published", { newsletterId: created.id, journalistId: journalist.id });
    const notification = await this.notifications.newsletterPublished(newsletter);
    return { newsletter, notification };
  }

  async getNewsletter(user: AuthUser, id: string): Promise<NewsletterView> {
    const detail = await this.newsletters.getDetail(id);
    if (!detail) throw notFound("Newsletter not found.");
    const canEdit = await this.canModify(user, { journalistId: detail.journalist.id, publisherId: detail.publisher.id });
    if (user.role !== "reader") return { ...detail, canEdit };
    return { ...detail, canEdit, subscription: await this.subscriptionFlags(user, detail) };
  }

  async updateNewsletter(user: AuthUser, id: string, input: ContentInput): Promise<ContentDetail> {
    const newsletter = await this.newsletters.getById(id);
    if (!newsletter) throw notFound("Newsletter not found.");
    await this.assertCanModify(user, "newsletter", newsletter, "edit");
    await this.newsletters.update(id, cleanContentInput(input, true));
    return this.requireNewsletterDetail(id);
  }

  async deleteNewsletter(user: AuthUser, id: string): Promise<void> {
    const newsletter = await this.newsletters.getById(id);
    if (!newsletter) throw notFound("Newsletter not found.");
    await this.assertCanModify(user, "newsletter", newsletter, "delete");
    await this.newsletters.delete(id);
    logger.info("Newsletter deleted", { newsletterId: id, by: user.id });
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  /** The owning journalist, or an editor of the owning publisher. */
  private async canModify(user: AuthUser, item: { journalistId: string; publisherId: string }): Promise<boolean> {
    if (user.role === "journalist") {
      const journalist = await this.profiles.getJournalistByUserId(user.id);
      return journalist?.id === item.journalistId;
    }
    if (user.role === "editor") {
      const editor = await this.profiles.getEditorByUserId(user.id);
      return editor?.publisherId === item.publisherId;
    }
    return false;
  }

  private async assertCanModify(
    user: AuthUser,
    kind: ContentKind,
    item: Article | Newsletter,
    action: "edit" | "delete",
  ): Promise<void> {
    if (await this.canModify(user, item)) return;
    if (user.role === "journalist") throw forbidden(`You can only ${action} your own ${kind}s.`);
    if (user.role === "editor") throw forbidden(`You can only ${action} ${kind}s from your publisher.`);
    throw forbidden(`You don't have permission to ${action} ${kind}s.`);
  }

  private async subscriptionFlags(user: AuthUser, detail: ContentDetail): Promise<SubscriptionFlags> {
    const [subscribedToJournalist, subscribedToPublisher] = await Promise.all([
      this.subscriptions.isActive(user.id, { kind: "journalist", id: detail.journalist.id }),
      this.subscriptions.isActive(user.id, { kind: "publisher", id: detail.publisher.id }),
    ]);
    return { subscribedToJournalist, subscribedToPublisher };
  }

  private async requireArticleDetail(id: string): Promise<ArticleDetail> {
    const detail = await this.articles.getDetail(id);
    if (!detail) throw notFound("Article not found.");
    return detail;
  }

  private async requireNewsletterDetail(id: string): Promise<ContentDetail> {
    const detail = await this.newsletters.getDetail(id);
    if (!detail) throw notFound("Newsletter not found.");
    return detail;
  }
}
