/**
 * NotificationDispatcher — every email and social post triggered by a state change.
 *
 * Callers invoke it after their transaction commits. Each send is isolated:
 * a failure is logged and reported, never thrown, so it cannot undo or fail
 * the change that triggered it.
 */

import { logger } from "../config/logger.js";
import type { ContentDetail } from "../content/content-queries.js";
import type { ReviewDecision } from "../domain/types.js";
import type { SocialPoster } from "../social/x-client.js";
import type { ISubscriptionRepository } from "../subscriptions/subscription-repository.js";
import type { EmailSender } from "./client.js";
import {
  articleStatusTemplate,
  newArticleTemplate,
  newNewsletterTemplate,
  newsletterPublishedTemplate,
  passwordResetTemplate,
  roleApprovedTemplate,
  roleRejectedTemplate,
  type TemplateName,
  type TemplateResult,
} from "./templates.js";

export interface Recipient {
  id: string;
  username: string;
  email: string;
}

export interface DispatchReport {
  /** Addresses that accepted an email. */
  sent: string[];
  /** Addresses whose send failed. */
  failed: string[];
  /** Outcome of the social post, when one was attempted. */
  posted?: boolean;
}

function emptyReport(): DispatchReport {
  return { sent: [], failed: [] };
}

export class NotificationDispatcher {
  constructor(
    private readonly email: EmailSender,
    private readonly subscriptions: Pick<ISubscriptionRepository, "subscribersOf">,
    private readonly social: SocialPoster,
  ) {}

  async passwordReset(user: Recipient, resetUrl: string): Promise<DispatchReport> {
    const report = emptyReport();
    await this.deliver(report, user, "password-reset", passwordResetTemplate(user.username, resetUrl));
    return report;
  }

  async roleDecision(user: Recipient, role: string, decision: ReviewDecision): Promise<DispatchReport> {
    const report = emptyReport();
    if (decision === "approved") {
      await this.deliver(report, user, "role-approved", roleApprovedTemplate(user.username, role));
    } else {
      await this.deliver(report, user, "role-rejected", roleRejectedTemplate(user.username, role));
    }
    return report;
  }

  /**
   * Tell the journalist the outcome. An approval also notifies every active
   * subscriber of the journalist or publisher and announces the article.
   */
  async articleReviewed(article: ContentDetail, decision: ReviewDecision): Promise<DispatchReport> {
    const report = emptyReport();
    const author = recipientOf(article);
    await this.deliver(report, author, "article-status", articleStatusTemplate(author.username, article.title, decision));
    if (decision !== "approved") return report;

    const summary = {
      title: article.title,
      authorName: article.journalist.name,
      publisherName: article.publisher.name,
    };
    await this.fanOut(report, article, "new-article", (username) => newArticleTemplate(username, summary));

    try {
      report.posted = await this.social.postArticle({
        id: article.id,
        title: article.title,
        authorName: article.journalist.name,
      });
    } catch (err) {
      report.posted = false;
      logger.error("Social post failed", { err, articleId: article.id });
    }
    return report;
  }

  /** Confirmation to the journalist, then the subscriber fan-out. */
  async newsletterPublished(newsletter: ContentDetail): Promise<DispatchReport> {
    const report = emptyReport();
    const author = recipientOf(newsletter);
    await this.deliver(
      report,
      author,
      "newsletter-published",
      newsletterPublishedTemplate(author.username, newsletter.title),
    );

    const summary = {
      title: newsletter.title,
      authorName: newsletter.journalist.name,
      publisherName: newsletter.publisher.name,
      content: newsletter.content,
    };
    await this.fanOut(report, newsletter, "new-newsletter", (username) => newNewsletterTemplate(username, summary));
    return report;
  }

  private async fanOut(
    report: DispatchReport,
    item: ContentDetail,
    templateName: TemplateName,
    render: (username: string) => TemplateResult,
  ): Promise<void> {
    let subscribers: Recipient[];
    try {
      const rows = await this.subscriptions.subscribersOf(item.journalist.id, item.publisher.id);
      subscribers = rows.map((row) => ({ id: row.userId, username: row.username, email: row.email }));
    } catch (err) {
      logger.error("Could not load subscribers for notification", { err, contentId: item.id, templateName });
      return;
    }

    const seen = new Set<string>();
    for (const subscriber of subscribers) {
      const key = subscriber.email.trim().toLowerCase();
      if (!key || seen.has(key)) continue;
      seen.add(key);
      await this.deliver(report, subscriber, templateName, render(subscriber.username));
    }
    logger.info("Subscriber notifications dispatched", {
      contentId: item.id,
      templateName,
      recipients: seen.size,
    });
  }

  private async deliver(
    report: DispatchReport,
    to: Recipient,
    templateName: TemplateName,
    template: TemplateResult,
  ): Promise<void> {
    try {
      await this.email.send({ to: to.email, ...template, userId: to.id, templateName });
      report.sent.push(to.email);
    } catch (err) {
      report.failed.push(to.email);
      logger.error("Notification email failed", {
        to: to.email,
        userId: to.id,
        templateName,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

function recipientOf(item: ContentDetail): Recipient {
  return { id: item.journalist.userId, username: item.journalist.username, email: item.journalist.email };
}
