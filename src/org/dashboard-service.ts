import type { AuthUser } from "../auth/index.js";
import type { ArticleListItem, IArticleRepository } from "../content/article-repository.js";
import type { ContentListItem } from "../content/content-queries.js";
import type { INewsletterRepository } from "../content/newsletter-repository.js";
import { forbidden } from "../domain/errors.js";
import type { ArticleStatus } from "../domain/types.js";
import type { ISubscriptionRepository } from "../subscriptions/subscription-repository.js";
import type { EditorSummary, IProfileRepository, JournalistSummary, Publisher } from "./profile-repository.js";

export type ArticlesByStatus = Record<ArticleStatus, ArticleListItem[]>;

export interface EditorDashboard {
  publisher: { id: string; name: string };
  articles: ArticlesByStatus;
  counts: Record<ArticleStatus, number> & { total: number };
}

export interface JournalistDashboard {
  articles: ArticlesByStatus;
  counts: Record<ArticleStatus, number> & { total: number };
  newsletters: ContentListItem[];
  newsletterCount: number;
}

export interface JournalistStats extends JournalistSummary {
  articleCount: number;
  newsletterCount: number;
  pendingCount: number;
  approvedCount: number;
  rejectedCount: number;
  subscriberCount: number;
}

export interface PublisherDashboard {
  publisher: Publisher;
  editors: EditorSummary[];
  journalists: JournalistStats[];
  subscriberCount: number;
  totals: Record<ArticleStatus, number> & { articles: number; newsletters: number };
}

export function groupByStatus(items: ArticleListItem[]): ArticlesByStatus {
  const grouped: ArticlesByStatus = { pending: [], approved: [], rejected: [] };
  for (const item of items) grouped[item.status].push(item);
  return grouped;
}

function countsOf(grouped: ArticlesByStatus): Record<ArticleStatus, number> & { total: number } {
  const pending = grouped.pending.length;
  const approved = grouped.approved.length;
  const rejected = grouped.rejected.length;
  return { pending, approved, rejected, total: pending + approved + rejected };
}

/** Read-only overviews for editors, journalists and publishers. */
export class DashboardService {
  constructor(
    private readonly profiles: IProfileRepository,
    private readonly articles: IArticleRepository,
    private readonly newsletters: INewsletterRepository,
    private readonly subscriptions: ISubscriptionRepository,
  ) {}

  async editor(user: AuthUser): Promise<EditorDashboard> {
    if (user.role !== "editor") throw forbidden("Only editors can view the editor dashboard.");
    const editor = await this.profiles.getEditorByUserId(user.id);
    if (!editor) throw forbidden("Editor profile not found");
    const publisher = await this.profiles.getPublisherById(editor.publisherId);
    if (!publisher) throw forbidden("Editor profile not found");

    const grouped = groupByStatus(await this.articles.listAll({ publisherId: publisher.id }));
    return { publisher: { id: publisher.id, name: publisher.name }, articles: grouped, counts: countsOf(grouped) };
  }

  async journalist(user: AuthUser): Promise<JournalistDashboard> {
    const journalist = await this.profiles.getJournalistByUserId(user.id);
    if (!journalist) throw forbidden("Journalist profile not found");

    const [articles, newsletters] = await Promise.all([
      this.articles.listAll({ journalistId: journalist.id }),
      this.newsletters.list({ journalistId: journalist.id }),
    ]);
    const grouped = groupByStatus(articles);
    return {
      articles: grouped,
      counts: countsOf(grouped),
      newsletters: newsletters.items,
      newsletterCount: newsletters.total,
    };
  }

  async publisher(user: AuthUser): Promise<PublisherDashboard> {
    const publisher = await this.profiles.getPublisherByUserId(user.id);
    if (!publisher) throw forbidden("Publisher profile not found");

    const [editors, journalists, subscriberCount, statusTotals, newsletterTotal] = await Promise.all([
      this.profiles.listEditorsOf(publisher.id),
      this.profiles.listJournalistsOf(publisher.id),
      this.subscriptions.activeSubscriberCount({ kind: "publisher", id: publisher.id }),
      this.articles.statusCounts({ publisherId: publisher.id }),
      this.newsletters.countFor({ publisherId: publisher.id }),
    ]);

    const stats = await Promise.all(journalists.map((journalist) => this.journalistStats(journalist)));
    return {
      publisher,
      editors,
      journalists: stats,
      subscriberCount,
      totals: {
        ...statusTotals,
        articles: statusTotals.pending + statusTotals.approved + statusTotals.rejected,
        newsletters: newsletterTotal,
      },
    };
  }

  private async journalistStats(journalist: JournalistSummary): Promise<JournalistStats> {
    const [statuses, newsletterCount, subscriberCount] = await Promise.all([
      this.articles.statusCounts({ journalistId: journalist.id }),
      this.newsletters.countFor({ journalistId: journalist.id }),
      this.subscriptions.activeSubscriberCount({ kind: "journalist", id: journalist.id }),
    ]);
    return {
      ...journalist,
      articleCount: statuses.pending + statuses.approved + statuses.rejected,
      newsletterCount,
      pendingCount: statuses.pending,
      approvedCount: statuses.approved,
      rejectedCount: statuses.rejected,
      subscriberCount,
    };
  }
}
