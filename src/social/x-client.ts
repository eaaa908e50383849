import { logger } from "../config/logger.js";

export interface XClientConfig {
  enabled: boolean;
  /** OAuth 2.0 user-context access token with tweet.write scope. */
  accessToken: string;
  apiUrl: string;
}

export interface ArticlePost {
  id: string;
  title: string;
  authorName: string;
}

/** Announces approved articles on a social network. Never throws. */
export interface SocialPoster {
  postArticle(article: ArticlePost): Promise<boolean>;
}

export const MAX_POST_LENGTH = 280;

/** "New article published: <title>\nBy: <name>", cut to 275 characters + "..." past the limit. */
export function buildArticlePost(title: string, authorName: string): string {
  const text = `New article published: ${title}\nBy: ${authorName}`;
  if (text.length > MAX_POST_LENGTH) {
    return `${text.slice(0, MAX_POST_LENGTH - 5)}...`;
  }
  return text;
}

/** Posts to the X API v2 (`POST /2/tweets`). */
export class XClient implements SocialPoster {
  private readonly config: XClientConfig;

  constructor(config: XClientConfig) {
    this.config = config;
  }

  async postArticle(article: ArticlePost): Promise<boolean> {
    if (!this.config.enabled || !this.config.accessToken) {
      logger.warn("X posting not configured, skipping post", { articleId: article.id });
      return false;
    }

    const text = buildArticlePost(article.title, article.authorName);
    logger.info("Posting article to X", { articleId: article.id, text });

    try {
      const response = await fetch(this.config.apiUrl, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.config.accessToken}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ text }),
      });

      if (response.status === 401 || response.status === 403) {
        logger.error(`X API rejected the credentials (${response.status})`, {
          articleId: article.id,
          hint: "the token needs tweet.write permission",
        });
        return false;
      }
      if (!response.ok) {
        logger.error(`X API returned ${response.status} ${response.statusText}`, { articleId: article.id });
        return false;
      }

      const body: unknown = await response.json();
      const postId = extractPostId(body);
      if (!postId) {
        logger.error("X API response carried no post id", { articleId: article.id });
        return false;
      }

      logger.info("Posted article to X", { articleId: article.id, postId });
      return true;
    } catch (err) {
      logger.error("X API request failed", { err, articleId: article.id });
      return false;
    }
  }
}

function extractPostId(body: unknown): string | null {
  if (typeof body !== "object" || body === null || !("data" in body)) return null;
  const data = body.data;
  if (typeof data !== "object" || data === null || !("id" in data)) return null;
  return typeof data.id === "string" ? data.id : null;
}
