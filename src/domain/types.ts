export const ROLES = ["reader", "journalist", "editor", "publisher"] as const;
export type Role = (typeof ROLES)[number];

/** Roles a reader may apply for. */
export const APPLIABLE_ROLES = ["journalist", "editor", "publisher"] as const;
export type AppliableRole = (typeof APPLIABLE_ROLES)[number];

export const ARTICLE_STATUSES = ["pending", "approved", "rejected"] as const;
export type ArticleStatus = (typeof ARTICLE_STATUSES)[number];

export const APPLICATION_STATUSES = ["pending", "approved", "rejected"] as const;
export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

export type ReviewDecision = "approved" | "rejected";

/** A slice of an ordered result set. */
export interface PageWindow {
  limit: number;
  offset: number;
}

export interface PageResult<T> {
  total: number;
  items: T[];
}
