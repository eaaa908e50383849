import type { Context } from "hono";
import { notFound } from "../domain/errors.js";
import type { PageResult, PageWindow } from "../domain/types.js";

export interface Page<T> {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
}

/** 1-based `?page=` number. Anything that is not a positive integer is an invalid page. */
export function parsePage(raw: string | undefined): number {
  if (raw === undefined || raw === "") return 1;
  if (!/^\d+$/.test(raw)) throw notFound("Invalid page.");
  const page = Number(raw);
  if (page < 1) throw notFound("Invalid page.");
  return page;
}

export function pageWindow(page: number, pageSize: number): PageWindow {
  return { limit: pageSize, offset: (page - 1) * pageSize };
}

function pageUrl(requestUrl: string, page: number): string {
  const url = new URL(requestUrl);
  if (page === 1) url.searchParams.delete("page");
  else url.searchParams.set("page", String(page));
  return url.toString();
}

/** Wrap one page of results in the `{ count, next, previous, results }` envelope. */
export function toPage<T, R>(
  requestUrl: string,
  page: number,
  pageSize: number,
  result: PageResult<T>,
  serialize: (item: T) => R,
): Page<R> {
  // An empty first page is still a page; any other page must hold rows.
  if (page > 1 && (page - 1) * pageSize >= result.total) throw notFound("Invalid page.");
  return {
    count: result.total,
    next: page * pageSize < result.total ? pageUrl(requestUrl, page + 1) : null,
    previous: page > 1 ? pageUrl(requestUrl, page - 1) : null,
    results: result.items.map(serialize),
  };
}

/** Run a windowed list query for the request's `?page=` and return the envelope. */
export async function paginate<T, R>(
  c: Context,
  pageSize: number,
  load: (window: PageWindow) => Promise<PageResult<T>>,
  serialize: (item: T) => R,
): Promise<Page<R>> {
  const page = parsePage(c.req.query("page"));
  const result = await load(pageWindow(page, pageSize));
  return toPage(c.req.url, page, pageSize, result, serialize);
}
