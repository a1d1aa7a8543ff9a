import { Dispatcher, request } from "undici";
import { Logger, MetricsRegistry } from "../observability";
import { PostRecord } from "../types";
import { ApiRequestError } from "./errors";
import { parsePostPage, PostPage } from "./payload";

export const API_BASE_URL = "https://gelbooru.com/index.php";
/** Largest `limit` the API accepts per page. */
export const MAX_PAGE_LIMIT = 100;
/** The API refuses `limit * pid` beyond this. */
export const PAGINATION_CEILING = 20_000;

export interface ApiCredentials {
  apiKey: string;
  userId: string;
}

export interface PageQuery {
  tags: string;
  limit: number;
  pid: number;
  credentials?: ApiCredentials;
}

export interface ApiClientOptions {
  baseUrl?: string;
  userAgent?: string;
  signal?: AbortSignal;
  logger?: Logger;
  metrics?: MetricsRegistry;
}

export interface PostsQuery {
  tags: string;
  count: number;
  credentials?: ApiCredentials;
}

export function buildApiUrl(query: PageQuery, baseUrl = API_BASE_URL): string {
  const url = new URL(baseUrl);
  url.searchParams.set("page", "dapi");
  url.searchParams.set("s", "post");
  url.searchParams.set("q", "index");
  url.searchParams.set("json", "1");
  url.searchParams.set("tags", query.tags);
  url.searchParams.set("limit", String(query.limit));
  url.searchParams.set("pid", String(query.pid));
  if (query.credentials) {
    url.searchParams.set("api_key", query.credentials.apiKey);
    url.searchParams.set("user_id", query.credentials.userId);
  }
  return url.toString();
}

/** Fetches a single page of posts matching `tags`. */
export async function fetchPostPage(
  client: Dispatcher,
  query: PageQuery,
  options: ApiClientOptions = {},
): Promise<PostPage> {
  if (query.tags.length === 0) {
    throw new Error("Tags cannot be empty");
  }
  if (!Number.isInteger(query.limit) || query.limit < 1 || query.limit > MAX_PAGE_LIMIT) {
    throw new Error(`Limit can only be between 1 and ${MAX_PAGE_LIMIT}`);
  }

  const url = buildApiUrl(query, options.baseUrl);
  const stopTimer = options.metrics?.startTimer("api_page_ms");
  try {
    const response = await request(url, {
      method: "GET",
      dispatcher: client,
      signal: options.signal,
      headers: {
        accept: "application/json",
        ...(options.userAgent ? { "user-agent": options.userAgent } : {}),
      },
    });

    if (response.statusCode < 200 || response.statusCode >= 300) {
      await response.body.dump();
      throw new ApiRequestError(response.statusCode, url);
    }

    const page = parsePostPage(await response.body.json());
    options.metrics?.incrementCounter("api_pages_fetched", 1);
    options.logger?.debug("api_page_fetched", { pid: query.pid, posts: page.posts.length, count: page.attributes.count });
    return page;
  } finally {
    stopTimer?.();
  }
}

/**
 * Pages through the API until `min(count, total matches)` posts are collected.
 * Resolves with an empty list when nothing matches.
 */
export async function fetchPosts(
  client: Dispatcher,
  query: PostsQuery,
  options: ApiClientOptions = {},
): Promise<PostRecord[]> {
  if (query.tags.length === 0) {
    throw new Error("Tags cannot be empty");
  }
  if (!Number.isInteger(query.count) || query.count < 1) {
    throw new Error("Number of images must be a positive integer");
  }
  if (query.count > PAGINATION_CEILING) {
    options.logger?.warn("api_count_above_pagination_ceiling", { count: query.count, ceiling: PAGINATION_CEILING });
  }

  const fetchPage = (pid: number): Promise<PostPage> =>
    fetchPostPage(client, { tags: query.tags, limit: MAX_PAGE_LIMIT, pid, credentials: query.credentials }, options);

  let pid = 0;
  const first = await fetchPage(pid);
  if (first.posts.length === 0) {
    return [];
  }

  const total = Math.min(query.count, first.attributes.count);
  const posts = [...first.posts];
  while (posts.length < total) {
    pid += 1;
    const page = await fetchPage(pid);
    if (page.posts.length === 0) {
      options.logger?.warn("api_page_empty_before_total", { pid, collected: posts.length, total });
      break;
    }
    posts.push(...page.posts);
  }

  const result = posts.slice(0, total);
  options.metrics?.incrementCounter("posts_fetched", result.length);
  return result;
}
