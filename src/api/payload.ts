import path from "node:path";
import { PostRecord } from "../types";
import { ApiResponseError } from "./errors";

export interface PageAttributes {
  /** Posts in this page, `0..=100`. */
  limit: number;
  offset: number;
  /** Posts matching the query across all pages. */
  count: number;
}

export interface PostPage {
  attributes: PageAttributes;
  posts: PostRecord[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

/** `id` with the extension of the upstream file name: `(12345, "abc.jpg")` gives `12345.jpg`. */
export function destinationFilename(id: number, image: string): string {
  return `${id}${path.posix.extname(path.posix.basename(image))}`;
}

export function buildPostRecord(raw: unknown): PostRecord {
  if (!isRecord(raw)) {
    throw new ApiResponseError("post is not an object");
  }
  const { id, md5, file_url: fileUrl, tags, image } = raw;
  if (!isCount(id)) {
    throw new ApiResponseError("post id is not a non-negative integer");
  }
  if (!isNonEmptyString(md5) || !isNonEmptyString(fileUrl) || !isNonEmptyString(image) || typeof tags !== "string") {
    throw new ApiResponseError(`post ${id} is missing md5, file_url, image or tags`);
  }

  return {
    id,
    md5: md5.toLowerCase(),
    fileUrl,
    tags,
    image,
    filename: destinationFilename(id, image),
  };
}

/** Parses one page. A missing `post` field means the page is empty. */
export function parsePostPage(payload: unknown): PostPage {
  if (!isRecord(payload)) {
    throw new ApiResponseError("body is not an object");
  }
  const attributes = payload["@attributes"];
  if (!isRecord(attributes) || !isCount(attributes.limit) || !isCount(attributes.offset) || !isCount(attributes.count)) {
    throw new ApiResponseError("missing @attributes");
  }

  const rawPosts = payload.post;
  if (rawPosts !== undefined && !Array.isArray(rawPosts)) {
    throw new ApiResponseError("post is not an array");
  }

  return {
    attributes: { limit: attributes.limit, offset: attributes.offset, count: attributes.count },
    posts: (rawPosts ?? []).map(buildPostRecord),
  };
}
