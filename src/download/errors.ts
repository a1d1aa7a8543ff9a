import { errorMessage } from "../core/errors";

export abstract class DownloadError extends Error {}

/** Non-2xx response. */
export class HttpStatusError extends DownloadError {
  readonly statusCode: number;
  readonly url: string;

  constructor(statusCode: number, url: string) {
    super(`HTTP ${statusCode} for ${url}`);
    this.name = "HttpStatusError";
    this.statusCode = statusCode;
    this.url = url;
  }
}

export class ZeroContentLengthError extends DownloadError {
  constructor() {
    super("There is no content to download");
    this.name = "ZeroContentLengthError";
  }
}

/** Pre-allocating the declared content length failed, usually because the disk is full. */
export class FileAllocationFailedError extends DownloadError {
  constructor(cause: unknown) {
    super(`Failed to allocate file size: ${errorMessage(cause)}`, { cause });
    this.name = "FileAllocationFailedError";
  }
}
