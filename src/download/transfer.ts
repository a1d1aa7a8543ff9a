import fs from "node:fs";
import { Dispatcher, request } from "undici";
import { ByteCounter } from "./byteCounter";
import { FileAllocationFailedError, HttpStatusError, ZeroContentLengthError } from "./errors";

export interface TransferOptions {
  client: Dispatcher;
  url: string;
  destination: string;
  /** Incremented after every chunk written to disk. Ignored once closed. */
  counter?: ByteCounter;
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

type ResponseHeaders = Record<string, string | string[] | undefined>;

export function declaredContentLength(headers: ResponseHeaders): number | undefined {
  const raw = headers["content-length"];
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) && parsed >= 0 ? parsed : undefined;
}

async function writeFully(handle: fs.promises.FileHandle, chunk: Buffer): Promise<void> {
  let offset = 0;
  while (offset < chunk.length) {
    const { bytesWritten } = await handle.write(chunk, offset, chunk.length - offset, null);
    offset += bytesWritten;
  }
}

/**
 * Streams `url` into `destination` and resolves with the destination path once the
 * file has been synced to disk.
 */
export async function transferFile(options: TransferOptions): Promise<string> {
  const { client, url, destination, counter, signal } = options;
  const response = await request(url, {
    method: "GET",
    dispatcher: client,
    signal,
    headers: options.headers,
  });

  if (response.statusCode < 200 || response.statusCode >= 300) {
    await response.body.dump();
    throw new HttpStatusError(response.statusCode, url);
  }

  const contentLength = declaredContentLength(response.headers);
  if (contentLength === 0) {
    await response.body.dump();
    throw new ZeroContentLengthError();
  }

  let handle: fs.promises.FileHandle;
  try {
    handle = await fs.promises.open(destination, "w");
  } catch (error) {
    response.body.destroy();
    throw error;
  }

  try {
    if (contentLength !== undefined) {
      try {
        await handle.truncate(contentLength);
      } catch (error) {
        throw new FileAllocationFailedError(error);
      }
    }

    for await (const chunk of response.body) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      await writeFully(handle, buffer);
      counter?.add(buffer.length);
    }

    await handle.sync();
  } catch (error) {
    response.body.destroy();
    throw error;
  } finally {
    await handle.close();
  }

  return destination;
}
