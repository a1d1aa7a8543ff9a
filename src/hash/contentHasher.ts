import crypto from "node:crypto";
import fs from "node:fs";

export const DEFAULT_HASH_ALGORITHM = "md5";
export const DEFAULT_CHUNK_SIZE = 2 * 1024 * 1024;

export interface HashFileOptions {
  algorithm?: string;
  /** Upper bound of the read buffer. The buffer never exceeds the file size. */
  chunkSize?: number;
}

/**
 * Lowercase hex digest of a file, read in bounded chunks.
 * Rejects with the underlying I/O error (`ENOENT` when the file is missing).
 */
export async function hashFile(filePath: string, options: HashFileOptions = {}): Promise<string> {
  const hash = crypto.createHash(options.algorithm ?? DEFAULT_HASH_ALGORITHM);
  const handle = await fs.promises.open(filePath, "r");
  try {
    const { size } = await handle.stat();
    const buffer = Buffer.alloc(Math.max(1, Math.min(options.chunkSize ?? DEFAULT_CHUNK_SIZE, size)));

    while (true) {
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, null);
      if (bytesRead === 0) {
        break;
      }
      hash.update(buffer.subarray(0, bytesRead));
    }
  } finally {
    await handle.close();
  }

  return hash.digest("hex");
}
