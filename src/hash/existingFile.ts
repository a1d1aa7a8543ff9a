import { errorCode } from "../core/errors";
import { hashFile } from "./contentHasher";

/**
 * Whether `filePath` already holds content matching `expectedHash`.
 * A missing file is not an error and resolves `false`.
 */
export async function isExistingFile(filePath: string, expectedHash: string, algorithm?: string): Promise<boolean> {
  let digest: string;
  try {
    digest = await hashFile(filePath, { algorithm });
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return false;
    }
    throw error;
  }
  return digest === expectedHash.toLowerCase();
}
