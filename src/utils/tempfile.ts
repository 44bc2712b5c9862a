import fs from "fs/promises";
import path from "path";
import { IOError, errorMessage } from "./errors";

/** Per-job temp path, so concurrent jobs never share a file. */
export function tempPathFor(location: string, jobId: string, extension = ""): string {
  return `${location}.${jobId}${extension}`;
}

/**
 * Truncate-and-write: any earlier content at `filePath` is discarded, and
 * bytes are written untouched.
 */
export async function writeTempFile(filePath: string, data: Uint8Array): Promise<string> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, data, { flag: "w" });
    return filePath;
  } catch (error) {
    throw new IOError(
      "TempFileWrite",
      `Could not write temp file ${filePath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}
