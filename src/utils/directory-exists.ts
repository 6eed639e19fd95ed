import { stat } from "fs/promises";
import { toSiteError } from "../errors";

/**
 * Check if a directory exists
 * A missing path is false; any other stat failure is rethrown as IoError
 */
export async function directoryExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw toSiteError(error);
  }
}
