import * as fs from "node:fs/promises";
import { OutputError } from "./errors.js";

/**
 * Write a finished document to a file, or to stdout when no path is given.
 *
 * @param content - Fully rendered output
 * @param filePath - Destination file, or null for stdout
 * @throws {OutputError} If the file cannot be opened or written
 */
export async function writeOutput(content: string, filePath: string | null): Promise<void> {
  if (filePath === null) {
    process.stdout.write(content);
    return;
  }

  try {
    await fs.writeFile(filePath, content, "utf-8");
  } catch (error) {
    throw new OutputError(filePath, error);
  }
}
