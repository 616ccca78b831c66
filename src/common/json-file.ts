import * as crypto from "node:crypto";
import * as fs from "fs";
import * as path from "path";
import { InputSourceError } from "./errors.js";

/**
 * Reads and parses a JSON file. Missing, unreadable and unparsable files are
 * all reported as {@link InputSourceError} naming the file.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf8");
  } catch (error) {
    throw InputSourceError.unreadable(filePath, error);
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new InputSourceError(filePath, `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
}

/**
 * Writes `data` as JSON next to its destination, then renames it into place.
 */
export async function writeJsonFileAtomic(filePath: string, data: unknown): Promise<void> {
  const directory = path.dirname(filePath);
  await fs.promises.mkdir(directory, { recursive: true });

  const tempPath = path.join(directory, `.${path.basename(filePath)}.${crypto.randomBytes(6).toString("hex")}.tmp`);
  try {
    await fs.promises.writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, "utf8");
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}
