import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { type AnimalRecord, type Logger, parseAnimalRecords } from "../../src/lib/animals/types.js";

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function loadTemplate(filePath: string, logger: Logger = console): Promise<string> {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    logger.warn(`Error loading file ${filePath}: ${reasonOf(error)}`);
    return "";
  }
}

/**
 * Reads a JSON array of animal records. A missing file, malformed JSON or a
 * payload that is not an array all yield an empty list.
 */
export async function loadAnimalDataset(filePath: string, logger: Logger = console): Promise<AnimalRecord[]> {
  let payload: unknown;
  try {
    const raw = await readFile(filePath, "utf8");
    payload = JSON.parse(raw);
  } catch (error) {
    logger.warn(`Error loading file ${filePath}: ${reasonOf(error)}`);
    return [];
  }

  return parseAnimalRecords(payload, (index, issue) => {
    const where = index >= 0 ? ` entry ${index}` : "";
    logger.warn(`Error loading file ${filePath}${where}: ${issue}`);
  });
}

export async function writePage(filePath: string, html: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, html, "utf8");
}
