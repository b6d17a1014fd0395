import { existsSync, readFileSync } from "node:fs";
import path from "node:path";

const KEY_VARIABLES = ["API_NINJAS_KEY", "API_NINJA_KEY"];

const KEY_FILES = ["api_ninjas_key", "api_ninjas_key.txt", "api_ninjas_key.key"];

export function secretsDirectories(): string[] {
  return [process.env.SECRETS_DIR, path.join(process.cwd(), "secrets")].filter((value): value is string => Boolean(value));
}

/**
 * API Ninjas key from the environment, else from the first non-empty key
 * file in `directories`.
 */
export function loadApiNinjasKey(directories: string[] = secretsDirectories()): string | undefined {
  for (const variable of KEY_VARIABLES) {
    const trimmed = process.env[variable]?.trim();
    if (trimmed) {
      return trimmed;
    }
  }

  for (const dir of directories) {
    for (const file of KEY_FILES) {
      const candidate = path.join(dir, file);
      if (!existsSync(candidate)) {
        continue;
      }
      try {
        const contents = readFileSync(candidate, "utf8").trim();
        if (contents) {
          return contents;
        }
      } catch (error) {
        console.warn(`Failed to read API key from ${candidate}: ${String(error)}`);
      }
    }
  }

  return undefined;
}
