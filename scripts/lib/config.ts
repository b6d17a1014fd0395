import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { DEFAULT_PLACEHOLDER } from "../../src/lib/animals/types.js";
import { DEFAULT_API_BASE } from "../fetch/api_ninjas_client.js";

export const DEFAULT_CONFIG_FILE = "animals.config.yaml";

const configSchema = z
  .object({
    mode: z.enum(["local", "remote"]).default("local"),
    dataFile: z.string().min(1).default("data/animals_data.json"),
    templateFile: z.string().min(1).default("content/templates/animals_template.html"),
    outputFile: z.string().min(1).default("public/animals.html"),
    placeholder: z.string().min(1).default(DEFAULT_PLACEHOLDER),
    groupBy: z
      .object({
        attribute: z.string().min(1).default("characteristics"),
        subAttribute: z.string().min(1).optional(),
      })
      .default({ attribute: "characteristics", subAttribute: "skin_type" }),
    api: z
      .object({
        baseUrl: z.string().url().default(DEFAULT_API_BASE),
        queryParam: z.string().min(1).default("name"),
      })
      .default({}),
  })
  .strip();

export type AnimalPageConfig = z.infer<typeof configSchema>;

function resolveAgainst(baseDir: string, filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.join(baseDir, filePath);
}

/**
 * Validates a parsed config document and resolves its paths against
 * `baseDir`. An `undefined` or `null` document yields the defaults.
 */
export function parseConfig(document: unknown, baseDir: string, source = DEFAULT_CONFIG_FILE): AnimalPageConfig {
  const parsed = configSchema.safeParse(document ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid config in ${source} — ${details}`);
  }
  const config = parsed.data;
  return {
    ...config,
    dataFile: resolveAgainst(baseDir, config.dataFile),
    templateFile: resolveAgainst(baseDir, config.templateFile),
    outputFile: resolveAgainst(baseDir, config.outputFile),
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function loadConfig(
  configPath: string = process.env.ANIMALS_CONFIG || path.join(process.cwd(), DEFAULT_CONFIG_FILE),
): Promise<AnimalPageConfig> {
  const baseDir = path.dirname(path.resolve(configPath));
  let document: unknown;
  try {
    document = parseYaml(await readFile(configPath, "utf8"));
  } catch (error) {
    if (!isMissingFile(error)) {
      throw new Error(`Unable to read config ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
    }
    console.warn(`No config found at ${configPath}; using defaults.`);
  }

  const config = parseConfig(document, baseDir, configPath);
  const modeOverride = process.env.ANIMALS_MODE?.trim();
  if (modeOverride === "local" || modeOverride === "remote") {
    return { ...config, mode: modeOverride };
  }
  return config;
}
