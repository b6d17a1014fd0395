#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";

import { AnimalApiClient } from "./fetch/api_ninjas_client.js";
import { loadConfig } from "./lib/config.js";
import { loadAnimalDataset, loadTemplate, writePage } from "./lib/files.js";
import { runPageBuild } from "./lib/pipeline.js";
import { createConsolePrompter } from "./lib/prompt.js";

async function main() {
  const config = await loadConfig();
  const prompter = createConsolePrompter();
  try {
    const result = await runPageBuild(config, {
      loadDataset: (filePath) => loadAnimalDataset(filePath),
      loadTemplate: (filePath) => loadTemplate(filePath),
      writePage,
      source: new AnimalApiClient({ baseUrl: config.api.baseUrl, queryParam: config.api.queryParam }),
      prompter,
      logger: console,
    });
    if (result.status === "empty") {
      console.warn("No page written.");
    }
  } finally {
    prompter.close();
  }
}

const isMain = process.argv[1] && pathToFileURL(realpathSync(process.argv[1])).href === import.meta.url;

if (isMain) {
  main().catch((error: unknown) => {
    console.error("Failed to build animals page:", error);
    process.exitCode = 1;
  });
}
