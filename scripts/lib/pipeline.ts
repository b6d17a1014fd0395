import { describeGroupPath, groupAnimals } from "../../src/lib/animals/group.js";
import {
  composeAnimalCards,
  renderFilterHeading,
  renderMissingBanner,
  renderResultBanner,
  substitutePlaceholder,
} from "../../src/lib/animals/page.js";
import type { AnimalRecord, Logger } from "../../src/lib/animals/types.js";
import type { AnimalSource } from "../fetch/api_ninjas_client.js";
import type { AnimalPageConfig } from "./config.js";
import { type Prompter, chooseGroup } from "./prompt.js";

export interface PageBuildDeps {
  loadDataset(filePath: string): Promise<AnimalRecord[]>;
  loadTemplate(filePath: string): Promise<string>;
  writePage(filePath: string, html: string): Promise<void>;
  source: AnimalSource;
  prompter: Prompter;
  logger: Logger;
}

export type PageBuildResult =
  | {
      status: "written";
      outputFile: string;
      cardCount: number;
      groupKey: string | null;
      query: string | null;
    }
  | { status: "empty" };

type PageConfig = Pick<AnimalPageConfig, "templateFile" | "outputFile" | "placeholder" | "groupBy">;

async function renderAndWrite(
  config: PageConfig,
  deps: PageBuildDeps,
  content: string,
  summary: Omit<Extract<PageBuildResult, { status: "written" }>, "status" | "outputFile">,
): Promise<PageBuildResult> {
  const template = await deps.loadTemplate(config.templateFile);
  const html = substitutePlaceholder(template, content, config.placeholder, deps.logger);
  await deps.writePage(config.outputFile, html);
  deps.logger.log(`Wrote ${summary.cardCount} animal cards to ${config.outputFile}.`);
  return { status: "written", outputFile: config.outputFile, ...summary };
}

export async function runLocalFlow(config: PageConfig & Pick<AnimalPageConfig, "dataFile">, deps: PageBuildDeps): Promise<PageBuildResult> {
  const { attribute, subAttribute } = config.groupBy;
  const label = describeGroupPath(attribute, subAttribute);
  const records = await deps.loadDataset(config.dataFile);
  const groups = groupAnimals(records, attribute, subAttribute);

  const key = await chooseGroup(groups, deps.prompter, label);
  if (key === null) {
    deps.logger.warn(`No groups found for ${label}; nothing to render.`);
    return { status: "empty" };
  }

  const selected = groups.get(key) ?? [];
  const content = composeAnimalCards(selected, renderFilterHeading(key));
  return renderAndWrite(config, deps, content, { cardCount: selected.length, groupKey: key, query: null });
}

/**
 * Asks for an animal name, looks it up remotely and renders the chosen group.
 * A lookup with no results renders the missing-animal banner instead; a
 * lookup whose results give nothing to choose from asks for a new name.
 */
export async function runRemoteFlow(config: PageConfig, deps: PageBuildDeps): Promise<PageBuildResult> {
  const { attribute, subAttribute } = config.groupBy;
  const label = describeGroupPath(attribute, subAttribute);

  while (true) {
    const query = await deps.prompter.ask("Enter a name of an animal:");
    const records = await deps.source.searchAnimals(query);

    if (records.length === 0) {
      const content = composeAnimalCards([], renderMissingBanner(query));
      return renderAndWrite(config, deps, content, { cardCount: 0, groupKey: null, query });
    }

    const groups = groupAnimals(records, attribute, subAttribute);
    const key = await chooseGroup(groups, deps.prompter, label);
    if (key === null) {
      deps.prompter.say(`No ${label} values found for "${query}". Try another animal.`);
      continue;
    }

    const selected = groups.get(key) ?? [];
    const content = composeAnimalCards(selected, renderResultBanner(query, key, label));
    return renderAndWrite(config, deps, content, { cardCount: selected.length, groupKey: key, query });
  }
}

export function runPageBuild(config: AnimalPageConfig, deps: PageBuildDeps): Promise<PageBuildResult> {
  return config.mode === "remote" ? runRemoteFlow(config, deps) : runLocalFlow(config, deps);
}
