import { formatAnimalCard } from "./card.js";
import type { AnimalRecord, Logger } from "./types.js";

const TOKEN_CHAR = /[A-Za-z0-9_]/;

export function renderFilterHeading(key: string): string {
  return `<h2 class="cards__heading">Filtered by: ${key}</h2>\n`;
}

export function renderResultBanner(query: string, key: string, label = "skin type"): string {
  return `<h2 class="cards__heading">Results for "${query}" with ${label}: ${key}</h2>\n`;
}

export function renderMissingBanner(query: string): string {
  return `<h2 class="cards__error">The animal "${query}" doesn't exist.</h2>\n`;
}

export function composeAnimalCards(records: readonly AnimalRecord[], banner = ""): string {
  let output = banner;
  for (const record of records) {
    output += formatAnimalCard(record);
  }
  return output;
}

/** Index of the first occurrence of `placeholder` not embedded in a longer identifier, or -1. */
export function findPlaceholder(template: string, placeholder: string): number {
  if (!placeholder) {
    return -1;
  }
  let index = template.indexOf(placeholder);
  while (index !== -1) {
    const before = index > 0 ? template[index - 1] : "";
    const after = template.charAt(index + placeholder.length);
    if (!TOKEN_CHAR.test(before) && !TOKEN_CHAR.test(after)) {
      return index;
    }
    index = template.indexOf(placeholder, index + 1);
  }
  return -1;
}

export function substitutePlaceholder(
  template: string,
  content: string,
  placeholder: string,
  logger: Logger = console,
): string {
  const index = findPlaceholder(template, placeholder);
  if (index === -1) {
    logger.warn(`Placeholder ${placeholder} not found in template; leaving it unchanged.`);
    return template;
  }
  return `${template.slice(0, index)}${content}${template.slice(index + placeholder.length)}`;
}
