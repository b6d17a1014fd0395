import { describe, expect, it, vi } from "vitest";

import { formatAnimalCard } from "../../src/lib/animals/card.js";
import {
  composeAnimalCards,
  findPlaceholder,
  renderFilterHeading,
  renderMissingBanner,
  renderResultBanner,
  substitutePlaceholder,
} from "../../src/lib/animals/page.js";
import { DEFAULT_PLACEHOLDER } from "../../src/lib/animals/types.js";

function createLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("composeAnimalCards", () => {
  it("joins cards in input order after the banner", () => {
    const owl = { name: "Owl" };
    const fox = { name: "Fox" };

    const content = composeAnimalCards([owl, fox], renderFilterHeading("Feathers"));

    expect(content).toBe(
      `<h2 class="cards__heading">Filtered by: Feathers</h2>\n${formatAnimalCard(owl)}${formatAnimalCard(fox)}`,
    );
  });

  it("renders only the banner when there are no records", () => {
    expect(composeAnimalCards([], renderMissingBanner("Dodo"))).toBe(
      '<h2 class="cards__error">The animal "Dodo" doesn\'t exist.</h2>\n',
    );
  });

  it("names the query and key in the result banner", () => {
    expect(renderResultBanner("fox", "Fur")).toBe('<h2 class="cards__heading">Results for "fox" with skin type: Fur</h2>\n');
  });
});

describe("substitutePlaceholder", () => {
  it("replaces the placeholder once", () => {
    const logger = createLogger();
    const template = `<ul>\n${DEFAULT_PLACEHOLDER}\n</ul>`;

    expect(substitutePlaceholder(template, "<li>x</li>", DEFAULT_PLACEHOLDER, logger)).toBe("<ul>\n<li>x</li>\n</ul>");
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("leaves a second occurrence in place", () => {
    const template = `${DEFAULT_PLACEHOLDER}|${DEFAULT_PLACEHOLDER}`;

    expect(substitutePlaceholder(template, "A", DEFAULT_PLACEHOLDER, createLogger())).toBe(`A|${DEFAULT_PLACEHOLDER}`);
  });

  it("returns the template unchanged and reports when the placeholder is absent", () => {
    const logger = createLogger();
    const template = "<ul></ul>";

    expect(substitutePlaceholder(template, "<li>x</li>", DEFAULT_PLACEHOLDER, logger)).toBe(template);
    expect(logger.warn).toHaveBeenCalledWith(
      "Placeholder __REPLACE_ANIMALS_INFO__ not found in template; leaving it unchanged.",
    );
  });

  it("only matches the whole token", () => {
    const template = `X${DEFAULT_PLACEHOLDER} ${DEFAULT_PLACEHOLDER}_OLD ${DEFAULT_PLACEHOLDER}.`;

    expect(findPlaceholder(template, DEFAULT_PLACEHOLDER)).toBe(template.lastIndexOf(DEFAULT_PLACEHOLDER));
    expect(substitutePlaceholder(template, "ok", DEFAULT_PLACEHOLDER, createLogger())).toBe(
      `X${DEFAULT_PLACEHOLDER} ${DEFAULT_PLACEHOLDER}_OLD ok.`,
    );
    expect(findPlaceholder(`${DEFAULT_PLACEHOLDER}S`, DEFAULT_PLACEHOLDER)).toBe(-1);
  });

  it("inserts content containing replacement patterns literally", () => {
    const result = substitutePlaceholder(`[${DEFAULT_PLACEHOLDER}]`, "costs $& and $1", DEFAULT_PLACEHOLDER, createLogger());

    expect(result).toBe("[costs $& and $1]");
  });
});
