import { readFirst, readMapping, readString } from "./record.js";
import type { AnimalMapping, AnimalRecord } from "./types.js";

const INDENT = "  ";

type FactKey = "diet" | "type" | "location" | "temperament" | "average_litter_size" | "lifespan";

interface CardFact {
  key: FactKey;
  label: string;
}

// Location sits between type and temperament on purpose.
export const CARD_FACTS: readonly CardFact[] = [
  { key: "diet", label: "Diet" },
  { key: "type", label: "Type" },
  { key: "location", label: "Location" },
  { key: "temperament", label: "Temperament" },
  { key: "average_litter_size", label: "Average Litter Size" },
  { key: "lifespan", label: "Lifespan" },
];

export interface AnimalCardFields {
  name: string;
  scientificName: string;
  facts: Record<FactKey, string>;
}

function characteristic(characteristics: AnimalMapping, key: string): string {
  const value = characteristics[key];
  return typeof value === "string" ? value : "";
}

export function extractCardFields(record: AnimalRecord): AnimalCardFields {
  const characteristics = readMapping(record, "characteristics");
  return {
    name: readString(record, "name"),
    scientificName: readString(record, "taxonomy.scientific_name"),
    facts: {
      diet: characteristic(characteristics, "diet"),
      type: characteristic(characteristics, "type"),
      location: readFirst(record, "locations"),
      temperament: characteristic(characteristics, "temperament"),
      average_litter_size: characteristic(characteristics, "average_litter_size"),
      lifespan: characteristic(characteristics, "lifespan"),
    },
  };
}

function line(depth: number, markup: string): string {
  return `${INDENT.repeat(depth)}${markup}\n`;
}

/**
 * Renders one record as a `cards__item` list entry. Field values are inserted
 * verbatim; facts with an empty value get no line at all.
 */
export function formatAnimalCard(record: AnimalRecord): string {
  const { name, scientificName, facts } = extractCardFields(record);

  let output = line(0, '<li class="cards__item">');
  output += line(1, `<div class="card__title">${name}</div>`);
  if (scientificName) {
    output += line(1, `<div class="card__subtitle"><em>${scientificName}</em></div>`);
  }
  output += line(1, '<div class="card__text">');
  output += line(2, '<ul class="card__facts">');
  for (const { key, label } of CARD_FACTS) {
    const value = facts[key];
    if (value) {
      output += line(3, `<li><strong>${label}:</strong> ${value}</li>`);
    }
  }
  output += line(2, "</ul>");
  output += line(1, "</div>");
  output += line(0, "</li>");
  return output;
}
