import { z } from "zod";

export type AnimalValue = string | string[] | AnimalMapping;

export interface AnimalMapping {
  [key: string]: AnimalValue;
}

export type AnimalRecord = AnimalMapping;

export type Logger = Pick<Console, "log" | "warn" | "error">;

export const UNKNOWN_GROUP = "Unknown";

export const DEFAULT_PLACEHOLDER = "__REPLACE_ANIMALS_INFO__";

const scalarSchema = z.union([
  z.string(),
  z.number().transform((value) => String(value)),
  z.boolean().transform((value) => String(value)),
  z.null().transform(() => ""),
]);

// Fields whose shape fits no AnimalValue are left out; the mapping itself stays.
function keepValidFields(entries: Record<string, unknown>): AnimalMapping {
  const mapping: AnimalMapping = {};
  for (const [key, raw] of Object.entries(entries)) {
    const parsed = animalValueSchema.safeParse(raw);
    if (parsed.success) {
      mapping[key] = parsed.data;
    }
  }
  return mapping;
}

const mappingSchema = z.record(z.unknown()).transform(keepValidFields);

export const animalValueSchema: z.ZodType<AnimalValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([scalarSchema, z.array(scalarSchema), mappingSchema]),
);

export const animalRecordSchema: z.ZodType<AnimalRecord, z.ZodTypeDef, unknown> = mappingSchema;

/**
 * Validates a raw payload entry by entry. Entries that are not objects are
 * dropped and reported through `onInvalid` with their index; inside a record
 * only the fields that fit no value shape are dropped.
 */
export function parseAnimalRecords(
  payload: unknown,
  onInvalid: (index: number, issue: string) => void = () => {},
): AnimalRecord[] {
  if (!Array.isArray(payload)) {
    onInvalid(-1, "expected an array of animal records");
    return [];
  }
  const records: AnimalRecord[] = [];
  payload.forEach((entry, index) => {
    const parsed = animalRecordSchema.safeParse(entry);
    if (parsed.success) {
      records.push(parsed.data);
      return;
    }
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    onInvalid(index, `${issue?.message ?? "invalid record"}${where}`);
  });
  return records;
}
