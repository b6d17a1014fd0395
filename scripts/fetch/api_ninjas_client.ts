import { type AnimalRecord, type Logger, parseAnimalRecords } from "../../src/lib/animals/types.js";
import { loadApiNinjasKey } from "../lib/secrets.js";
import { buildQueryUrl, request } from "./http.js";

export const DEFAULT_API_BASE = "https://api.api-ninjas.com/v1/animals";

export interface AnimalApiClientOptions {
  /** Endpoint URL. Defaults to the API Ninjas animals endpoint. */
  baseUrl?: string;
  /** Query parameter carrying the search text. Defaults to `name`. */
  queryParam?: string;
  /** Falls back to `loadApiNinjasKey()` when omitted. */
  apiKey?: string;
  logger?: Logger;
}

export interface AnimalSource {
  searchAnimals(query: string): Promise<AnimalRecord[]>;
}

export class AnimalApiClient implements AnimalSource {
  readonly #baseUrl: string;
  readonly #queryParam: string;
  readonly #apiKey: string | undefined;
  readonly #logger: Logger;

  constructor(options: AnimalApiClientOptions = {}) {
    this.#baseUrl = options.baseUrl ?? DEFAULT_API_BASE;
    this.#queryParam = options.queryParam ?? "name";
    this.#apiKey = options.apiKey;
    this.#logger = options.logger ?? console;
  }

  buildUrl(query: string): string {
    return buildQueryUrl(this.#baseUrl, { [this.#queryParam]: query });
  }

  /**
   * Looks up animals matching `query`. Any failure (missing key, transport
   * error, bad status, unexpected payload) is logged and reported as no
   * results.
   */
  async searchAnimals(query: string): Promise<AnimalRecord[]> {
    const apiKey = this.#apiKey ?? loadApiNinjasKey();
    if (!apiKey) {
      this.#logger.warn("Failed to fetch animals from API: missing API_NINJAS_KEY.");
      return [];
    }

    let raw: unknown;
    try {
      raw = await request<unknown>(this.buildUrl(query), { headers: { "X-Api-Key": apiKey } });
    } catch (error) {
      this.#logger.warn(`Failed to fetch animals from API: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }

    return parseAnimalRecords(raw, (index, issue) => {
      const where = index >= 0 ? ` (entry ${index})` : "";
      this.#logger.warn(`Skipping API result${where}: ${issue}`);
    });
  }
}
