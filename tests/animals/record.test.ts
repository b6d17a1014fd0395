import { describe, expect, it } from "vitest";

import { readFirst, readMapping, readPath, readString } from "../../src/lib/animals/record.js";
import type { AnimalRecord } from "../../src/lib/animals/types.js";

const fox: AnimalRecord = {
  name: "Fox",
  taxonomy: { scientific_name: "Vulpes vulpes" },
  locations: ["Europe", "Asia"],
  characteristics: { diet: "Omnivore" },
};

describe("readPath", () => {
  it("follows dotted and array paths through nested mappings", () => {
    expect(readPath(fox, "taxonomy.scientific_name")).toBe("Vulpes vulpes");
    expect(readPath(fox, ["characteristics", "diet"])).toBe("Omnivore");
  });

  it("returns the fallback when a key is missing", () => {
    expect(readPath(fox, "characteristics.lifespan")).toBe("");
    expect(readPath(fox, "habitat.region", "n/a")).toBe("n/a");
  });

  it("returns the fallback when an intermediate value is not a mapping", () => {
    expect(readPath(fox, "name.first")).toBe("");
    expect(readPath(fox, "locations.0", "none")).toBe("none");
  });

  it("does not read inherited properties", () => {
    expect(readPath(fox, "constructor")).toBe("");
  });
});

describe("typed readers", () => {
  it("reads strings only", () => {
    expect(readString(fox, "name")).toBe("Fox");
    expect(readString(fox, "characteristics")).toBe("");
  });

  it("reads mappings or an empty mapping", () => {
    expect(readMapping(fox, "characteristics")).toEqual({ diet: "Omnivore" });
    expect(readMapping(fox, "name")).toEqual({});
    expect(readMapping({}, "characteristics")).toEqual({});
  });

  it("reads the first list entry", () => {
    expect(readFirst(fox, "locations")).toBe("Europe");
    expect(readFirst({ locations: [] }, "locations")).toBe("");
    expect(readFirst({ locations: "Europe" }, "locations")).toBe("");
    expect(readFirst({}, "locations")).toBe("");
  });
});
