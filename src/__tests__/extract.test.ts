import { describe, it, expect } from "vitest";
import { loadEngineConfig } from "../lib/engine-config";
import { candidateId } from "../lib/extraction/candidates";
import { extract, extractDocument } from "../lib/extraction/extract";
import { lookupHeader, getCatalog, unitAfterNumber } from "../lib/extraction/matchers";
import {
  ContentType,
  EquipmentClass,
  ExtractionMethod,
  type EquipmentRef,
  type ExtractionCandidate,
  type RawDocument,
  type Table,
} from "../lib/types";

const cfg = loadEngineConfig("config");
const truck: EquipmentRef = { brand: "Komatsu", model: "930E", equipmentClass: EquipmentClass.HAUL_TRUCK };

function doc(text: string, tables: Table[] = [], url = "https://www.komatsu.com/930e"): RawDocument {
  return {
    url,
    contentType: ContentType.HTML,
    text,
    tables,
    fetchedAt: "2024-01-01T00:00:00.000Z",
    sourceDomain: "www.komatsu.com",
  };
}

function byParam(candidates: ExtractionCandidate[], name: string): ExtractionCandidate[] {
  return candidates.filter((c) => c.parameterName === name);
}

describe("extract: prose", () => {
  it("reads labelled values and converts them to canonical units", () => {
    const text = "Operating weight: 180,000 kg\nEngine power 1,975 kW (2,650 hp)";
    const candidates = extract(doc(text), truck, cfg);

    const [weight] = byParam(candidates, "operating_weight_kg");
    expect(weight.normalizedValue).toBe(180000);
    expect(weight.unit).toBe("kg");
    expect(weight.rawMatch).toBe("Operating weight: 180,000 kg");
    expect(weight.matchedSpan).toEqual({ kind: "text", start: 0, end: 28 });
    expect(weight.extractionMethod).toBe(ExtractionMethod.REGEX);
    expect(weight.equipmentClass).toBe(EquipmentClass.HAUL_TRUCK);
    expect(weight.sourceDocumentRef).toBe("https://www.komatsu.com/930e");

    const power = byParam(candidates, "engine_power_kw");
    expect(power).toHaveLength(1);
    expect(power[0].normalizedValue).toBe(1975);
    expect(power[0].unit).toBe("kw");
  });

  it("matches Spanish labels with accents", () => {
    const candidates = extract(doc("Fuerza de tracción: 850 kN"), truck, cfg);
    const rimpull = byParam(candidates, "max_rimpull_kn");
    expect(rimpull).toHaveLength(1);
    expect(rimpull[0].normalizedValue).toBe(850);
    expect(rimpull[0].unit).toBe("kn");
  });

  it("emits nothing for placeholder values", () => {
    expect(extract(doc("Payload: N/A"), truck, cfg)).toEqual([]);
  });

  it("keeps the raw number with a null unit when the unit is unknown", () => {
    const candidates = extract(doc("Operating weight: 180000 furlongs"), truck, cfg);
    const [weight] = byParam(candidates, "operating_weight_kg");
    expect(weight.normalizedValue).toBe(180000);
    expect(weight.unit).toBeNull();
  });

  it("reads counts from catalog patterns", () => {
    const candidates = extract(doc("Engine: 16 cylinders, four-stroke"), truck, cfg);
    const cylinders = byParam(candidates, "cylinders");
    expect(cylinders).toHaveLength(1);
    expect(cylinders[0].normalizedValue).toBe(16);
    expect(cylinders[0].unit).toBeNull();
  });

  it("gives the same ids for the same document", () => {
    const text = "Operating weight: 180,000 kg";
    const first = extract(doc(text), truck, cfg);
    const second = extract(doc(text), truck, cfg);
    expect(first.map((c) => c.id)).toEqual(second.map((c) => c.id));
    expect(first[0].id).toBe(
      candidateId(
        { url: "https://www.komatsu.com/930e", brand: "Komatsu", model: "930E" },
        "operating_weight_kg",
        ExtractionMethod.REGEX,
        { kind: "text", start: 0, end: 28 },
        "Operating weight: 180,000 kg"
      )
    );
    expect(first[0].id).toMatch(/^[0-9a-f]{16}$/);
  });

  it("gives different ids when one document is read for two models", () => {
    const text = "Operating weight: 180,000 kg";
    const [forTruck] = extract(doc(text), truck, cfg);
    const [forSibling] = extract(doc(text), { ...truck, model: "980E" }, cfg);
    expect(forTruck.normalizedValue).toBe(forSibling.normalizedValue);
    expect(forTruck.id).not.toBe(forSibling.id);
  });

  it("stays fast on pathological input", () => {
    const text = "Operating weight: " + "9".repeat(1_000_000);
    const started = Date.now();
    const candidates = extract(doc(text), truck, cfg);
    expect(Date.now() - started).toBeLessThan(5000);
    expect(byParam(candidates, "operating_weight_kg")).toEqual([]);
  });

  it("tolerates empty documents", () => {
    expect(extractDocument(doc(""), truck, cfg)).toEqual({ candidates: [], rimpullCurves: [] });
  });
});

describe("extract: tables", () => {
  it("reads key/value rows", () => {
    const table: Table = [
      ["Operating weight", "181 400 kg"],
      ["Payload", "TBD"],
      ["Engine model", "Cummins QSK60"],
      ["Gross power (hp)", "2,700"],
    ];
    const candidates = extract(doc("", [table]), truck, cfg);

    expect(candidates.map((c) => [c.parameterName, c.normalizedValue, c.unit])).toEqual([
      ["operating_weight_kg", 181400, "kg"],
      ["engine_model", "Cummins QSK60", null],
      ["engine_power_kw", 2013.389654, "kw"],
    ]);
    expect(candidates[0].extractionMethod).toBe(ExtractionMethod.TABLE_CELL);
    expect(candidates[0].matchedSpan).toEqual({ kind: "table", table: 0, row: 0, column: 1 });
    expect(candidates[0].rawMatch).toBe("181 400 kg");
  });

  it("reads the row of the requested model from a wide table", () => {
    const table: Table = [
      ["Model", "Operating weight (t)", "Engine power (kW)"],
      ["930E", "252", "2014"],
      ["980E", "280", "2610"],
    ];
    const candidates = extract(doc("", [table]), truck, cfg);

    expect(candidates.map((c) => [c.parameterName, c.normalizedValue, c.unit])).toEqual([
      ["operating_weight_kg", 252000, "kg"],
      ["engine_power_kw", 2014, "kw"],
    ]);
    expect(candidates.every((c) => c.matchedSpan.kind === "table" && c.matchedSpan.row === 1)).toBe(true);
  });

  it("turns rimpull tables into a curve and a max rimpull candidate", () => {
    const table: Table = [
      ["Gear", "Speed (km/h)", "Rimpull (kN)"],
      ["1", "5", "850"],
      ["1", "10", "600"],
    ];
    const { candidates, rimpullCurves } = extractDocument(doc("", [table]), truck, cfg);
    expect(rimpullCurves).toHaveLength(1);
    expect(rimpullCurves[0].points).toEqual([
      { gear: 1, speedKph: 5, forceKn: 850 },
      { gear: 1, speedKph: 10, forceKn: 600 },
    ]);
    expect(candidates).toHaveLength(1);
    expect(candidates[0].parameterName).toBe("max_rimpull_kn");
    expect(candidates[0].extractionMethod).toBe(ExtractionMethod.RIMPULL_TABLE);
  });
});

describe("matchers", () => {
  const catalog = getCatalog(cfg);

  it("maps table labels to parameters", () => {
    expect(lookupHeader("Operating Weight", catalog)?.name).toBe("operating_weight_kg");
    expect(lookupHeader("Peso operativo (kg)", catalog)?.name).toBe("operating_weight_kg");
    expect(lookupHeader("Operating weight with bucket", catalog)?.name).toBe("operating_weight_kg");
    expect(lookupHeader("Colour", catalog)).toBeNull();
  });

  it("reads the unit right after a number", () => {
    expect(unitAfterNumber("1 975 kW (2,650 hp)")).toBe("kW");
    expect(unitAfterNumber("2,700")).toBeNull();
  });
});
