import { describe, it, expect } from "vitest";
import {
  getParameter,
  loadEngineConfig,
  parseEngineConfig,
  plausibleRange,
  type EngineConfig,
  type EngineConfigFiles,
} from "../lib/engine-config";
import { ConfigError } from "../lib/errors";
import { EquipmentClass } from "../lib/types";

const cfg = loadEngineConfig("config");

function filesOf(config: EngineConfig): EngineConfigFiles {
  return {
    engine: config.engine,
    units: { dimensions: Object.fromEntries(config.dimensions), units: Object.fromEntries(config.units) },
    parameters: { parameters: config.parameters },
    sourceDomains: config.sourceDomains,
  };
}

function issuesOf(files: EngineConfigFiles): string[] {
  try {
    parseEngineConfig(files);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  return [];
}

describe("loadEngineConfig", () => {
  it("loads the shipped catalog", () => {
    expect(cfg.engine.thresholds).toEqual({ acceptance: 0.6, disagreementRatio: 0.5, visibility: 0.2 });
    expect(cfg.units.get("kg")).toEqual({ dimension: "mass", factor: 1, symbol: "kg" });
    expect(getParameter(cfg, "operating_weight_kg")?.canonicalUnit).toBe("kg");
    expect(getParameter(cfg, "paint_colour")).toBeUndefined();
  });

  it("round-trips through parseEngineConfig", () => {
    expect(issuesOf(filesOf(cfg))).toEqual([]);
  });

  it("fails with a ConfigError when files are missing", () => {
    expect(() => loadEngineConfig("no-such-config-dir")).toThrow(ConfigError);
  });
});

describe("parseEngineConfig", () => {
  it("reports schema violations with their path", () => {
    const files = filesOf(cfg);
    files.engine = { ...cfg.engine, thresholds: { ...cfg.engine.thresholds, acceptance: 1.5 } };
    expect(issuesOf(files)).toEqual(["engine.json: thresholds.acceptance: Number must be less than or equal to 1"]);
  });

  it("rejects a visibility threshold above acceptance", () => {
    const files = filesOf(cfg);
    files.engine = { ...cfg.engine, thresholds: { ...cfg.engine.thresholds, visibility: 0.7 } };
    expect(issuesOf(files)).toEqual(["engine.json: thresholds.visibility must not exceed thresholds.acceptance"]);
  });

  it("rejects unbounded quantifiers in catalog patterns", () => {
    const files = filesOf(cfg);
    files.parameters = {
      parameters: cfg.parameters.map((p) => (p.name === "payload_kg" ? { ...p, patterns: ["(\\d+) payload"] } : p)),
    };
    expect(issuesOf(files)).toEqual(['parameters.json: payload_kg.patterns[0]: unbounded quantifier in "(\\d+) payload"']);
  });

  it("requires a capture group in catalog patterns", () => {
    const files = filesOf(cfg);
    files.parameters = {
      parameters: cfg.parameters.map((p) => (p.name === "payload_kg" ? { ...p, patterns: ["payload \\d{1,6}"] } : p)),
    };
    expect(issuesOf(files)).toEqual(["parameters.json: payload_kg.patterns[0]: pattern needs a capture group for the value"]);
  });

  it("rejects unit aliases of the wrong dimension", () => {
    const files = filesOf(cfg);
    files.parameters = {
      parameters: cfg.parameters.map((p) => (p.name === "payload_kg" ? { ...p, unitAliases: { hp: "kw" } } : p)),
    };
    expect(issuesOf(files)).toEqual(['parameters.json: payload_kg: unit alias "hp" is power, expected mass']);
  });

  it("rejects core parameters the catalog does not define", () => {
    const files = filesOf(cfg);
    files.engine = {
      ...cfg.engine,
      qa: { coreParameters: { ...cfg.engine.qa.coreParameters, dozer: ["blade_width_m"] } },
    };
    expect(issuesOf(files)).toEqual(['engine.json: qa.coreParameters.dozer names unknown parameter "blade_width_m"']);
  });
});

describe("plausibleRange", () => {
  it("prefers the class range over the default", () => {
    const weight = getParameter(cfg, "operating_weight_kg");
    if (!weight) throw new Error("missing parameter");
    expect(plausibleRange(weight, EquipmentClass.DOZER)).toEqual({ min: 10000, max: 130000 });
    expect(plausibleRange(weight, EquipmentClass.OTHER)).toEqual({ min: 10000, max: 1600000 });
  });

  it("is undefined for text parameters", () => {
    const engineModel = getParameter(cfg, "engine_model");
    if (!engineModel) throw new Error("missing parameter");
    expect(plausibleRange(engineModel, EquipmentClass.HAUL_TRUCK)).toBeUndefined();
  });
});
