import { describe, it, expect } from "vitest";
import { getParameter, loadEngineConfig, type ParameterDef } from "../lib/engine-config";
import { convertUnit, resolveUnit, toCanonical, unitSymbol } from "../lib/extraction/units";

const cfg = loadEngineConfig("config");

function param(name: string): ParameterDef {
  const def = getParameter(cfg, name);
  if (!def) throw new Error(`missing parameter ${name}`);
  return def;
}

describe("resolveUnit", () => {
  it("tries the whole token first", () => {
    expect(resolveUnit("metric tons", cfg.units)?.key).toBe("metric tons");
  });

  it("falls back to the leading run before a separator", () => {
    expect(resolveUnit("kW/2500hp", cfg.units)?.key).toBe("kw");
  });

  it("applies per-parameter aliases", () => {
    expect(resolveUnit("lbs", cfg.units, { lbs: "lbf" })?.key).toBe("lbf");
    expect(resolveUnit("lbs", cfg.units)?.key).toBe("lbs");
  });

  it("returns null for unknown tokens", () => {
    expect(resolveUnit("furlongs", cfg.units)).toBeNull();
  });
});

describe("toCanonical", () => {
  it("converts into the parameter's canonical unit", () => {
    expect(toCanonical(180, "t", param("operating_weight_kg"), cfg)).toEqual({ value: 180000, unit: "kg" });
    expect(toCanonical(2650, "hp", param("engine_power_kw"), cfg)).toEqual({ value: 1976.104661, unit: "kw" });
  });

  it("keeps the raw number with a null unit on a dimension mismatch", () => {
    expect(toCanonical(100, "kW", param("operating_weight_kg"), cfg)).toEqual({ value: 100, unit: null });
  });

  it("keeps the raw number with a null unit when the unit is unknown or missing", () => {
    expect(toCanonical(5, "furlongs", param("overall_length_m"), cfg)).toEqual({ value: 5, unit: null });
    expect(toCanonical(5, null, param("overall_length_m"), cfg)).toEqual({ value: 5, unit: null });
  });
});

describe("convertUnit", () => {
  it("converts between units of one dimension", () => {
    expect(convertUnit(10, "mph", "km/h", cfg)).toBe(16.09344);
    expect(convertUnit(10, "mph", "kn", cfg)).toBeNull();
  });
});

describe("unitSymbol", () => {
  it("prefers the configured symbol", () => {
    expect(unitSymbol("m3", cfg)).toBe("m³");
    expect(unitSymbol("lpm", cfg)).toBe("lpm");
    expect(unitSymbol(null, cfg)).toBe("");
  });
});
