import type { EngineConfig, ParameterDef, UnitDef } from "../engine-config";

export function normalizeUnitToken(raw: string): string {
  return raw
    .toLowerCase()
    .replace(/³/g, "3")
    .replace(/²/g, "2")
    .replace(/[·•]/g, ".")
    .replace(/⁻¹/g, "-1")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/\.$/, "");
}

export interface ResolvedUnit {
  key: string;
  def: UnitDef;
}

/**
 * Looks a unit token up in the conversion table. "metric tons" is tried whole,
 * then "metric", then the leading run before any separator ("kW/2500hp" -> "kw").
 */
export function resolveUnit(
  raw: string,
  units: Map<string, UnitDef>,
  aliases?: Record<string, string>
): ResolvedUnit | null {
  const token = normalizeUnitToken(raw);
  if (!token) return null;

  const attempts = [token, token.split(" ")[0], token.split(/[\s(/,;]/)[0]];
  for (const attempt of attempts) {
    if (!attempt) continue;
    const key = aliases && Object.hasOwn(aliases, attempt) ? aliases[attempt] : attempt;
    const def = units.get(key);
    if (def) return { key, def };
  }
  return null;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export interface Conversion {
  value: number;
  unit: string | null;
}

/**
 * Converts a parsed number into the parameter's canonical unit. A missing,
 * unknown or wrong-dimension unit keeps the raw number with `unit: null`.
 */
export function toCanonical(
  value: number,
  rawUnit: string | null,
  param: ParameterDef,
  cfg: EngineConfig
): Conversion {
  if (param.kind !== "numeric" || !param.canonicalUnit || !rawUnit) {
    return { value, unit: null };
  }
  const canonical = cfg.units.get(param.canonicalUnit);
  const resolved = resolveUnit(rawUnit, cfg.units, param.unitAliases);
  if (!canonical || !resolved || resolved.def.dimension !== canonical.dimension) {
    return { value, unit: null };
  }
  return {
    value: roundTo((value * resolved.def.factor) / canonical.factor, 6),
    unit: param.canonicalUnit,
  };
}

export function convertUnit(
  value: number,
  rawUnit: string,
  targetUnit: string,
  cfg: EngineConfig,
  aliases?: Record<string, string>
): number | null {
  const target = cfg.units.get(targetUnit);
  const resolved = resolveUnit(rawUnit, cfg.units, aliases);
  if (!target || !resolved || resolved.def.dimension !== target.dimension) return null;
  return roundTo((value * resolved.def.factor) / target.factor, 6);
}

export function unitSymbol(unit: string | null, cfg: EngineConfig): string {
  if (!unit) return "";
  return cfg.units.get(unit)?.symbol ?? unit;
}
