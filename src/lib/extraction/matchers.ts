import type { EngineConfig, ParameterDef } from "../engine-config";
import { NUMBER_RE, UNIT_RE, escapeRegExp, normalizeHeader } from "./normalize";

// Matchers are compiled once per loaded config.

export interface ProseMatcher {
  param: ParameterDef;
  regex: RegExp;
  // "alias" regexes expose alias/value/unit groups, "pattern" regexes expose group 1
  source: "alias" | "pattern";
}

export interface HeaderAlias {
  alias: string;
  param: ParameterDef;
}

export interface CompiledCatalog {
  prose: ProseMatcher[];
  headerAliases: Map<string, ParameterDef>;
  aliasesByLength: HeaderAlias[];
  valuePatterns: Map<string, RegExp>;
}

const BEFORE = "(?<![\\p{L}\\p{N}])";
const AFTER = "(?![\\p{L}])";
const GAP = "[^\\S\\n]";
const PAREN = `(?:${GAP}{0,3}\\([^()\\n]{0,30}\\))?`;

function aliasAlternation(aliases: string[]): string {
  return [...aliases]
    .sort((a, b) => b.length - a.length || a.localeCompare(b))
    .map((a) => escapeRegExp(a.trim()).replace(/\s+/g, `${GAP}{1,3}`))
    .join("|");
}

export function buildAliasRegex(param: ParameterDef): RegExp | null {
  const aliases = aliasAlternation(param.aliases);
  if (param.kind === "text") {
    if (!param.valuePattern) return null;
    return new RegExp(
      `${BEFORE}(?<alias>${aliases})${AFTER}${PAREN}${GAP}{0,3}[:=\\-–]?${GAP}{0,3}(?<value>${param.valuePattern})`,
      "dgiu"
    );
  }
  return new RegExp(
    `${BEFORE}(?<alias>${aliases})${AFTER}${PAREN}[^\\n\\d]{0,24}?(?<value>${NUMBER_RE.source})(?:${GAP}{0,2}(?<unit>${UNIT_RE.source}))?`,
    "dgiu"
  );
}

function compile(cfg: EngineConfig): CompiledCatalog {
  const prose: ProseMatcher[] = [];
  const headerAliases = new Map<string, ParameterDef>();
  const aliasesByLength: HeaderAlias[] = [];
  const valuePatterns = new Map<string, RegExp>();

  for (const param of cfg.parameters) {
    if (param.valuePattern) valuePatterns.set(param.name, new RegExp(param.valuePattern, "iu"));
    const aliasRegex = buildAliasRegex(param);
    if (aliasRegex) prose.push({ param, regex: aliasRegex, source: "alias" });
    for (const pattern of param.patterns ?? []) {
      prose.push({ param, regex: new RegExp(pattern, "dgiu"), source: "pattern" });
    }
    for (const alias of param.aliases) {
      const key = normalizeHeader(alias);
      if (!key || headerAliases.has(key)) continue;
      headerAliases.set(key, param);
      aliasesByLength.push({ alias: key, param });
    }
  }

  aliasesByLength.sort((a, b) => b.alias.length - a.alias.length || a.alias.localeCompare(b.alias));
  return { prose, headerAliases, aliasesByLength, valuePatterns };
}

const compiled = new WeakMap<EngineConfig, CompiledCatalog>();

export function getCatalog(cfg: EngineConfig): CompiledCatalog {
  let catalog = compiled.get(cfg);
  if (!catalog) {
    catalog = compile(cfg);
    compiled.set(cfg, catalog);
  }
  return catalog;
}

const MAX_HEADER_LENGTH = 80;

/**
 * Maps a table label to a parameter: exact alias first, then the longest alias
 * the label starts with as whole words ("operating weight with bucket").
 */
export function lookupHeader(cell: string, catalog: CompiledCatalog): ParameterDef | null {
  if (cell.length > MAX_HEADER_LENGTH) return null;
  const key = normalizeHeader(cell);
  if (!key) return null;
  const exact = catalog.headerAliases.get(key);
  if (exact) return exact;
  for (const { alias, param } of catalog.aliasesByLength) {
    if (key.startsWith(`${alias} `)) return param;
  }
  return null;
}

/** Unit written right after the first number in a cell ("1 975 kW (2,650 hp)" -> "kW"). */
export function unitAfterNumber(cell: string): string | null {
  const number = NUMBER_RE.exec(cell);
  if (!number) return null;
  const rest = cell.slice(number.index + number[0].length);
  const unit = new RegExp(`^${GAP}{0,2}(${UNIT_RE.source})`).exec(rest);
  return unit ? unit[1] : null;
}
