import { getEngineConfig, type EngineConfig, type ParameterDef } from "../engine-config";
import {
  EquipmentClass,
  ExtractionMethod,
  type EquipmentRef,
  type ExtractionCandidate,
  type MatchedSpan,
  type RawDocument,
  type RimpullCurve,
  type SpecValue,
  type Table,
} from "../types";
import { makeCandidate, type CandidateContext } from "./candidates";
import { getCatalog, lookupHeader, unitAfterNumber, type CompiledCatalog } from "./matchers";
import {
  collapseWhitespace,
  foldAccents,
  isPlaceholder,
  labelUnit,
  normalizeHeader,
  parseNumber,
} from "./normalize";
import { extractRimpullTable, isRimpullTable } from "./rimpull";
import { resolveUnit, toCanonical } from "./units";

export interface ExtractionResult {
  candidates: ExtractionCandidate[];
  rimpullCurves: RimpullCurve[];
}

interface DocContext extends CandidateContext {
  cfg: EngineConfig;
  catalog: CompiledCatalog;
}

const MAX_HITS_PER_MATCHER = 50;

// ===== Values =====

interface ParsedValue {
  value: SpecValue;
  unit: string | null;
}

function numericValue(
  param: ParameterDef,
  rawNumber: string,
  rawUnit: string | null,
  cfg: EngineConfig
): ParsedValue | null {
  const n = parseNumber(rawNumber);
  if (n === null) return null;
  if (param.kind === "count") {
    return Number.isInteger(n) ? { value: n, unit: null } : null;
  }
  return toCanonical(n, rawUnit, param, cfg);
}

/** `matched` is set when a prose regex already applied the value pattern. */
function textValue(param: ParameterDef, raw: string, catalog: CompiledCatalog, matched = false): string | null {
  let value = raw;
  const pattern = catalog.valuePatterns.get(param.name);
  if (pattern && !matched) {
    const match = pattern.exec(foldAccents(raw));
    if (!match) return null;
    value = raw.slice(match.index, match.index + match[0].length);
  }
  value = collapseWhitespace(value);
  if (!value || isPlaceholder(value)) return null;
  return value;
}

// ===== Prose =====

interface ProseHit {
  param: ParameterDef;
  start: number;
  end: number;
  aliasStart: number;
  aliasEnd: number;
  valueStart: number;
  valueEnd: number;
  unit: string | null;
}

function overlaps(a0: number, a1: number, b0: number, b1: number): boolean {
  return a0 < b1 && b0 < a1;
}

function collectProseHits(text: string, folded: string, catalog: CompiledCatalog): ProseHit[] {
  const hits: ProseHit[] = [];
  for (const matcher of catalog.prose) {
    const { regex, param } = matcher;
    regex.lastIndex = 0;
    let count = 0;
    let match: RegExpExecArray | null;
    while ((match = regex.exec(folded)) !== null && count < MAX_HITS_PER_MATCHER) {
      if (match[0].length === 0) {
        regex.lastIndex++;
        continue;
      }
      count++;
      const start = match.index;
      const end = start + match[0].length;
      const indices = match.indices;
      if (!indices) continue;

      if (matcher.source === "pattern") {
        const value = indices[1];
        if (!value) continue;
        hits.push({
          param, start, end,
          aliasStart: start, aliasEnd: end,
          valueStart: value[0], valueEnd: value[1],
          unit: match[2] ?? null,
        });
        continue;
      }

      const alias = indices.groups?.alias;
      const value = indices.groups?.value;
      if (!alias || !value) continue;
      const unitSpan = indices.groups?.unit;
      hits.push({
        param, start, end,
        aliasStart: alias[0], aliasEnd: alias[1],
        valueStart: value[0], valueEnd: value[1],
        unit: unitSpan ? text.slice(unitSpan[0], unitSpan[1]) : null,
      });
    }
  }

  // Longer labels claim their text first: "potencia de retardo" is not "potencia".
  hits.sort(
    (a, b) =>
      b.aliasEnd - b.aliasStart - (a.aliasEnd - a.aliasStart) ||
      a.start - b.start ||
      a.param.name.localeCompare(b.param.name)
  );
  const kept: ProseHit[] = [];
  for (const hit of hits) {
    const clash = kept.some((k) =>
      k.param.name === hit.param.name
        ? overlaps(k.start, k.end, hit.start, hit.end)
        : overlaps(k.aliasStart, k.aliasEnd, hit.aliasStart, hit.aliasEnd)
    );
    if (!clash) kept.push(hit);
  }
  return kept.sort((a, b) => a.start - b.start || a.param.name.localeCompare(b.param.name));
}

function extractProse(text: string, ctx: DocContext): ExtractionCandidate[] {
  if (!text) return [];
  const folded = foldAccents(text);
  const candidates: ExtractionCandidate[] = [];

  for (const hit of collectProseHits(text, folded, ctx.catalog)) {
    const rawValue = text.slice(hit.valueStart, hit.valueEnd);
    const parsed: ParsedValue | null =
      hit.param.kind === "text"
        ? wrapText(textValue(hit.param, rawValue, ctx.catalog, true))
        : numericValue(hit.param, rawValue, hit.unit, ctx.cfg);
    if (!parsed) continue;
    const span: MatchedSpan = { kind: "text", start: hit.start, end: hit.end };
    candidates.push(
      makeCandidate(ctx, hit.param.name, ExtractionMethod.REGEX, span, text.slice(hit.start, hit.end), parsed.value, parsed.unit)
    );
  }
  return candidates;
}

function wrapText(value: string | null): ParsedValue | null {
  return value === null ? null : { value, unit: null };
}

// ===== Tables =====

function cellValue(
  param: ParameterDef,
  cell: string,
  label: string,
  nextCell: string | undefined,
  ctx: DocContext
): ParsedValue | null {
  const { cfg } = ctx;
  if (isPlaceholder(cell)) return null;
  if (param.kind === "text") return wrapText(textValue(param, cell, ctx.catalog));

  let unit = unitAfterNumber(cell) ?? labelUnit(label);
  if (!unit && nextCell && parseNumber(nextCell) === null && resolveUnit(nextCell, cfg.units, param.unitAliases)) {
    unit = nextCell;
  }
  return numericValue(param, cell, unit, cfg);
}

function findModelColumn(rows: Table, model: string): number | null {
  const header = rows[0];
  if (!header) return null;
  const target = normalizeHeader(model);
  if (!target) return null;
  for (let j = 1; j < header.length; j++) {
    const cell = normalizeHeader(header[j]);
    if (cell === target || ` ${cell} `.includes(` ${target} `)) return j;
  }
  return null;
}

function rowMatchesModel(row: string[], model: string): boolean {
  const target = normalizeHeader(model);
  const first = normalizeHeader(row[0] ?? "");
  return target !== "" && ` ${first} `.includes(` ${target} `);
}

function extractWideTable(rows: Table, t: number, ctx: DocContext): ExtractionCandidate[] | null {
  const header = rows[0];
  if (!header || rows.length < 2) return null;
  // A header row holds labels only; a number outside parentheses means key/value layout.
  if (header.some((cell) => parseNumber(normalizeHeader(cell)) !== null)) return null;
  const columns = header.map((cell) => lookupHeader(cell, ctx.catalog));
  if (columns.filter((p) => p !== null).length < 2) return null;

  const dataRows = rows.length === 2 ? [1] : rows.map((_, r) => r).filter((r) => r > 0 && rowMatchesModel(rows[r], ctx.model));
  const candidates: ExtractionCandidate[] = [];
  for (const r of dataRows) {
    columns.forEach((param, col) => {
      const cell = rows[r][col];
      if (!param || cell === undefined) return;
      const parsed = cellValue(param, cell, header[col], undefined, ctx);
      if (!parsed) return;
      const span: MatchedSpan = { kind: "table", table: t, row: r, column: col };
      candidates.push(makeCandidate(ctx, param.name, ExtractionMethod.TABLE_CELL, span, cell, parsed.value, parsed.unit));
    });
  }
  return candidates;
}

function extractKeyValueTable(rows: Table, t: number, ctx: DocContext): ExtractionCandidate[] {
  const modelColumn = findModelColumn(rows, ctx.model);
  const candidates: ExtractionCandidate[] = [];

  rows.forEach((row, r) => {
    for (let j = 0; j < row.length - 1; j++) {
      const param = lookupHeader(row[j], ctx.catalog);
      if (!param) continue;

      let valueCol = -1;
      if (modelColumn !== null && modelColumn > j) {
        valueCol = modelColumn;
      } else {
        for (let k = j + 1; k < row.length; k++) {
          if (row[k].trim() !== "") {
            valueCol = k;
            break;
          }
        }
      }
      if (valueCol === -1) continue;

      const cell = row[valueCol];
      const nextCell = modelColumn === null ? row[valueCol + 1] : undefined;
      const parsed = cellValue(param, cell, row[j], nextCell, ctx);
      if (parsed) {
        const span: MatchedSpan = { kind: "table", table: t, row: r, column: valueCol };
        candidates.push(makeCandidate(ctx, param.name, ExtractionMethod.TABLE_CELL, span, cell, parsed.value, parsed.unit));
      }
      if (modelColumn !== null) break;
      j = valueCol;
    }
  });
  return candidates;
}

function clipTable(table: Table, cfg: EngineConfig): Table {
  const { maxRowsPerTable, maxCellLength } = cfg.engine.extraction;
  return table
    .slice(0, maxRowsPerTable)
    .map((row) => row.map((cell) => String(cell ?? "").slice(0, maxCellLength)));
}

// ===== Entry points =====

/**
 * Turns one fetched document into candidates and rimpull curves. Pure: no I/O,
 * and malformed input yields fewer candidates rather than an error.
 */
export function extractDocument(
  document: RawDocument,
  equipment: EquipmentRef,
  cfg: EngineConfig = getEngineConfig()
): ExtractionResult {
  const ctx: DocContext = {
    url: document.url,
    brand: equipment.brand,
    model: equipment.model,
    equipmentClass: equipment.equipmentClass ?? EquipmentClass.OTHER,
    cfg,
    catalog: getCatalog(cfg),
  };
  const candidates: ExtractionCandidate[] = [];
  const rimpullCurves: RimpullCurve[] = [];

  try {
    const text = (document.text ?? "").slice(0, cfg.engine.extraction.maxTextLength);
    candidates.push(...extractProse(text, ctx));
  } catch (err) {
    console.warn(`[extract] Prose extraction failed for ${document.url}:`, err instanceof Error ? err.message : err);
  }

  const tables = (document.tables ?? []).slice(0, cfg.engine.extraction.maxTables);
  tables.forEach((table, t) => {
    try {
      const rows = clipTable(table, cfg);
      if (isRimpullTable(rows)) {
        const rimpull = extractRimpullTable(rows, t, ctx, cfg);
        candidates.push(...rimpull.candidates);
        if (rimpull.curve) rimpullCurves.push(rimpull.curve);
        return;
      }
      candidates.push(...(extractWideTable(rows, t, ctx) ?? extractKeyValueTable(rows, t, ctx)));
    } catch (err) {
      console.warn(`[extract] Table ${t} of ${document.url} skipped:`, err instanceof Error ? err.message : err);
    }
  });

  return { candidates, rimpullCurves };
}

export function extract(
  document: RawDocument,
  equipment: EquipmentRef,
  cfg: EngineConfig = getEngineConfig()
): ExtractionCandidate[] {
  return extractDocument(document, equipment, cfg).candidates;
}
