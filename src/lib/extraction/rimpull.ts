import type { EngineConfig, ValueRange } from "../engine-config";
import {
  ExtractionMethod,
  type ExtractionCandidate,
  type RimpullCurve,
  type RimpullPoint,
  type Table,
} from "../types";
import { makeCandidate, type CandidateContext } from "./candidates";
import { normalizeHeader, parseNumber } from "./normalize";
import { convertUnit, roundTo } from "./units";

const GEAR_WORDS = /\b(?:gear|gears|marcha|marchas|cambio|engrenagem|range)\b/;
const FORCE_WORDS = /\b(?:rimpull|tractive|traction|traccion|tracao|force|fuerza|forca|drawbar|pull)\b/;
const SPEED_WORDS = /\b(?:speed|velocidad|velocidade|kph|kmh|mph)\b/;

const ORDINALS: Record<string, number> = {
  first: 1, second: 2, third: 3, fourth: 4, fifth: 5, sixth: 6, seventh: 7, eighth: 8, ninth: 9,
  primera: 1, segunda: 2, tercera: 3, cuarta: 4, quinta: 5, sexta: 6, septima: 7, octava: 8,
  primeira: 1, terceira: 3, quarta: 4,
};

const MAX_GEAR = 20;

/** Forward gears are positive, reverse gears negative ("R", "R1" -> -1). */
export function parseGear(raw: string): number | null {
  const t = normalizeHeader(raw);
  if (!t) return null;

  const reverse = /^(?:r|rev|reverse|retroceso|reversa|marcha atras|re)(?: ?(\d{1,2}))?$/.exec(t);
  if (reverse) {
    const n = reverse[1] ? Number(reverse[1]) : 1;
    return n >= 1 && n <= MAX_GEAR ? -n : null;
  }

  const forward = /^(?:f|fwd|forward|gear|marcha|avance)? ?(\d{1,2})(?:st|nd|rd|th|a|o)?(?: gear| marcha)?$/.exec(t);
  if (forward) {
    const n = Number(forward[1]);
    return n >= 1 && n <= MAX_GEAR ? n : null;
  }

  const word = t.replace(/ (?:gear|marcha)$/, "");
  return Object.hasOwn(ORDINALS, word) ? ORDINALS[word] : null;
}

export interface RimpullLayout {
  headerRows: number;
  gearCol: number;
  speedCol: number; // -1 when the table carries no speed column
  forceCol: number;
  speedUnit: string;
  forceUnit: string;
}

function findColumn(cells: string[], words: RegExp, taken: number[]): number {
  return cells.findIndex((cell, i) => !taken.includes(i) && words.test(normalizeHeader(cell)));
}

function forceUnitOf(header: string): string {
  const match = /(?:^|[^a-z])(kn|lbf|lbs?|kgf|tf|t)(?![a-z])/.exec(header.toLowerCase());
  if (!match) return "kn";
  const token = match[1];
  if (token === "lb" || token === "lbs") return "lbf";
  if (token === "t") return "tf";
  return token;
}

function speedUnitOf(header: string): string {
  return /mph|mi\/h/.test(header.toLowerCase()) ? "mph" : "km/h";
}

function countGearRows(rows: Table): number {
  return rows.filter(
    (row) => parseGear(row[0] ?? "") !== null && row.slice(1).filter((c) => parseNumber(c) !== null).length >= 2
  ).length;
}

/**
 * A rimpull table names gears and force in its first two rows (speed optional,
 * any order), or has no header and at least two gear-labelled numeric rows.
 */
export function detectRimpullLayout(rows: Table): RimpullLayout | null {
  for (let h = 0; h < Math.min(2, rows.length); h++) {
    const header = rows.slice(0, h + 1);
    // Labels may be split over two header rows, so look column by column.
    const width = Math.max(...header.map((r) => r.length));
    const columns = Array.from({ length: width }, (_, c) => header.map((r) => r[c] ?? "").join(" "));
    const gearCol = findColumn(columns, GEAR_WORDS, []);
    if (gearCol === -1) continue;
    const forceCol = findColumn(columns, FORCE_WORDS, [gearCol]);
    if (forceCol === -1) continue;
    const speedCol = findColumn(columns, SPEED_WORDS, [gearCol, forceCol]);
    return {
      headerRows: h + 1,
      gearCol,
      speedCol,
      forceCol,
      speedUnit: speedCol === -1 ? "km/h" : speedUnitOf(columns[speedCol]),
      forceUnit: forceUnitOf(columns[forceCol]),
    };
  }

  if (countGearRows(rows) >= 2 && rows.some((r) => r.length >= 3)) {
    return { headerRows: 0, gearCol: 0, speedCol: 1, forceCol: 2, speedUnit: "km/h", forceUnit: "kn" };
  }
  return null;
}

export function isRimpullTable(rows: Table): boolean {
  return detectRimpullLayout(rows) !== null;
}

export function inRange(value: number, range: ValueRange): boolean {
  const aboveMin = range.minExclusive ? value > range.min : value >= range.min;
  return aboveMin && value <= range.max;
}

export function sortPoints(points: RimpullPoint[]): RimpullPoint[] {
  return [...points].sort((a, b) => a.gear - b.gear || a.speedKph - b.speedKph || b.forceKn - a.forceKn);
}

/** Within a gear, force must not rise as speed rises. */
export function findMonotonicityViolations(points: RimpullPoint[]): string[] {
  const sorted = sortPoints(points);
  const violations: string[] = [];
  for (let i = 1; i < sorted.length; i++) {
    const a = sorted[i - 1];
    const b = sorted[i];
    if (a.gear !== b.gear || b.speedKph <= a.speedKph) continue;
    if (b.forceKn > a.forceKn) {
      violations.push(
        `gear ${b.gear}: force rises from ${a.forceKn} kN at ${a.speedKph} km/h to ${b.forceKn} kN at ${b.speedKph} km/h`
      );
    }
  }
  return violations;
}

export interface RimpullTableResult {
  curve: RimpullCurve | null;
  candidates: ExtractionCandidate[];
  droppedRows: number;
}

const MAX_RIMPULL_PARAMETER = "max_rimpull_kn";

export function extractRimpullTable(
  rows: Table,
  tableIndex: number,
  ctx: CandidateContext,
  cfg: EngineConfig
): RimpullTableResult {
  const empty: RimpullTableResult = { curve: null, candidates: [], droppedRows: 0 };
  const layout = detectRimpullLayout(rows);
  if (!layout) return empty;

  const bounds = cfg.engine.rimpull;
  const points: RimpullPoint[] = [];
  let strongest: { forceKn: number; row: number } | null = null;
  let droppedRows = 0;
  let currentGear: number | null = null;

  for (let r = layout.headerRows; r < rows.length; r++) {
    const row = rows[r];
    const gearCell = (row[layout.gearCol] ?? "").trim();
    if (gearCell !== "") currentGear = parseGear(gearCell);
    const gear = currentGear;

    const forceRaw = parseNumber(row[layout.forceCol] ?? "");
    const force = forceRaw === null ? null : convertUnit(forceRaw, layout.forceUnit, "kn", cfg);
    if (gear === null || force === null || !inRange(force, bounds.forceKn)) {
      droppedRows++;
      continue;
    }

    let speed: number | null = null;
    if (layout.speedCol !== -1) {
      const speedRaw = parseNumber(row[layout.speedCol] ?? "");
      speed = speedRaw === null ? null : convertUnit(speedRaw, layout.speedUnit, "km/h", cfg);
      if (speed === null || !inRange(speed, bounds.speedKph)) {
        droppedRows++;
        continue;
      }
    }

    const forceKn = roundTo(force, 2);
    if (!strongest || forceKn > strongest.forceKn) strongest = { forceKn, row: r };
    if (speed === null) continue;
    points.push({ gear, speedKph: roundTo(speed, 2), forceKn });
  }

  const candidates: ExtractionCandidate[] = [];
  if (strongest && cfg.parameterIndex.has(MAX_RIMPULL_PARAMETER)) {
    const raw = rows[strongest.row][layout.forceCol];
    const span = { kind: "table" as const, table: tableIndex, row: strongest.row, column: layout.forceCol };
    candidates.push(
      makeCandidate(ctx, MAX_RIMPULL_PARAMETER, ExtractionMethod.RIMPULL_TABLE, span, raw, strongest.forceKn, "kn")
    );
  }

  if (droppedRows > 0) {
    console.warn(`[rimpull] Dropped ${droppedRows} row(s) from table ${tableIndex} of ${ctx.url}`);
  }

  if (points.length < bounds.minPoints) {
    return { curve: null, candidates, droppedRows };
  }

  const sorted = sortPoints(points);
  return {
    curve: {
      brand: ctx.brand,
      model: ctx.model,
      points: sorted,
      violations: findMonotonicityViolations(sorted),
      sourceRefs: [ctx.url],
    },
    candidates,
    droppedRows,
  };
}
