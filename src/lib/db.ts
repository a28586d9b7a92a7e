import Database from "better-sqlite3";
import { createHash } from "crypto";
import fs from "fs";
import path from "path";
import { z } from "zod";
import { config } from "./config";
import { getEngineConfig, type EngineConfig } from "./engine-config";
import { mergeRimpullCurves, reconcileAll } from "./validation/cross-validate";
import { checkEquipment, checkRimpullCurve } from "./validation/qa";
import {
  EquipmentClass,
  ExtractionMethod,
  Plausibility,
  RejectionReason,
  SourceTier,
  SpecStatus,
  type EquipmentRef,
  type EquipmentResult,
  type PipelineRunSummary,
  type RimpullCurve,
  type ScoredCandidate,
  type SpecValue,
  type ValidatedSpec,
} from "./types";

let db: Database.Database | null = null;

export function getDb(): Database.Database {
  if (db) return db;

  const dbPath = path.resolve(process.cwd(), config.dbPath);
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  db = openDb(dbPath);
  return db;
}

/** Opens a database with the schema in place. Tests pass ":memory:". */
export function openDb(file: string): Database.Database {
  const handle = new Database(file);
  handle.pragma("journal_mode = WAL");
  handle.pragma("foreign_keys = ON");
  initSchema(handle);
  return handle;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS candidates (
      id TEXT PRIMARY KEY,
      brand TEXT NOT NULL,
      model TEXT NOT NULL,
      equipment_class TEXT NOT NULL,
      parameter_name TEXT NOT NULL,
      raw_match TEXT NOT NULL,
      value_num REAL,
      value_text TEXT,
      unit TEXT,
      extraction_method TEXT NOT NULL,
      source_document_ref TEXT NOT NULL,
      matched_span_json TEXT NOT NULL,
      confidence REAL NOT NULL,
      source_tier TEXT NOT NULL,
      plausibility TEXT NOT NULL,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_candidates_equipment ON candidates(brand, model);

    CREATE TABLE IF NOT EXISTS validated_specs (
      brand TEXT NOT NULL,
      model TEXT NOT NULL,
      parameter_name TEXT NOT NULL,
      equipment_class TEXT NOT NULL,
      value_num REAL,
      value_text TEXT,
      unit TEXT,
      confidence REAL NOT NULL,
      status TEXT NOT NULL,
      supporting_json TEXT NOT NULL,
      conflicting_json TEXT NOT NULL,
      clusters_json TEXT NOT NULL,
      rejection_reason TEXT,
      rejection_bound TEXT,
      updated_at TEXT NOT NULL,
      PRIMARY KEY (brand, model, parameter_name)
    );

    CREATE TABLE IF NOT EXISTS rimpull_observations (
      id TEXT PRIMARY KEY,
      brand TEXT NOT NULL,
      model TEXT NOT NULL,
      source_ref TEXT NOT NULL,
      curve_json TEXT NOT NULL,
      observed_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_rimpull_observations_equipment ON rimpull_observations(brand, model);

    CREATE TABLE IF NOT EXISTS rimpull_curves (
      brand TEXT NOT NULL,
      model TEXT NOT NULL,
      points_json TEXT NOT NULL,
      violations_json TEXT NOT NULL,
      source_refs_json TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      PRIMARY KEY (brand, model)
    );

    CREATE TABLE IF NOT EXISTS pipeline_runs (
      id TEXT PRIMARY KEY,
      started_at TEXT NOT NULL,
      duration_ms INTEGER NOT NULL DEFAULT 0,
      document_count INTEGER NOT NULL DEFAULT 0,
      candidate_count INTEGER NOT NULL DEFAULT 0,
      equipment_count INTEGER NOT NULL DEFAULT 0,
      errors_json TEXT NOT NULL DEFAULT '[]'
    );
  `);
}

// ===== Row shapes =====

const spanSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("text"), start: z.number().int(), end: z.number().int() }),
  z.object({ kind: z.literal("table"), table: z.number().int(), row: z.number().int(), column: z.number().int() }),
]);

const clusterSchema = z.object({
  value: z.union([z.number(), z.string()]),
  confidenceMass: z.number(),
  candidateIds: z.array(z.string()),
  sourceTiers: z.array(z.nativeEnum(SourceTier)),
});

const pointSchema = z.object({
  gear: z.number().int(),
  speedKph: z.number(),
  forceKn: z.number(),
});

const curveSchema = z.object({
  brand: z.string(),
  model: z.string(),
  points: z.array(pointSchema),
  violations: z.array(z.string()),
  sourceRefs: z.array(z.string()),
});

const stringList = z.array(z.string());

interface CandidateRow {
  id: string;
  brand: string;
  model: string;
  equipment_class: string;
  parameter_name: string;
  raw_match: string;
  value_num: number | null;
  value_text: string | null;
  unit: string | null;
  extraction_method: string;
  source_document_ref: string;
  matched_span_json: string;
  confidence: number;
  source_tier: string;
  plausibility: string;
}

interface SpecRow {
  brand: string;
  model: string;
  parameter_name: string;
  equipment_class: string;
  value_num: number | null;
  value_text: string | null;
  unit: string | null;
  confidence: number;
  status: string;
  supporting_json: string;
  conflicting_json: string;
  clusters_json: string;
  rejection_reason: string | null;
  rejection_bound: string | null;
}

interface CurveRow {
  brand: string;
  model: string;
  points_json: string;
  violations_json: string;
  source_refs_json: string;
}

function splitValue(value: SpecValue): [number | null, string | null] {
  return typeof value === "number" ? [value, null] : [null, value];
}

function joinValue(num: number | null, text: string | null): SpecValue {
  return num ?? text ?? "";
}

function mapRowToCandidate(row: CandidateRow): ScoredCandidate {
  return {
    id: row.id,
    brand: row.brand,
    model: row.model,
    equipmentClass: z.nativeEnum(EquipmentClass).parse(row.equipment_class),
    parameterName: row.parameter_name,
    rawMatch: row.raw_match,
    normalizedValue: joinValue(row.value_num, row.value_text),
    unit: row.unit,
    extractionMethod: z.nativeEnum(ExtractionMethod).parse(row.extraction_method),
    sourceDocumentRef: row.source_document_ref,
    matchedSpan: spanSchema.parse(JSON.parse(row.matched_span_json)),
    confidence: row.confidence,
    sourceTier: z.nativeEnum(SourceTier).parse(row.source_tier),
    plausibility: z.nativeEnum(Plausibility).parse(row.plausibility),
  };
}

function mapRowToSpec(row: SpecRow): ValidatedSpec {
  const spec: ValidatedSpec = {
    brand: row.brand,
    model: row.model,
    equipmentClass: z.nativeEnum(EquipmentClass).parse(row.equipment_class),
    parameterName: row.parameter_name,
    value: joinValue(row.value_num, row.value_text),
    unit: row.unit,
    confidence: row.confidence,
    supportingCandidates: stringList.parse(JSON.parse(row.supporting_json)),
    conflictingCandidates: stringList.parse(JSON.parse(row.conflicting_json)),
    status: z.nativeEnum(SpecStatus).parse(row.status),
    clusters: z.array(clusterSchema).parse(JSON.parse(row.clusters_json)),
  };
  if (row.rejection_reason !== null) {
    spec.rejection = {
      reason: z.nativeEnum(RejectionReason).parse(row.rejection_reason),
      bound: row.rejection_bound ?? "",
    };
  }
  return spec;
}

function mapRowToCurve(row: CurveRow): RimpullCurve {
  return {
    brand: row.brand,
    model: row.model,
    points: z.array(pointSchema).parse(JSON.parse(row.points_json)),
    violations: stringList.parse(JSON.parse(row.violations_json)),
    sourceRefs: stringList.parse(JSON.parse(row.source_refs_json)),
  };
}

// ===== Candidates =====

export function insertCandidates(candidates: ScoredCandidate[], db: Database.Database = getDb()): void {
  if (candidates.length === 0) return;
  const stmt = db.prepare(`
    INSERT OR REPLACE INTO candidates (
      id, brand, model, equipment_class, parameter_name, raw_match,
      value_num, value_text, unit, extraction_method, source_document_ref,
      matched_span_json, confidence, source_tier, plausibility, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const now = new Date().toISOString();

  db.transaction(() => {
    for (const c of candidates) {
      const [valueNum, valueText] = splitValue(c.normalizedValue);
      stmt.run(
        c.id, c.brand, c.model, c.equipmentClass, c.parameterName, c.rawMatch,
        valueNum, valueText, c.unit, c.extractionMethod, c.sourceDocumentRef,
        JSON.stringify(c.matchedSpan), c.confidence, c.sourceTier, c.plausibility, now
      );
    }
  })();
}

export function getCandidates(brand: string, model: string, db: Database.Database = getDb()): ScoredCandidate[] {
  const rows = db
    .prepare<[string, string], CandidateRow>(
      "SELECT * FROM candidates WHERE brand = ? AND model = ? ORDER BY parameter_name, id"
    )
    .all(brand, model);
  return rows.map(mapRowToCandidate);
}

// ===== Validated specs =====

export function upsertValidatedSpec(spec: ValidatedSpec, db: Database.Database = getDb()): void {
  const [valueNum, valueText] = splitValue(spec.value);
  db.prepare(`
    INSERT INTO validated_specs (
      brand, model, parameter_name, equipment_class, value_num, value_text, unit,
      confidence, status, supporting_json, conflicting_json, clusters_json,
      rejection_reason, rejection_bound, updated_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(brand, model, parameter_name) DO UPDATE SET
      equipment_class = excluded.equipment_class,
      value_num = excluded.value_num,
      value_text = excluded.value_text,
      unit = excluded.unit,
      confidence = excluded.confidence,
      status = excluded.status,
      supporting_json = excluded.supporting_json,
      conflicting_json = excluded.conflicting_json,
      clusters_json = excluded.clusters_json,
      rejection_reason = excluded.rejection_reason,
      rejection_bound = excluded.rejection_bound,
      updated_at = excluded.updated_at
  `).run(
    spec.brand, spec.model, spec.parameterName, spec.equipmentClass,
    valueNum, valueText, spec.unit,
    spec.confidence, spec.status,
    JSON.stringify(spec.supportingCandidates),
    JSON.stringify(spec.conflictingCandidates),
    JSON.stringify(spec.clusters),
    spec.rejection?.reason ?? null,
    spec.rejection?.bound ?? null,
    new Date().toISOString()
  );
}

/** Report query: accepted records only, never rejected ones or raw candidates. */
export function getSpecs(brand?: string, model?: string, db: Database.Database = getDb()): ValidatedSpec[] {
  const where = ["status != ?"];
  const params: string[] = [SpecStatus.REJECTED];
  if (brand !== undefined) {
    where.push("brand = ?");
    params.push(brand);
  }
  if (model !== undefined) {
    where.push("model = ?");
    params.push(model);
  }
  const rows = db
    .prepare<string[], SpecRow>(
      `SELECT * FROM validated_specs WHERE ${where.join(" AND ")} ORDER BY brand, model, parameter_name`
    )
    .all(...params);
  return rows.map(mapRowToSpec);
}

/** Every stored record for one model, rejected ones included, for auditing. */
export function getAllSpecs(brand: string, model: string, db: Database.Database = getDb()): ValidatedSpec[] {
  const rows = db
    .prepare<[string, string], SpecRow>(
      "SELECT * FROM validated_specs WHERE brand = ? AND model = ? ORDER BY parameter_name"
    )
    .all(brand, model);
  return rows.map(mapRowToSpec);
}

// ===== Rimpull =====

function observationId(curve: RimpullCurve): string {
  const input = `${curve.brand}|${curve.model}|${curve.sourceRefs.join(",")}|${JSON.stringify(curve.points)}`;
  return createHash("sha256").update(input).digest("hex").slice(0, 16);
}

export function insertRimpullObservations(curves: RimpullCurve[], db: Database.Database = getDb()): void {
  if (curves.length === 0) return;
  const stmt = db.prepare(`
    INSERT OR IGNORE INTO rimpull_observations (id, brand, model, source_ref, curve_json, observed_at)
    VALUES (?, ?, ?, ?, ?, ?)
  `);
  const now = new Date().toISOString();
  db.transaction(() => {
    for (const curve of curves) {
      stmt.run(observationId(curve), curve.brand, curve.model, curve.sourceRefs.join(","), JSON.stringify(curve), now);
    }
  })();
}

export function getRimpullObservations(brand: string, model: string, db: Database.Database = getDb()): RimpullCurve[] {
  const rows = db
    .prepare<[string, string], { curve_json: string }>(
      "SELECT curve_json FROM rimpull_observations WHERE brand = ? AND model = ? ORDER BY source_ref, id"
    )
    .all(brand, model);
  return rows.map((row) => curveSchema.parse(JSON.parse(row.curve_json)));
}

export function upsertRimpullCurve(curve: RimpullCurve, db: Database.Database = getDb()): void {
  db.prepare(`
    INSERT INTO rimpull_curves (brand, model, points_json, violations_json, source_refs_json, updated_at)
    VALUES (?, ?, ?, ?, ?, ?)
    ON CONFLICT(brand, model) DO UPDATE SET
      points_json = excluded.points_json,
      violations_json = excluded.violations_json,
      source_refs_json = excluded.source_refs_json,
      updated_at = excluded.updated_at
  `).run(
    curve.brand, curve.model,
    JSON.stringify(curve.points),
    JSON.stringify(curve.violations),
    JSON.stringify(curve.sourceRefs),
    new Date().toISOString()
  );
}

export function getRimpull(brand: string, model: string, db: Database.Database = getDb()): RimpullCurve | null {
  const row = db
    .prepare<[string, string], CurveRow>("SELECT * FROM rimpull_curves WHERE brand = ? AND model = ?")
    .get(brand, model);
  return row ? mapRowToCurve(row) : null;
}

// ===== Reconcile =====

/**
 * Stores new observations for one model and re-derives every record for it
 * from the full stored set, inside one IMMEDIATE transaction so concurrent
 * writers for the same model serialize.
 */
export function reconcileEquipment(
  equipment: EquipmentRef,
  newCandidates: ScoredCandidate[],
  newCurves: RimpullCurve[],
  cfg: EngineConfig = getEngineConfig(),
  db: Database.Database = getDb()
): EquipmentResult {
  const { brand, model } = equipment;

  const run = db.transaction((): EquipmentResult => {
    insertCandidates(newCandidates, db);
    insertRimpullObservations(newCurves, db);

    const specs = reconcileAll(getCandidates(brand, model, db), cfg);
    const report = checkEquipment(equipment, specs, cfg);
    db.prepare("DELETE FROM validated_specs WHERE brand = ? AND model = ?").run(brand, model);
    for (const spec of [...report.accepted, ...report.rejected]) {
      upsertValidatedSpec(spec, db);
    }

    let rimpull = mergeRimpullCurves(getRimpullObservations(brand, model, db), cfg);
    if (rimpull) {
      const curveCheck = checkRimpullCurve(rimpull, cfg);
      const known = new Set(rimpull.violations);
      const extra = [...curveCheck.issues, ...curveCheck.violations].filter((v) => !known.has(v));
      if (!curveCheck.valid) {
        console.warn(`[db] Rimpull curve for ${brand} ${model}: ${curveCheck.issues.join("; ")}`);
      }
      rimpull = { ...rimpull, violations: [...rimpull.violations, ...extra] };
      upsertRimpullCurve(rimpull, db);
    }

    return { report, rimpull };
  });

  return run.immediate();
}

// ===== Pipeline runs =====

export function insertPipelineRun(summary: PipelineRunSummary, db: Database.Database = getDb()): void {
  db.prepare(`
    INSERT OR REPLACE INTO pipeline_runs (
      id, started_at, duration_ms, document_count, candidate_count, equipment_count, errors_json
    ) VALUES (?, ?, ?, ?, ?, ?, ?)
  `).run(
    summary.runId,
    summary.startedAt,
    summary.durationMs,
    summary.documents,
    summary.candidates,
    summary.results.length,
    JSON.stringify(summary.errors)
  );
}

export interface PipelineRunRecord {
  id: string;
  startedAt: string;
  durationMs: number;
  documentCount: number;
  candidateCount: number;
  equipmentCount: number;
  errorCount: number;
}

interface RunRow {
  id: string;
  started_at: string;
  duration_ms: number;
  document_count: number;
  candidate_count: number;
  equipment_count: number;
  errors_json: string;
}

export function getLatestRun(db: Database.Database = getDb()): PipelineRunRecord | null {
  const row = db.prepare<[], RunRow>("SELECT * FROM pipeline_runs ORDER BY started_at DESC LIMIT 1").get();
  if (!row) return null;
  return {
    id: row.id,
    startedAt: row.started_at,
    durationMs: row.duration_ms,
    documentCount: row.document_count,
    candidateCount: row.candidate_count,
    equipmentCount: row.equipment_count,
    errorCount: z.array(z.unknown()).parse(JSON.parse(row.errors_json)).length,
  };
}
