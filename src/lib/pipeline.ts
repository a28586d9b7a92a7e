import { randomUUID } from "crypto";
import type Database from "better-sqlite3";
import { config } from "./config";
import { getDb, insertPipelineRun, reconcileEquipment } from "./db";
import { getEngineConfig, type EngineConfig } from "./engine-config";
import { UrlDeniedError } from "./errors";
import { extractDocument } from "./extraction/extract";
import { scoreCandidates } from "./scoring/confidence";
import type { DocumentFetcher } from "./scraping/fetcher";
import type {
  EquipmentRef,
  EquipmentResult,
  KeyedDocument,
  PipelineError,
  PipelineRunSummary,
  RawDocument,
  RimpullCurve,
  ScoredCandidate,
  WorkItem,
} from "./types";

export interface PipelineOptions {
  db?: Database.Database;
  engineConfig?: EngineConfig;
  /** Per-brand cancellation. An aborted brand stops fetching and is not reconciled. */
  brandSignals?: Map<string, AbortSignal>;
  maxConcurrentModels?: number;
  /** Record the run in pipeline_runs (default true). */
  recordRun?: boolean;
}

export interface SpecPipelineOptions extends PipelineOptions {
  fetcher: DocumentFetcher;
}

interface RunContext {
  db: Database.Database;
  cfg: EngineConfig;
  brandSignals: Map<string, AbortSignal>;
  errors: PipelineError[];
  documents: number;
  candidates: number;
}

function equipmentKey(ref: EquipmentRef): string {
  return `${ref.brand}\u0000${ref.model}`;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function recordError(ctx: RunContext, ref: EquipmentRef, err: unknown, url?: string): void {
  const entry: PipelineError = {
    brand: ref.brand,
    model: ref.model,
    error: errorMessage(err),
    timestamp: new Date().toISOString(),
  };
  if (url) entry.url = url;
  if (err instanceof UrlDeniedError) entry.reason = err.reason;
  ctx.errors.push(entry);
}

/** Merges work items naming the same (brand, model); URLs keep first-seen order. */
export function mergeWorkItems(items: WorkItem[]): WorkItem[] {
  const merged = new Map<string, WorkItem>();
  for (const item of items) {
    const key = equipmentKey(item);
    const existing = merged.get(key);
    if (!existing) {
      merged.set(key, { ...item, urls: [...new Set(item.urls)] });
      continue;
    }
    existing.urls = [...new Set([...existing.urls, ...item.urls])];
    existing.equipmentClass = existing.equipmentClass ?? item.equipmentClass;
  }
  return [...merged.values()];
}

function extractAndScore(
  document: RawDocument,
  equipment: EquipmentRef,
  ctx: RunContext
): { candidates: ScoredCandidate[]; curves: RimpullCurve[] } {
  const { candidates, rimpullCurves } = extractDocument(document, equipment, ctx.cfg);
  ctx.documents++;
  ctx.candidates += candidates.length;
  return { candidates: scoreCandidates(candidates, ctx.cfg), curves: rimpullCurves };
}

function reconcile(
  equipment: EquipmentRef,
  candidates: ScoredCandidate[],
  curves: RimpullCurve[],
  ctx: RunContext
): EquipmentResult | null {
  if (ctx.brandSignals.get(equipment.brand)?.aborted) {
    console.log(`[pipeline] ${equipment.brand} cancelled, not reconciling ${equipment.model}`);
    return null;
  }
  const result = reconcileEquipment(equipment, candidates, curves, ctx.cfg, ctx.db);
  const { counts, missingCoreParameters } = result.report;
  console.log(
    `[pipeline] ${equipment.brand} ${equipment.model}: ${counts.validated} validated, ${counts.flagged} flagged, ${counts.rejected} rejected` +
      (missingCoreParameters.length > 0 ? ` (missing ${missingCoreParameters.join(", ")})` : "")
  );
  return result;
}

async function processWorkItem(
  item: WorkItem,
  fetcher: DocumentFetcher,
  ctx: RunContext
): Promise<EquipmentResult | null> {
  const signal = ctx.brandSignals.get(item.brand);
  if (signal?.aborted) {
    console.log(`[pipeline] ${item.brand} cancelled, skipping ${item.model}`);
    return null;
  }

  const fetched = await Promise.allSettled(item.urls.map((url) => fetcher.fetchDocument(url, signal)));

  const candidates: ScoredCandidate[] = [];
  const curves: RimpullCurve[] = [];
  fetched.forEach((result, i) => {
    const url = item.urls[i];
    if (result.status === "rejected") {
      if (signal?.aborted) return;
      recordError(ctx, item, result.reason, url);
      console.warn(`[pipeline] ${item.brand} ${item.model}: ${url} failed: ${errorMessage(result.reason)}`);
      return;
    }
    if (!result.value) return;
    const extracted = extractAndScore(result.value, item, ctx);
    candidates.push(...extracted.candidates);
    curves.push(...extracted.curves);
  });

  // Every document for this model is in; reconcile it now.
  return reconcile(item, candidates, curves, ctx);
}

function createContext(options: PipelineOptions): RunContext {
  return {
    db: options.db ?? getDb(),
    cfg: options.engineConfig ?? getEngineConfig(),
    brandSignals: options.brandSignals ?? new Map(),
    errors: [],
    documents: 0,
    candidates: 0,
  };
}

function finishRun(
  ctx: RunContext,
  runId: string,
  startTime: number,
  results: EquipmentResult[],
  options: PipelineOptions
): PipelineRunSummary {
  const summary: PipelineRunSummary = {
    runId,
    startedAt: new Date(startTime).toISOString(),
    durationMs: Date.now() - startTime,
    documents: ctx.documents,
    candidates: ctx.candidates,
    results: [...results].sort(
      (a, b) => a.report.brand.localeCompare(b.report.brand) || a.report.model.localeCompare(b.report.model)
    ),
    errors: ctx.errors,
  };
  if (options.recordRun !== false) insertPipelineRun(summary, ctx.db);
  console.log(
    `[pipeline] Run ${runId}: ${summary.results.length} models, ${summary.documents} documents, ${summary.candidates} candidates, ${summary.errors.length} errors in ${summary.durationMs}ms`
  );
  return summary;
}

/**
 * Fetch -> extract -> score -> reconcile -> QA -> persist for a list of work
 * items. Up to `maxConcurrentModels` workers each take the next model as soon
 * as their current one finishes; one model failing never stops the others.
 */
export async function runSpecPipeline(items: WorkItem[], options: SpecPipelineOptions): Promise<PipelineRunSummary> {
  const startTime = Date.now();
  const runId = randomUUID();
  const ctx = createContext(options);
  const poolSize = Math.max(1, options.maxConcurrentModels ?? config.maxConcurrentModels);
  const work = mergeWorkItems(items);
  const results: EquipmentResult[] = [];

  console.log(`[pipeline] Run ${runId}: ${work.length} models, ${work.reduce((s, w) => s + w.urls.length, 0)} URLs`);

  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < work.length) {
      const item = work[next++];
      try {
        const result = await processWorkItem(item, options.fetcher, ctx);
        if (result) results.push(result);
      } catch (err) {
        recordError(ctx, item, err);
        console.error(`[pipeline] ${item.brand} ${item.model} failed:`, err);
      }
    }
  };
  await Promise.all(Array.from({ length: Math.min(poolSize, work.length) }, () => worker()));

  return finishRun(ctx, runId, startTime, results, options);
}

/** Same as runSpecPipeline for documents that are already fetched. */
export async function processDocuments(docs: KeyedDocument[], options: PipelineOptions = {}): Promise<PipelineRunSummary> {
  const startTime = Date.now();
  const runId = randomUUID();
  const ctx = createContext(options);

  const groups = new Map<string, { equipment: EquipmentRef; documents: RawDocument[] }>();
  for (const { document, ...equipment } of docs) {
    const key = equipmentKey(equipment);
    const group = groups.get(key);
    if (!group) {
      groups.set(key, { equipment, documents: [document] });
    } else {
      group.documents.push(document);
      group.equipment.equipmentClass = group.equipment.equipmentClass ?? equipment.equipmentClass;
    }
  }

  const results: EquipmentResult[] = [];
  for (const key of [...groups.keys()].sort()) {
    const group = groups.get(key);
    if (!group) continue;
    const { equipment, documents } = group;
    if (ctx.brandSignals.get(equipment.brand)?.aborted) {
      console.log(`[pipeline] ${equipment.brand} cancelled, skipping ${equipment.model}`);
      continue;
    }
    try {
      const candidates: ScoredCandidate[] = [];
      const curves: RimpullCurve[] = [];
      for (const document of documents) {
        const extracted = extractAndScore(document, equipment, ctx);
        candidates.push(...extracted.candidates);
        curves.push(...extracted.curves);
      }
      const result = reconcile(equipment, candidates, curves, ctx);
      if (result) results.push(result);
    } catch (err) {
      recordError(ctx, equipment, err);
      console.error(`[pipeline] ${equipment.brand} ${equipment.model} failed:`, err);
    }
  }

  return finishRun(ctx, runId, startTime, results, options);
}
