import { getEngineConfig, type EngineConfig, type ParameterDef } from "../engine-config";
import { findMonotonicityViolations, sortPoints } from "../extraction/rimpull";
import { normalizeTextKey } from "../extraction/normalize";
import { roundTo } from "../extraction/units";
import { round3 } from "../scoring/confidence";
import {
  SpecStatus,
  type ClusterSummary,
  type RimpullCurve,
  type RimpullPoint,
  type ScoredCandidate,
  type SourceTier,
  type SpecValue,
  type ValidatedSpec,
} from "../types";

const MASS_EPSILON = 1e-9;

export interface Cluster {
  members: ScoredCandidate[];
  mass: number;
  tiers: SourceTier[];
  maxConfidence: number;
  value: SpecValue;
  sortKey: number | string;
}

function compareValues(a: SpecValue, b: SpecValue): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

function sortCandidates(candidates: ScoredCandidate[]): ScoredCandidate[] {
  return [...candidates].sort(
    (a, b) => compareValues(a.normalizedValue, b.normalizedValue) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}

function numeric(c: ScoredCandidate): number {
  return typeof c.normalizedValue === "number" ? c.normalizedValue : Number.NaN;
}

/** Confidence-weighted mean; falls back to the plain mean when every confidence is zero. */
export function weightedMean(values: number[], weights: number[]): number {
  const total = weights.reduce((s, w) => s + w, 0);
  if (total <= 0) return values.reduce((s, v) => s + v, 0) / values.length;
  return values.reduce((s, v, i) => s + v * weights[i], 0) / total;
}

function fitsCluster(members: ScoredCandidate[], next: ScoredCandidate, tolerancePct: number): boolean {
  const all = [...members, next];
  const values = all.map(numeric);
  const center = weightedMean(values, all.map((c) => c.confidence));
  const allowed = (tolerancePct / 100) * Math.abs(center) + MASS_EPSILON;
  return values.every((v) => Math.abs(v - center) <= allowed);
}

function groupNumeric(sorted: ScoredCandidate[], param: ParameterDef): ScoredCandidate[][] {
  const groups: ScoredCandidate[][] = [];
  let current: ScoredCandidate[] = [];
  for (const candidate of sorted) {
    const joins =
      current.length > 0 &&
      (param.kind === "count"
        ? numeric(current[0]) === numeric(candidate)
        : fitsCluster(current, candidate, param.tolerancePct));
    if (joins) {
      current.push(candidate);
    } else {
      if (current.length > 0) groups.push(current);
      current = [candidate];
    }
  }
  if (current.length > 0) groups.push(current);
  return groups;
}

function groupText(sorted: ScoredCandidate[]): ScoredCandidate[][] {
  const byKey = new Map<string, ScoredCandidate[]>();
  for (const candidate of sorted) {
    const key = normalizeTextKey(String(candidate.normalizedValue));
    const group = byKey.get(key);
    if (group) group.push(candidate);
    else byKey.set(key, [candidate]);
  }
  return [...byKey.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)).map(([, group]) => group);
}

/** Spelling with the most confidence behind it; ties go to the first in sort order. */
function dominantSpelling(members: ScoredCandidate[]): string {
  const mass = new Map<string, number>();
  for (const m of members) {
    const spelling = String(m.normalizedValue);
    mass.set(spelling, (mass.get(spelling) ?? 0) + m.confidence);
  }
  let best = "";
  let bestMass = -1;
  for (const [spelling, total] of [...mass.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (total > bestMass + MASS_EPSILON) {
      best = spelling;
      bestMass = total;
    }
  }
  return best;
}

function buildCluster(members: ScoredCandidate[], param: ParameterDef): Cluster {
  const mass = members.reduce((s, m) => s + m.confidence, 0);
  const tiers = [...new Set(members.map((m) => m.sourceTier))].sort();
  const maxConfidence = Math.max(...members.map((m) => m.confidence));

  if (param.kind === "text") {
    const value = dominantSpelling(members);
    return { members, mass, tiers, maxConfidence, value, sortKey: normalizeTextKey(value) };
  }
  const mean = weightedMean(members.map(numeric), members.map((m) => m.confidence));
  const value = roundTo(mean, param.decimals);
  return { members, mass, tiers, maxConfidence, value, sortKey: mean };
}

/**
 * Ranking: confidence mass, then distinct source tiers (independent
 * corroboration beats one site repeating itself), then candidate count, then
 * the single strongest candidate, then the lower value.
 */
export function compareClusters(a: Cluster, b: Cluster): number {
  if (Math.abs(a.mass - b.mass) > MASS_EPSILON) return b.mass - a.mass;
  if (a.tiers.length !== b.tiers.length) return b.tiers.length - a.tiers.length;
  if (a.members.length !== b.members.length) return b.members.length - a.members.length;
  if (Math.abs(a.maxConfidence - b.maxConfidence) > MASS_EPSILON) return b.maxConfidence - a.maxConfidence;
  return compareValues(a.sortKey, b.sortKey);
}

export function clusterCandidates(candidates: ScoredCandidate[], param: ParameterDef): Cluster[] {
  const sorted = sortCandidates(candidates);
  const groups = param.kind === "text" ? groupText(sorted) : groupNumeric(sorted, param);
  return groups.map((g) => buildCluster(g, param)).sort(compareClusters);
}

function ids(members: ScoredCandidate[]): string[] {
  return members.map((m) => m.id).sort();
}

function summarize(cluster: Cluster): ClusterSummary {
  return {
    value: cluster.value,
    confidenceMass: round3(cluster.mass),
    candidateIds: ids(cluster.members),
    sourceTiers: cluster.tiers,
  };
}

function acceptsValue(param: ParameterDef, value: SpecValue): boolean {
  return param.kind === "text" ? typeof value === "string" : typeof value === "number" && Number.isFinite(value);
}

/**
 * Derives the record for one (brand, model, parameter) from scratch. Returns
 * null for an empty group or a parameter the catalog no longer knows.
 */
export function reconcile(
  candidates: ScoredCandidate[],
  cfg: EngineConfig = getEngineConfig()
): ValidatedSpec | null {
  if (candidates.length === 0) return null;
  const first = candidates[0];
  const param = cfg.parameterIndex.get(first.parameterName);
  if (!param) {
    console.warn(`[cross-validate] Unknown parameter ${first.parameterName}, skipping`);
    return null;
  }

  const usable = candidates.filter(
    (c) =>
      c.brand === first.brand &&
      c.model === first.model &&
      c.parameterName === first.parameterName &&
      acceptsValue(param, c.normalizedValue)
  );
  if (usable.length === 0) return null;

  const { acceptance, disagreementRatio, visibility } = cfg.engine.thresholds;
  const clusters = clusterCandidates(usable, param);
  const [winner, ...losers] = clusters;
  const totalMass = clusters.reduce((s, c) => s + c.mass, 0);

  const validated =
    winner.mass > acceptance &&
    winner.members.some((m) => m.confidence > acceptance) &&
    losers.every((l) => l.mass <= disagreementRatio * winner.mass) &&
    losers.every((l) => l.members.every((m) => m.confidence <= acceptance));

  const visibleLosers = losers.filter((l) => l.mass >= visibility);
  const winnerConfidences = winner.members.map((m) => m.confidence);
  const meanConfidence = weightedMean(winnerConfidences, winnerConfidences);
  const corroborated = Math.min(1, meanConfidence + cfg.engine.corroborationBonus * (winner.tiers.length - 1));
  const confidence = totalMass > 0 ? round3((corroborated * winner.mass) / totalMass) : 0;

  return {
    brand: first.brand,
    model: first.model,
    equipmentClass: first.equipmentClass,
    parameterName: first.parameterName,
    value: winner.value,
    unit: param.kind === "numeric" ? param.canonicalUnit ?? null : null,
    confidence,
    supportingCandidates: ids(winner.members),
    conflictingCandidates: visibleLosers.flatMap((l) => l.members.map((m) => m.id)).sort(),
    status: validated ? SpecStatus.VALIDATED : SpecStatus.FLAGGED,
    clusters: [winner, ...visibleLosers].map(summarize),
  };
}

function keyOf(c: ScoredCandidate): string {
  return `${c.brand}\u0000${c.model}\u0000${c.parameterName}`;
}

/** One record per (brand, model, parameter), in key order. */
export function reconcileAll(
  candidates: ScoredCandidate[],
  cfg: EngineConfig = getEngineConfig()
): ValidatedSpec[] {
  const groups = new Map<string, ScoredCandidate[]>();
  for (const c of candidates) {
    const key = keyOf(c);
    const group = groups.get(key);
    if (group) group.push(c);
    else groups.set(key, [c]);
  }
  const specs: ValidatedSpec[] = [];
  for (const key of [...groups.keys()].sort()) {
    const spec = reconcile(groups.get(key) ?? [], cfg);
    if (spec) specs.push(spec);
  }
  return specs;
}

// ===== Rimpull =====

interface SourcedPoint extends RimpullPoint {
  source: string;
}

function clusterForces(points: SourcedPoint[], tolerancePct: number): SourcedPoint[][] {
  const sorted = [...points].sort((a, b) => a.forceKn - b.forceKn || (a.source < b.source ? -1 : 1));
  const groups: SourcedPoint[][] = [];
  let current: SourcedPoint[] = [];
  for (const p of sorted) {
    const all = [...current, p];
    const mean = all.reduce((s, q) => s + q.forceKn, 0) / all.length;
    const fits = current.length > 0 && all.every((q) => Math.abs(q.forceKn - mean) <= (tolerancePct / 100) * mean);
    if (fits) {
      current.push(p);
    } else {
      if (current.length > 0) groups.push(current);
      current = [p];
    }
  }
  if (current.length > 0) groups.push(current);
  return groups;
}

function distinctSources(points: SourcedPoint[]): number {
  return new Set(points.map((p) => p.source)).size;
}

/**
 * Merges curves for one model from several documents. Points meet on
 * (gear, speed rounded to 0.1 km/h); forces within tolerance agree and the
 * biggest agreeing group wins. Disagreement is recorded, never dropped.
 */
export function mergeRimpullCurves(
  curves: RimpullCurve[],
  cfg: EngineConfig = getEngineConfig()
): RimpullCurve | null {
  if (curves.length === 0) return null;
  const { brand, model } = curves[0];
  const tolerancePct = cfg.engine.rimpull.mergeTolerancePct;

  const buckets = new Map<string, SourcedPoint[]>();
  for (const curve of curves) {
    const source = [...curve.sourceRefs].sort().join(",");
    for (const point of curve.points) {
      const speedKph = roundTo(point.speedKph, 1);
      const key = `${point.gear}|${speedKph}`;
      const bucket = buckets.get(key);
      const entry = { gear: point.gear, speedKph, forceKn: point.forceKn, source };
      if (bucket) bucket.push(entry);
      else buckets.set(key, [entry]);
    }
  }

  const points: RimpullPoint[] = [];
  const disagreements: string[] = [];
  for (const bucket of buckets.values()) {
    const groups = clusterForces(bucket, tolerancePct).sort(
      (a, b) =>
        b.length - a.length ||
        distinctSources(b) - distinctSources(a) ||
        a[0].forceKn - b[0].forceKn
    );
    const best = groups[0];
    const forceKn = roundTo(best.reduce((s, p) => s + p.forceKn, 0) / best.length, 2);
    const { gear, speedKph } = best[0];
    points.push({ gear, speedKph, forceKn });
    if (groups.length > 1) {
      const forces = bucket.map((p) => p.forceKn).sort((a, b) => a - b).join(", ");
      disagreements.push(`gear ${gear} at ${speedKph} km/h: sources disagree on force (${forces} kN)`);
    }
  }

  if (points.length < cfg.engine.rimpull.minPoints) return null;
  const sorted = sortPoints(points);
  return {
    brand,
    model,
    points: sorted,
    violations: [...disagreements.sort(), ...findMonotonicityViolations(sorted)],
    sourceRefs: [...new Set(curves.flatMap((c) => c.sourceRefs))].sort(),
  };
}
