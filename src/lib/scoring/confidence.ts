import { getEngineConfig, plausibleRange, type EngineConfig } from "../engine-config";
import { inRange } from "../extraction/rimpull";
import { roundTo } from "../extraction/units";
import {
  Plausibility,
  type ExtractionCandidate,
  type ScoredCandidate,
  type SourceTier,
} from "../types";
import { classifySource } from "./source-tier";

export function round3(value: number): number {
  return roundTo(value, 3);
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function assessPlausibility(candidate: ExtractionCandidate, cfg: EngineConfig): Plausibility {
  const param = cfg.parameterIndex.get(candidate.parameterName);
  if (!param || param.kind === "text" || typeof candidate.normalizedValue !== "number") {
    return Plausibility.UNBOUNDED;
  }
  if (param.kind === "numeric" && candidate.unit === null) return Plausibility.UNKNOWN_UNIT;
  const range = plausibleRange(param, candidate.equipmentClass);
  if (!range) return Plausibility.UNBOUNDED;
  return inRange(candidate.normalizedValue, range) ? Plausibility.IN_RANGE : Plausibility.OUT_OF_RANGE;
}

/**
 * Trust in one candidate from where it came from, how it was read and whether
 * the value is physically reasonable. Same inputs, same score.
 */
export function score(
  candidate: ExtractionCandidate,
  sourceTier: SourceTier,
  cfg: EngineConfig = getEngineConfig()
): ScoredCandidate {
  const { signalWeights, tierWeights, methodWeights, plausibilityFactors } = cfg.engine;
  const plausibility = assessPlausibility(candidate, cfg);
  const base =
    signalWeights.sourceTier * tierWeights[sourceTier] +
    signalWeights.extractionMethod * methodWeights[candidate.extractionMethod];
  return {
    ...candidate,
    confidence: round3(clamp01(base * plausibilityFactors[plausibility])),
    sourceTier,
    plausibility,
  };
}

export function scoreCandidates(
  candidates: ExtractionCandidate[],
  cfg: EngineConfig = getEngineConfig()
): ScoredCandidate[] {
  return candidates.map((c) => score(c, classifySource(c.sourceDocumentRef, cfg.sourceDomains), cfg));
}
