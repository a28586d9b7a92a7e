import { getEngineConfig, type EngineConfig, type ParameterDef } from "../engine-config";
import { findMonotonicityViolations, inRange } from "../extraction/rimpull";
import { isPlaceholder } from "../extraction/normalize";
import {
  EquipmentClass,
  RejectionReason,
  SpecStatus,
  type EquipmentRef,
  type QaReport,
  type QaResult,
  type RimpullCheck,
  type RimpullCurve,
  type ValidatedSpec,
} from "../types";

function reject(spec: ValidatedSpec, reason: RejectionReason, bound: string): QaResult {
  return {
    accepted: false,
    spec: { ...spec, status: SpecStatus.REJECTED, rejection: { reason, bound } },
    reason,
    bound,
  };
}

/** The first QA bound a value breaks, written as the condition it failed. */
export function failedBound(param: ParameterDef, value: number): string | null {
  const qa = param.qa;
  if (!qa) return null;
  if (qa.min !== undefined) {
    if (qa.minExclusive && value <= qa.min) return `${param.name} > ${qa.min}`;
    if (!qa.minExclusive && value < qa.min) return `${param.name} >= ${qa.min}`;
  }
  if (qa.max !== undefined && value > qa.max) return `${param.name} <= ${qa.max}`;
  return null;
}

/**
 * Last line of defence before a record is stored. Flagged records pass as they
 * are; only validated values can be rejected.
 */
export function check(spec: ValidatedSpec, cfg: EngineConfig = getEngineConfig()): QaResult {
  if (spec.status === SpecStatus.REJECTED) {
    const reason = spec.rejection?.reason ?? RejectionReason.PHYSICAL_IMPLAUSIBILITY;
    return { accepted: false, spec, reason, bound: spec.rejection?.bound ?? "" };
  }
  if (spec.status === SpecStatus.FLAGGED) return { accepted: true, spec };

  const param = cfg.parameterIndex.get(spec.parameterName);
  if (!param) {
    console.warn(`[qa] Unknown parameter ${spec.parameterName} for ${spec.brand} ${spec.model}`);
    return { accepted: true, spec };
  }

  if (param.kind === "text") {
    if (param.qa?.placeholderCheck !== false && (typeof spec.value !== "string" || isPlaceholder(spec.value))) {
      return reject(spec, RejectionReason.PLACEHOLDER_VALUE, `${param.name} is not a placeholder`);
    }
    return { accepted: true, spec };
  }

  if (typeof spec.value !== "number" || !Number.isFinite(spec.value)) {
    return reject(spec, RejectionReason.PHYSICAL_IMPLAUSIBILITY, `${param.name} is a finite number`);
  }
  const bound = failedBound(param, spec.value);
  return bound ? reject(spec, RejectionReason.PHYSICAL_IMPLAUSIBILITY, bound) : { accepted: true, spec };
}

// Pairs of (lighter, heavier): the first must stay below the second.
const WEIGHT_ORDER: [string, string][] = [
  ["empty_weight_kg", "operating_weight_kg"],
  ["payload_kg", "operating_weight_kg"],
];

function numericValue(specs: ValidatedSpec[], name: string): number | null {
  const spec = specs.find((s) => s.parameterName === name);
  return spec && typeof spec.value === "number" ? spec.value : null;
}

export function checkEquipment(
  equipment: EquipmentRef,
  specs: ValidatedSpec[],
  cfg: EngineConfig = getEngineConfig()
): QaReport {
  const equipmentClass = equipment.equipmentClass ?? specs[0]?.equipmentClass ?? EquipmentClass.OTHER;
  const accepted: ValidatedSpec[] = [];
  const rejected: ValidatedSpec[] = [];

  for (const spec of specs) {
    const result = check(spec, cfg);
    if (result.accepted) {
      accepted.push(result.spec);
    } else {
      rejected.push(result.spec);
      console.warn(`[qa] Rejected ${spec.brand} ${spec.model} ${spec.parameterName}=${spec.value}: ${result.reason} (${result.bound})`);
    }
  }

  const warnings: string[] = [];
  for (const [lighter, heavier] of WEIGHT_ORDER) {
    const low = numericValue(accepted, lighter);
    const high = numericValue(accepted, heavier);
    if (low !== null && high !== null && low >= high) {
      warnings.push(`${lighter} (${low}) is not below ${heavier} (${high})`);
    }
  }

  const validatedNames = new Set(
    accepted.filter((s) => s.status === SpecStatus.VALIDATED).map((s) => s.parameterName)
  );
  const core = cfg.engine.qa.coreParameters[equipmentClass] ?? [];
  const missingCoreParameters = core.filter((name) => !validatedNames.has(name));

  return {
    brand: equipment.brand,
    model: equipment.model,
    equipmentClass,
    accepted,
    rejected,
    warnings,
    missingCoreParameters,
    counts: {
      validated: accepted.filter((s) => s.status === SpecStatus.VALIDATED).length,
      flagged: accepted.filter((s) => s.status === SpecStatus.FLAGGED).length,
      rejected: rejected.length,
      total: specs.length,
    },
  };
}

const MAX_GEAR = 20;

export function checkRimpullCurve(curve: RimpullCurve, cfg: EngineConfig = getEngineConfig()): RimpullCheck {
  const { speedKph, forceKn, minPoints } = cfg.engine.rimpull;
  const issues: string[] = [];

  for (const p of curve.points) {
    if (!Number.isInteger(p.gear) || p.gear === 0 || Math.abs(p.gear) > MAX_GEAR) {
      issues.push(`invalid gear ${p.gear}`);
    }
    if (!inRange(p.speedKph, speedKph)) {
      issues.push(`gear ${p.gear}: speed ${p.speedKph} km/h out of range`);
    }
    if (!inRange(p.forceKn, forceKn)) {
      issues.push(`gear ${p.gear}: force ${p.forceKn} kN out of range`);
    }
  }
  if (curve.points.length < minPoints) {
    issues.push(`curve has ${curve.points.length} point(s), needs at least ${minPoints}`);
  }

  return {
    valid: issues.length === 0,
    issues,
    violations: findMonotonicityViolations(curve.points),
  };
}
