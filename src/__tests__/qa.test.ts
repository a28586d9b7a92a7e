import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { loadEngineConfig } from "../lib/engine-config";
import { check, checkEquipment, checkRimpullCurve, failedBound } from "../lib/validation/qa";
import {
  EquipmentClass,
  RejectionReason,
  SpecStatus,
  type RimpullCurve,
  type SpecValue,
  type ValidatedSpec,
} from "../lib/types";

const cfg = loadEngineConfig("config");

function spec(parameterName: string, value: SpecValue, status = SpecStatus.VALIDATED): ValidatedSpec {
  return {
    brand: "Komatsu",
    model: "930E",
    equipmentClass: EquipmentClass.HAUL_TRUCK,
    parameterName,
    value,
    unit: null,
    confidence: 0.9,
    supportingCandidates: ["a"],
    conflictingCandidates: [],
    status,
    clusters: [],
  };
}

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("failedBound", () => {
  it("writes the bound as the condition that failed", () => {
    const weight = cfg.parameterIndex.get("operating_weight_kg");
    const cylinders = cfg.parameterIndex.get("cylinders");
    if (!weight || !cylinders) throw new Error("missing parameter");
    expect(failedBound(weight, 1000)).toBe("operating_weight_kg > 1000");
    expect(failedBound(weight, 3000001)).toBe("operating_weight_kg <= 3000000");
    expect(failedBound(weight, 180000)).toBeNull();
    expect(failedBound(cylinders, 1)).toBeNull();
    expect(failedBound(cylinders, 0)).toBe("cylinders >= 1");
  });
});

describe("check", () => {
  it("accepts values inside their bounds", () => {
    expect(check(spec("operating_weight_kg", 180000), cfg)).toEqual({
      accepted: true,
      spec: spec("operating_weight_kg", 180000),
    });
  });

  it("rejects physically impossible values with the bound they broke", () => {
    const result = check(spec("operating_weight_kg", 500), cfg);
    expect(result).toEqual({
      accepted: false,
      spec: {
        ...spec("operating_weight_kg", 500),
        status: SpecStatus.REJECTED,
        rejection: { reason: RejectionReason.PHYSICAL_IMPLAUSIBILITY, bound: "operating_weight_kg > 1000" },
      },
      reason: RejectionReason.PHYSICAL_IMPLAUSIBILITY,
      bound: "operating_weight_kg > 1000",
    });
  });

  it("rejects negative engine power however confident the record is", () => {
    const power = { ...spec("engine_power_kw", -50), confidence: 1 };
    expect(check(power, cfg)).toEqual({
      accepted: false,
      spec: {
        ...power,
        status: SpecStatus.REJECTED,
        rejection: { reason: RejectionReason.PHYSICAL_IMPLAUSIBILITY, bound: "engine_power_kw > 0" },
      },
      reason: RejectionReason.PHYSICAL_IMPLAUSIBILITY,
      bound: "engine_power_kw > 0",
    });
  });

  it("rejects placeholder text", () => {
    const result = check(spec("engine_model", "TBD"), cfg);
    expect(result.accepted).toBe(false);
    if (!result.accepted) {
      expect(result.reason).toBe(RejectionReason.PLACEHOLDER_VALUE);
      expect(result.bound).toBe("engine_model is not a placeholder");
    }
  });

  it("rejects non-finite numbers", () => {
    const result = check(spec("payload_kg", Number.NaN), cfg);
    expect(result.accepted).toBe(false);
    if (!result.accepted) expect(result.bound).toBe("payload_kg is a finite number");
  });

  it("passes flagged records through untouched", () => {
    const flagged = spec("operating_weight_kg", 5, SpecStatus.FLAGGED);
    expect(check(flagged, cfg)).toEqual({ accepted: true, spec: flagged });
  });
});

describe("checkEquipment", () => {
  it("splits accepted from rejected and reports gaps", () => {
    const report = checkEquipment(
      { brand: "Komatsu", model: "930E", equipmentClass: EquipmentClass.HAUL_TRUCK },
      [spec("operating_weight_kg", 180000), spec("payload_kg", 200000), spec("engine_power_kw", 20000)],
      cfg
    );

    expect(report.equipmentClass).toBe(EquipmentClass.HAUL_TRUCK);
    expect(report.accepted.map((s) => s.parameterName)).toEqual(["operating_weight_kg", "payload_kg"]);
    expect(report.rejected.map((s) => [s.parameterName, s.rejection?.bound])).toEqual([
      ["engine_power_kw", "engine_power_kw <= 10000"],
    ]);
    expect(report.warnings).toEqual(["payload_kg (200000) is not below operating_weight_kg (180000)"]);
    expect(report.missingCoreParameters).toEqual(["engine_power_kw"]);
    expect(report.counts).toEqual({ validated: 2, flagged: 0, rejected: 1, total: 3 });
  });

  it("does not count flagged records towards completeness", () => {
    const report = checkEquipment(
      { brand: "Komatsu", model: "930E" },
      [spec("operating_weight_kg", 180000, SpecStatus.FLAGGED)],
      cfg
    );
    expect(report.equipmentClass).toBe(EquipmentClass.HAUL_TRUCK);
    expect(report.missingCoreParameters).toEqual(["operating_weight_kg", "engine_power_kw", "payload_kg"]);
    expect(report.counts).toEqual({ validated: 0, flagged: 1, rejected: 0, total: 1 });
  });
});

describe("checkRimpullCurve", () => {
  function curve(points: [number, number, number][]): RimpullCurve {
    return {
      brand: "Komatsu",
      model: "930E",
      points: points.map(([gear, speedKph, forceKn]) => ({ gear, speedKph, forceKn })),
      violations: [],
      sourceRefs: ["https://www.komatsu.com/930e"],
    };
  }

  it("accepts a sane curve", () => {
    expect(checkRimpullCurve(curve([[1, 5, 850], [1, 10, 600]]), cfg)).toEqual({
      valid: true,
      issues: [],
      violations: [],
    });
  });

  it("lists every broken bound", () => {
    const result = checkRimpullCurve(curve([[0, 5, 100], [1, 90, 100], [2, 10, 0]]), cfg);
    expect(result.valid).toBe(false);
    expect(result.issues).toEqual([
      "invalid gear 0",
      "gear 1: speed 90 km/h out of range",
      "gear 2: force 0 kN out of range",
    ]);
  });

  it("requires a minimum number of points", () => {
    expect(checkRimpullCurve(curve([[1, 5, 850]]), cfg).issues).toEqual([
      "curve has 1 point(s), needs at least 2",
    ]);
  });

  it("recomputes monotonicity violations", () => {
    expect(checkRimpullCurve(curve([[1, 5, 600], [1, 10, 700]]), cfg).violations).toEqual([
      "gear 1: force rises from 600 kN at 5 km/h to 700 kN at 10 km/h",
    ]);
  });
});
