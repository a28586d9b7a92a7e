import fs from "fs";
import path from "path";
import { z } from "zod";
import { config } from "./config";
import { ConfigError } from "./errors";
import { EquipmentClass, ExtractionMethod, Plausibility, SourceTier } from "./types";
import { hasUnboundedQuantifier, normalizeHeader } from "./extraction/normalize";

// ===== Schemas =====

const rate = z.number().min(0).max(1);

const rangeSchema = z
  .object({
    min: z.number(),
    max: z.number(),
    minExclusive: z.boolean().optional(),
  })
  .refine((r) => r.min < r.max, { message: "min must be below max" });

const engineSchema = z.object({
  thresholds: z.object({
    acceptance: rate,
    disagreementRatio: rate,
    visibility: rate,
  }),
  signalWeights: z.object({
    sourceTier: rate,
    extractionMethod: rate,
  }),
  tierWeights: z.object({
    [SourceTier.OEM_PRIMARY]: rate,
    [SourceTier.OEM_SECONDARY]: rate,
    [SourceTier.DEALER]: rate,
    [SourceTier.THIRD_PARTY]: rate,
    [SourceTier.UNKNOWN]: rate,
  }),
  methodWeights: z.object({
    [ExtractionMethod.TABLE_CELL]: rate,
    [ExtractionMethod.RIMPULL_TABLE]: rate,
    [ExtractionMethod.REGEX]: rate,
  }),
  plausibilityFactors: z.object({
    [Plausibility.IN_RANGE]: rate,
    [Plausibility.UNBOUNDED]: rate,
    [Plausibility.UNKNOWN_UNIT]: rate,
    [Plausibility.OUT_OF_RANGE]: rate,
  }),
  corroborationBonus: z.number().min(0).max(0.5),
  extraction: z.object({
    maxTextLength: z.number().int().positive().max(1_000_000),
    maxCellLength: z.number().int().positive().max(10_000),
    maxTables: z.number().int().positive().max(10_000),
    maxRowsPerTable: z.number().int().positive().max(100_000),
  }),
  rimpull: z.object({
    speedKph: rangeSchema,
    forceKn: rangeSchema,
    mergeTolerancePct: z.number().min(0).max(50),
    minPoints: z.number().int().min(2),
  }),
  qa: z.object({
    coreParameters: z.record(z.nativeEnum(EquipmentClass), z.array(z.string())),
  }),
  fetch: z.object({
    timeoutMs: z.number().int().positive(),
    retries: z.number().int().min(0).max(10),
    retryDelayMs: z.number().int().min(0),
    maxRedirects: z.number().int().min(0).max(20),
    robotsTtlMs: z.number().int().positive(),
  }),
});

const unitsSchema = z.object({
  dimensions: z.record(z.string(), z.string()),
  units: z.record(
    z.string(),
    z.object({
      dimension: z.string(),
      factor: z.number().positive(),
      symbol: z.string().optional(),
    })
  ),
});

const parameterSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]{1,63}$/),
  kind: z.enum(["numeric", "count", "text"]),
  canonicalUnit: z.string().optional(),
  decimals: z.number().int().min(0).max(6),
  tolerancePct: z.number().min(0).max(50),
  aliases: z.array(z.string().min(2).max(80)).min(1),
  unitAliases: z.record(z.string(), z.string()).optional(),
  patterns: z.array(z.string().max(400)).optional(),
  valuePattern: z.string().max(600).optional(),
  plausible: z
    .object({
      default: rangeSchema,
      byClass: z.record(z.nativeEnum(EquipmentClass), rangeSchema).optional(),
    })
    .optional(),
  qa: z
    .object({
      min: z.number().optional(),
      max: z.number().optional(),
      minExclusive: z.boolean().optional(),
      placeholderCheck: z.boolean().optional(),
    })
    .optional(),
});

const parametersFileSchema = z.object({
  parameters: z.array(parameterSchema).min(1),
});

const domainSchema = z.string().regex(/^[a-z0-9][a-z0-9.-]{1,252}$/);

const sourceDomainsSchema = z.object({
  oem: z.array(domainSchema),
  specDatabases: z.array(domainSchema),
  industry: z.array(domainSchema),
  dealers: z.array(domainSchema),
  dealerPatterns: z.array(z.string().min(1).max(100)),
  brochureExtensions: z.array(z.string().regex(/^\.[a-z0-9]{1,8}$/)),
});

// ===== Types =====

export type EngineSettings = z.infer<typeof engineSchema>;
export type ParameterDef = z.infer<typeof parameterSchema>;
export type ParameterKind = ParameterDef["kind"];
export type ValueRange = z.infer<typeof rangeSchema>;
export type SourceDomains = z.infer<typeof sourceDomainsSchema>;

export interface UnitDef {
  dimension: string;
  factor: number;
  symbol?: string;
}

export interface EngineConfig {
  engine: EngineSettings;
  units: Map<string, UnitDef>;
  dimensions: Map<string, string>;
  parameters: ParameterDef[];
  parameterIndex: Map<string, ParameterDef>;
  sourceDomains: SourceDomains;
}

export interface EngineConfigFiles {
  engine: unknown;
  units: unknown;
  parameters: unknown;
  sourceDomains: unknown;
}

const FILE_NAMES = {
  engine: "engine.json",
  units: "units.json",
  parameters: "parameters.json",
  sourceDomains: "source-domains.json",
} as const;

// ===== Loading =====

function parseFile<T extends z.ZodTypeAny>(
  file: string,
  schema: T,
  raw: unknown,
  issues: string[]
): z.infer<T> | null {
  const result = schema.safeParse(raw);
  if (!result.success) {
    for (const issue of result.error.issues) {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      issues.push(`${file}: ${where}: ${issue.message}`);
    }
    return null;
  }
  return result.data;
}

function countGroups(pattern: RegExp): number {
  const probe = new RegExp(`(?:${pattern.source})|`, pattern.flags).exec("");
  return probe ? probe.length - 1 : 0;
}

function checkPattern(where: string, source: string, requireGroup: boolean): string[] {
  if (hasUnboundedQuantifier(source)) {
    return [`${where}: unbounded quantifier in "${source}"`];
  }
  let compiled: RegExp;
  try {
    compiled = new RegExp(source, "iu");
  } catch (err) {
    return [`${where}: ${err instanceof Error ? err.message : String(err)}`];
  }
  if (requireGroup && countGroups(compiled) < 1) {
    return [`${where}: pattern needs a capture group for the value`];
  }
  return [];
}

function crossCheck(
  engine: EngineSettings,
  units: Map<string, UnitDef>,
  dimensions: Map<string, string>,
  parameters: ParameterDef[],
  sourceDomains: SourceDomains
): string[] {
  const issues: string[] = [];

  for (const [dimension, base] of dimensions) {
    const def = units.get(base);
    if (!def) issues.push(`units.json: base unit "${base}" of ${dimension} is not defined`);
    else if (def.dimension !== dimension || def.factor !== 1)
      issues.push(`units.json: base unit "${base}" must be ${dimension} with factor 1`);
  }
  for (const [key, def] of units) {
    if (!dimensions.has(def.dimension))
      issues.push(`units.json: unit "${key}" has unknown dimension "${def.dimension}"`);
  }

  const seenNames = new Set<string>();
  const aliasOwner = new Map<string, string>();
  for (const param of parameters) {
    const where = `parameters.json: ${param.name}`;
    if (seenNames.has(param.name)) issues.push(`${where}: duplicate parameter name`);
    seenNames.add(param.name);

    if (param.kind === "numeric") {
      const canonical = param.canonicalUnit ? units.get(param.canonicalUnit) : undefined;
      if (!canonical) {
        issues.push(`${where}: numeric parameter needs a known canonicalUnit`);
      } else {
        for (const [from, to] of Object.entries(param.unitAliases ?? {})) {
          const target = units.get(to);
          if (!target) issues.push(`${where}: unit alias "${from}" points at unknown unit "${to}"`);
          else if (target.dimension !== canonical.dimension)
            issues.push(`${where}: unit alias "${from}" is ${target.dimension}, expected ${canonical.dimension}`);
        }
      }
    } else if (param.canonicalUnit) {
      issues.push(`${where}: only numeric parameters carry a canonicalUnit`);
    }

    if (param.kind === "text" && param.plausible)
      issues.push(`${where}: text parameters have no plausibility bounds`);
    if (param.kind !== "text" && param.valuePattern)
      issues.push(`${where}: valuePattern is only used by text parameters`);
    if (param.qa?.min !== undefined && param.qa.max !== undefined && param.qa.min >= param.qa.max)
      issues.push(`${where}: qa.min must be below qa.max`);

    if (param.valuePattern) issues.push(...checkPattern(`${where}.valuePattern`, param.valuePattern, false));
    (param.patterns ?? []).forEach((p, i) => {
      issues.push(...checkPattern(`${where}.patterns[${i}]`, p, true));
    });

    for (const alias of param.aliases) {
      const key = normalizeHeader(alias);
      const owner = aliasOwner.get(key);
      if (owner && owner !== param.name)
        issues.push(`${where}: alias "${alias}" is already used by ${owner}`);
      aliasOwner.set(key, param.name);
    }
  }

  for (const [cls, names] of Object.entries(engine.qa.coreParameters)) {
    for (const name of names ?? []) {
      if (!seenNames.has(name)) issues.push(`engine.json: qa.coreParameters.${cls} names unknown parameter "${name}"`);
    }
  }

  if (engine.thresholds.visibility > engine.thresholds.acceptance)
    issues.push("engine.json: thresholds.visibility must not exceed thresholds.acceptance");
  if (engine.signalWeights.sourceTier + engine.signalWeights.extractionMethod <= 0)
    issues.push("engine.json: signalWeights must not both be zero");

  sourceDomains.dealerPatterns.forEach((p, i) => {
    issues.push(...checkPattern(`source-domains.json: dealerPatterns[${i}]`, p, false));
  });

  return issues;
}

export function parseEngineConfig(files: EngineConfigFiles): EngineConfig {
  const issues: string[] = [];
  const engine = parseFile(FILE_NAMES.engine, engineSchema, files.engine, issues);
  const unitsFile = parseFile(FILE_NAMES.units, unitsSchema, files.units, issues);
  const parametersFile = parseFile(FILE_NAMES.parameters, parametersFileSchema, files.parameters, issues);
  const sourceDomains = parseFile(FILE_NAMES.sourceDomains, sourceDomainsSchema, files.sourceDomains, issues);

  if (!engine || !unitsFile || !parametersFile || !sourceDomains) {
    throw new ConfigError(issues);
  }

  const units = new Map<string, UnitDef>(Object.entries(unitsFile.units));
  const dimensions = new Map<string, string>(Object.entries(unitsFile.dimensions));
  const parameters = parametersFile.parameters;

  issues.push(...crossCheck(engine, units, dimensions, parameters, sourceDomains));
  if (issues.length > 0) throw new ConfigError(issues);

  return {
    engine,
    units,
    dimensions,
    parameters,
    parameterIndex: new Map(parameters.map((p) => [p.name, p])),
    sourceDomains,
  };
}

function readJson(dir: string, file: string, issues: string[]): unknown {
  const filePath = path.join(dir, file);
  try {
    return JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    issues.push(`${file}: ${err instanceof Error ? err.message : String(err)}`);
    return undefined;
  }
}

export function loadEngineConfig(dir: string = config.engineConfigDir): EngineConfig {
  const resolved = path.resolve(process.cwd(), dir);
  const issues: string[] = [];
  const files: EngineConfigFiles = {
    engine: readJson(resolved, FILE_NAMES.engine, issues),
    units: readJson(resolved, FILE_NAMES.units, issues),
    parameters: readJson(resolved, FILE_NAMES.parameters, issues),
    sourceDomains: readJson(resolved, FILE_NAMES.sourceDomains, issues),
  };
  if (issues.length > 0) throw new ConfigError(issues);
  return parseEngineConfig(files);
}

let engineConfig: EngineConfig | null = null;

export function getEngineConfig(): EngineConfig {
  if (engineConfig) return engineConfig;
  engineConfig = loadEngineConfig();
  console.log(
    `[engine-config] Loaded ${engineConfig.parameters.length} parameters, ${engineConfig.units.size} units`
  );
  return engineConfig;
}

export function getParameter(cfg: EngineConfig, name: string): ParameterDef | undefined {
  return cfg.parameterIndex.get(name);
}

export function plausibleRange(
  param: ParameterDef,
  equipmentClass: EquipmentClass
): ValueRange | undefined {
  if (!param.plausible) return undefined;
  return param.plausible.byClass?.[equipmentClass] ?? param.plausible.default;
}
