// ===== Enums =====

export enum EquipmentClass {
  HAUL_TRUCK = "haul_truck",
  EXCAVATOR = "excavator",
  SHOVEL = "shovel",
  WHEEL_LOADER = "wheel_loader",
  DOZER = "dozer",
  OTHER = "other",
}

export enum ContentType {
  HTML = "html",
  PDF = "pdf",
}

export enum ExtractionMethod {
  REGEX = "regex",
  TABLE_CELL = "table_cell",
  RIMPULL_TABLE = "rimpull_table",
}

export enum SourceTier {
  OEM_PRIMARY = "oem_primary",
  OEM_SECONDARY = "oem_secondary",
  DEALER = "dealer",
  THIRD_PARTY = "third_party",
  UNKNOWN = "unknown",
}

export enum Plausibility {
  IN_RANGE = "in_range",
  OUT_OF_RANGE = "out_of_range",
  UNKNOWN_UNIT = "unknown_unit",
  UNBOUNDED = "unbounded",
}

export enum SpecStatus {
  VALIDATED = "validated",
  FLAGGED = "flagged",
  REJECTED = "rejected",
}

export enum DenyReason {
  INVALID_URL = "invalid_url",
  DNS_UNRESOLVED = "dns_unresolved",
  PRIVATE_IP = "private_ip",
  CLOUD_METADATA = "cloud_metadata",
  ROBOTS_DISALLOWED = "robots_disallowed", // policy deny, not a security deny
}

export enum RejectionReason {
  PHYSICAL_IMPLAUSIBILITY = "physical_implausibility",
  PLACEHOLDER_VALUE = "placeholder_value",
}

// ===== Documents =====

/** Rows x cells. Header rows are not assumed to exist. */
export type Table = string[][];

export interface RawDocument {
  url: string;
  contentType: ContentType;
  text: string;
  tables: Table[];
  fetchedAt: string;
  sourceDomain: string;
}

export interface EquipmentRef {
  brand: string;
  model: string;
  equipmentClass?: EquipmentClass;
}

// ===== Candidates =====

export type MatchedSpan =
  | { kind: "text"; start: number; end: number }
  | { kind: "table"; table: number; row: number; column: number };

export type SpecValue = number | string;

export interface ExtractionCandidate {
  id: string;
  brand: string;
  model: string;
  equipmentClass: EquipmentClass;
  parameterName: string;
  rawMatch: string;
  normalizedValue: SpecValue;
  unit: string | null; // canonical unit key, null when the source unit was missing or unknown
  extractionMethod: ExtractionMethod;
  sourceDocumentRef: string;
  matchedSpan: MatchedSpan;
}

export interface ScoredCandidate extends ExtractionCandidate {
  confidence: number;
  sourceTier: SourceTier;
  plausibility: Plausibility;
}

// ===== Validated records =====

export interface ClusterSummary {
  value: SpecValue;
  confidenceMass: number;
  candidateIds: string[];
  sourceTiers: SourceTier[];
}

export interface SpecRejection {
  reason: RejectionReason;
  bound: string;
}

export interface ValidatedSpec {
  brand: string;
  model: string;
  equipmentClass: EquipmentClass;
  parameterName: string;
  value: SpecValue;
  unit: string | null;
  confidence: number;
  supportingCandidates: string[];
  conflictingCandidates: string[];
  status: SpecStatus;
  clusters: ClusterSummary[];
  rejection?: SpecRejection;
}

export interface RimpullPoint {
  gear: number; // forward gears positive, reverse negative (R1 = -1)
  speedKph: number;
  forceKn: number;
}

export interface RimpullCurve {
  brand: string;
  model: string;
  points: RimpullPoint[];
  violations: string[];
  sourceRefs: string[];
}

// ===== Safety gate =====

export type SafetyVerdict =
  | { allowed: true; url: string }
  | { allowed: false; reason: DenyReason; detail: string };

// ===== QA =====

export type QaResult =
  | { accepted: true; spec: ValidatedSpec }
  | { accepted: false; spec: ValidatedSpec; reason: RejectionReason; bound: string };

export interface QaReport {
  brand: string;
  model: string;
  equipmentClass: EquipmentClass;
  accepted: ValidatedSpec[];
  rejected: ValidatedSpec[];
  warnings: string[];
  missingCoreParameters: string[];
  counts: {
    validated: number;
    flagged: number;
    rejected: number;
    total: number;
  };
}

export interface RimpullCheck {
  valid: boolean;
  issues: string[];
  violations: string[];
}

// ===== Pipeline =====

export interface WorkItem extends EquipmentRef {
  urls: string[];
}

export interface KeyedDocument extends EquipmentRef {
  document: RawDocument;
}

export interface PipelineError {
  brand: string;
  model: string;
  url?: string;
  reason?: DenyReason;
  error: string;
  timestamp: string;
}

export interface EquipmentResult {
  report: QaReport;
  rimpull: RimpullCurve | null;
}

export interface PipelineRunSummary {
  runId: string;
  startedAt: string;
  durationMs: number;
  documents: number;
  candidates: number;
  results: EquipmentResult[];
  errors: PipelineError[];
}
