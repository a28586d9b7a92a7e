import { createHash } from "crypto";
import type {
  EquipmentClass,
  ExtractionCandidate,
  ExtractionMethod,
  MatchedSpan,
  SpecValue,
} from "../types";

export interface CandidateContext {
  url: string;
  brand: string;
  model: string;
  equipmentClass: EquipmentClass;
}

function spanKey(span: MatchedSpan): string {
  return span.kind === "text"
    ? `text:${span.start}-${span.end}`
    : `table:${span.table}:${span.row}:${span.column}`;
}

/**
 * Same observation, same id: equipment, document, parameter, method, position
 * and raw text. One brochure read for two models gives two sets of ids.
 */
export function candidateId(
  ctx: Pick<CandidateContext, "url" | "brand" | "model">,
  parameterName: string,
  method: ExtractionMethod,
  span: MatchedSpan,
  rawMatch: string
): string {
  const input = [ctx.brand, ctx.model, ctx.url, parameterName, method, spanKey(span), rawMatch].join("|");
  return createHash("sha256").update(input).digest("hex").slice(0, 16);
}

export function makeCandidate(
  ctx: CandidateContext,
  parameterName: string,
  method: ExtractionMethod,
  span: MatchedSpan,
  rawMatch: string,
  value: SpecValue,
  unit: string | null
): ExtractionCandidate {
  return {
    id: candidateId(ctx, parameterName, method, span, rawMatch),
    brand: ctx.brand,
    model: ctx.model,
    equipmentClass: ctx.equipmentClass,
    parameterName,
    rawMatch,
    normalizedValue: value,
    unit,
    extractionMethod: method,
    sourceDocumentRef: ctx.url,
    matchedSpan: span,
  };
}
