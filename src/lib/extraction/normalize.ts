/**
 * Text helpers shared by the matchers, the config loader and QA.
 * Everything here works on already-truncated input.
 */

const ACCENTED = /[\u00c0-\u024f]/g;

/** Strips diacritics one character at a time so offsets into the original text stay valid. */
export function foldAccents(text: string): string {
  return text.replace(ACCENTED, (c) => {
    const base = c.normalize("NFD").replace(/[\u0300-\u036f]/g, "");
    return base.length === 1 ? base : c;
  });
}

export function normalizeHeader(raw: string): string {
  return foldAccents(raw)
    .toLowerCase()
    .replace(/\([^()]{0,40}\)|\[[^[\]]{0,40}\]/g, " ")
    .replace(/[^a-z0-9%]+/g, " ")
    .trim();
}

/** Unit written in a label, e.g. "Operating weight (kg)" or "Payload [t]". */
export function labelUnit(label: string): string | null {
  const match = /[([][^\S\n]{0,2}([^()[\]]{1,20}?)[^\S\n]{0,2}[)\]]/.exec(label);
  return match ? match[1] : null;
}

export function normalizeTextKey(value: string): string {
  return value.normalize("NFKC").toLowerCase().replace(/\s+/g, " ").trim();
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

// A space only counts as a thousands separator when exactly three digits follow it.
export const NUMBER_RE = /[-\u2212]?\d(?:[\d,.]|[ \u00a0\u202f](?=\d{3}(?!\d))){0,30}/;

// Unit token after a number: one word, optionally a second short word ("metric tons", "cu yd").
export const UNIT_RE =
  /[a-zA-Z%°³²·/.\-][a-zA-Z0-9%³²·/.\-]{0,11}(?:[^\S\n][a-zA-Z]{1,6}(?![a-zA-Z]))?/;

export function parseNumber(raw: string): number | null {
  const match = NUMBER_RE.exec(raw);
  if (!match) return null;
  return parseNumericToken(match[0]);
}

/**
 * "180,000" and "180 000" are thousands, "1.234,5" and "1,234.5" use the last
 * separator as the decimal point, a lone "." or "," is a decimal point.
 */
export function parseNumericToken(token: string): number | null {
  let t = token
    .replace(/[ \u00a0\u202f]/g, "")
    .replace("\u2212", "-")
    .replace(/[.,]+$/, "");
  const negative = t.startsWith("-");
  if (negative) t = t.slice(1);

  const lastComma = t.lastIndexOf(",");
  const lastDot = t.lastIndexOf(".");

  if (lastComma !== -1 && lastDot !== -1) {
    const decimalIdx = Math.max(lastComma, lastDot);
    const intPart = t.slice(0, decimalIdx).replace(/[.,]/g, "");
    t = `${intPart}.${t.slice(decimalIdx + 1)}`;
  } else if (lastComma !== -1) {
    if (/^\d{1,3}(?:,\d{3})+$/.test(t)) {
      t = t.replace(/,/g, "");
    } else if (t.indexOf(",") === lastComma) {
      t = t.replace(",", ".");
    } else {
      return null;
    }
  } else if (lastDot !== -1 && t.indexOf(".") !== lastDot) {
    if (!/^\d{1,3}(?:\.\d{3})+$/.test(t)) return null;
    t = t.replace(/\./g, "");
  }

  if (!/^\d{1,30}(?:\.\d{1,30})?$/.test(t)) return null;
  const n = Number(t);
  if (!Number.isFinite(n)) return null;
  return negative ? -n : n;
}

const PLACEHOLDER_RE =
  /^(?:n\/?a|n\.a|tbd|tba|tbc|to be (?:confirmed|determined|announced)|-{1,3}|—|–|\?{1,3}|x{1,3}|none|null|nil|unknown|not available|not specified|not applicable|no data|sin datos?|s\/d|consultar|contact (?:dealer|your dealer|us|sales)|on request|varies|sample|example|placeholder|lorem ipsum(?: [a-z ]{0,40})?)$/i;

export function isPlaceholder(raw: string): boolean {
  const t = collapseWhitespace(raw).replace(/[.:]+$/, "");
  return t === "" || PLACEHOLDER_RE.test(t);
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * True when a pattern can repeat without limit (`*`, `+` or `{n,}` outside a
 * character class). Catalog patterns run against untrusted page text.
 */
export function hasUnboundedQuantifier(pattern: string): boolean {
  let inClass = false;
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === "\\") {
      i++;
      continue;
    }
    if (inClass) {
      if (ch === "]") inClass = false;
      continue;
    }
    if (ch === "[") {
      inClass = true;
      continue;
    }
    if (ch === "*" || ch === "+") return true;
    if (ch === "{" && /^\{\d{1,6},\}/.test(pattern.slice(i, i + 10))) return true;
  }
  return false;
}
