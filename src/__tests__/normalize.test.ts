import { describe, it, expect } from "vitest";
import {
  foldAccents,
  hasUnboundedQuantifier,
  isPlaceholder,
  labelUnit,
  normalizeHeader,
  normalizeTextKey,
  parseNumber,
} from "../lib/extraction/normalize";

describe("parseNumber", () => {
  it("reads comma and space thousands separators", () => {
    expect(parseNumber("180,000")).toBe(180000);
    expect(parseNumber("180 000 kg")).toBe(180000);
    expect(parseNumber("1,234.5")).toBe(1234.5);
  });

  it("treats the last separator as the decimal point when both appear", () => {
    expect(parseNumber("1.234,5")).toBe(1234.5);
  });

  it("reads a lone comma as a decimal point", () => {
    expect(parseNumber("3,5 m")).toBe(3.5);
  });

  it("accepts repeated dots only in thousands shape", () => {
    expect(parseNumber("1.234.567")).toBe(1234567);
    expect(parseNumber("1.23.4")).toBeNull();
  });

  it("takes the first value of a range", () => {
    expect(parseNumber("5.0 - 6.5 m3")).toBe(5);
  });

  it("handles minus signs", () => {
    expect(parseNumber("-12")).toBe(-12);
    expect(parseNumber("−12")).toBe(-12);
  });

  it("returns null without digits", () => {
    expect(parseNumber("approx.")).toBeNull();
  });
});

describe("isPlaceholder", () => {
  it("recognizes placeholder values", () => {
    expect(isPlaceholder("N/A")).toBe(true);
    expect(isPlaceholder("n/a.")).toBe(true);
    expect(isPlaceholder("TBD")).toBe(true);
    expect(isPlaceholder("—")).toBe(true);
    expect(isPlaceholder("Contact dealer")).toBe(true);
    expect(isPlaceholder("   ")).toBe(true);
  });

  it("lets real values through", () => {
    expect(isPlaceholder("Cummins QSK60")).toBe(false);
    expect(isPlaceholder("180,000 kg")).toBe(false);
  });
});

describe("normalizeHeader", () => {
  it("drops parentheticals, accents and punctuation", () => {
    expect(normalizeHeader("Peso Operativo (kg)")).toBe("peso operativo");
    expect(normalizeHeader("Potência Líquida:")).toBe("potencia liquida");
    expect(normalizeHeader("Payload [t]")).toBe("payload");
  });
});

describe("labelUnit", () => {
  it("reads the unit written in a label", () => {
    expect(labelUnit("Operating weight (kg)")).toBe("kg");
    expect(labelUnit("Payload [t]")).toBe("t");
    expect(labelUnit("Payload")).toBeNull();
  });
});

describe("foldAccents", () => {
  it("keeps the string length", () => {
    const text = "Fuerza de tracción máxima";
    expect(foldAccents(text)).toBe("Fuerza de traccion maxima");
    expect(foldAccents(text).length).toBe(text.length);
  });
});

describe("normalizeTextKey", () => {
  it("case-folds and collapses whitespace", () => {
    expect(normalizeTextKey("  Cummins   QSK60 ")).toBe("cummins qsk60");
  });
});

describe("hasUnboundedQuantifier", () => {
  it("flags *, + and {n,}", () => {
    expect(hasUnboundedQuantifier("\\d+")).toBe(true);
    expect(hasUnboundedQuantifier("a*")).toBe(true);
    expect(hasUnboundedQuantifier("a{2,}")).toBe(true);
  });

  it("ignores bounded repeats, escapes and character classes", () => {
    expect(hasUnboundedQuantifier("a{2,5}")).toBe(false);
    expect(hasUnboundedQuantifier("\\+")).toBe(false);
    expect(hasUnboundedQuantifier("[+*]")).toBe(false);
  });
});
