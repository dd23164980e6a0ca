import { describe, it, expect } from "vitest";
import {
  detectLanguageRatio,
  digitsOnly,
  isValidIsraeliId,
  normalizeDigits,
  parsePossibleDate,
} from "./digits.js";

function referenceChecksum(id: string): boolean {
  const sum = id
    .split("")
    .map((d, i) => Number(d) * (i % 2 === 0 ? 1 : 2))
    .map((p) => (p > 9 ? p - 9 : p))
    .reduce((a, b) => a + b, 0);
  return sum % 10 === 0;
}

describe("isValidIsraeliId", () => {
  it("accepts known valid IDs", () => {
    expect(isValidIsraeliId("000000000")).toBe(true);
    expect(isValidIsraeliId("123456782")).toBe(true);
    expect(isValidIsraeliId("000000018")).toBe(true);
  });

  it("rejects a wrong check digit", () => {
    expect(isValidIsraeliId("123456789")).toBe(false);
  });

  it("rejects anything that is not exactly nine ASCII digits", () => {
    expect(isValidIsraeliId("12345678")).toBe(false);
    expect(isValidIsraeliId("1234567820")).toBe(false);
    expect(isValidIsraeliId("12345678a")).toBe(false);
    expect(isValidIsraeliId("")).toBe(false);
  });

  it("agrees with the weighted-sum definition", () => {
    let seed = 7;
    for (let n = 0; n < 500; n++) {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      const id = String(seed % 1_000_000_000).padStart(9, "0");
      expect(isValidIsraeliId(id)).toBe(referenceChecksum(id));
    }
  });
});

describe("digit normalization", () => {
  it("maps Arabic-indic numerals to ASCII", () => {
    expect(normalizeDigits("٠١٢٣")).toBe("0123");
    expect(normalizeDigits("۹۸")).toBe("98");
  });

  it("strips everything but digits", () => {
    expect(digitsOnly("05-123 ٤٥")).toBe("0512345");
  });
});

describe("parsePossibleDate", () => {
  it("reads day-month-year", () => {
    expect(parsePossibleDate("15/03/1990")).toEqual(["15", "03", "1990"]);
  });

  it("reads year-month-day", () => {
    expect(parsePossibleDate("1990-03-15")).toEqual(["15", "03", "1990"]);
  });

  it("reads a bare yyyymmdd run", () => {
    expect(parsePossibleDate("19900315")).toEqual(["15", "03", "1990"]);
  });

  it("expands two-digit years", () => {
    expect(parsePossibleDate("15.03.90")).toEqual(["15", "03", "1990"]);
    expect(parsePossibleDate("1.2.25")).toEqual(["1", "2", "2025"]);
  });

  it("returns empty parts for unparseable input", () => {
    expect(parsePossibleDate("abc")).toEqual(["", "", ""]);
    expect(parsePossibleDate("15 03")).toEqual(["", "", ""]);
    expect(parsePossibleDate("")).toEqual(["", "", ""]);
  });
});

describe("detectLanguageRatio", () => {
  it("splits letters between Hebrew and Latin", () => {
    expect(detectLanguageRatio("שלום ab 123")).toEqual({
      hebrew: 0.67,
      latin: 0.33,
    });
  });

  it("is zero for text without letters", () => {
    expect(detectLanguageRatio("123")).toEqual({ hebrew: 0, latin: 0 });
  });
});
