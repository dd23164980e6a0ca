import { describe, it, expect } from "vitest";
import { createDraft, getField } from "./draft.js";
import {
  asText,
  isImplausibleName,
  normalizeDateTriple,
  normalizeDraft,
  normalizeGender,
  normalizeId,
  normalizePhone,
  normalizeSignature,
} from "./fields.js";

describe("asText", () => {
  it("passes strings and stringifies finite numbers", () => {
    expect(asText("abc")).toBe("abc");
    expect(asText(501234567)).toBe("501234567");
  });

  it("treats everything else as empty", () => {
    expect(asText(null)).toBe("");
    expect(asText(undefined)).toBe("");
    expect(asText(Number.NaN)).toBe("");
    expect(asText({ day: "1" })).toBe("");
  });
});

describe("normalizeId", () => {
  it("drops the leading zero of a 10-digit ID", () => {
    expect(normalizeId("0123456789", "standard")).toBe("123456789");
    expect(normalizeId("0123456789", "lenient")).toBe("123456789");
  });

  it("keeps a 10-digit ID without leading zero in standard mode", () => {
    expect(normalizeId("1234567890", "standard")).toBe("1234567890");
  });

  it("drops a stray first digit in lenient mode when the rest is a valid ID", () => {
    expect(normalizeId("1123456782", "lenient")).toBe("123456782");
  });

  it("keeps a 10-digit lenient ID whose last nine digits fail the checksum", () => {
    expect(normalizeId("1234567890", "lenient")).toBe("1234567890");
  });

  it("strips separators and keeps the last nine of longer runs", () => {
    expect(normalizeId("12-345-6782", "standard")).toBe("123456782");
    expect(normalizeId("123456789012", "standard")).toBe("456789012");
    expect(normalizeId("", "standard")).toBe("");
  });

  it("blanks fragments shorter than nine digits in both modes", () => {
    expect(normalizeId("12345678", "standard")).toBe("");
    expect(normalizeId("12-345", "standard")).toBe("");
    expect(normalizeId("12-345", "lenient")).toBe("");
    expect(normalizeId("abc", "lenient")).toBe("");
  });

  it("is idempotent", () => {
    for (const value of ["0123456789", "1123456782", "123456782", "987"]) {
      for (const mode of ["standard", "lenient"] as const) {
        const once = normalizeId(value, mode);
        expect(normalizeId(once, mode)).toBe(once);
      }
    }
  });
});

describe("normalizePhone", () => {
  it("restores the dropped zero of a mobile number", () => {
    expect(normalizePhone("501234567", "mobile", "standard")).toEqual({
      value: "0501234567",
      corrected: true,
    });
  });

  it("leaves a well-formed mobile number alone", () => {
    expect(normalizePhone("050-1234567", "mobile", "standard")).toEqual({
      value: "0501234567",
      corrected: false,
    });
  });

  it("forces the 05 prefix on other mobile numbers", () => {
    expect(normalizePhone("82345678", "mobile", "standard")).toEqual({
      value: "0582345678",
      corrected: true,
    });
  });

  it("reads a leading 8 as a misread zero in lenient mode", () => {
    expect(normalizePhone("82345678", "mobile", "lenient")).toEqual({
      value: "052345678",
      corrected: true,
    });
    expect(normalizePhone("931234567", "landline", "lenient")).toEqual({
      value: "031234567",
      corrected: true,
    });
  });

  it("prefixes a landline without zero", () => {
    expect(normalizePhone("1234567", "landline", "standard")).toEqual({
      value: "01234567",
      corrected: true,
    });
  });

  it("turns 09 into 08 for nine-digit lenient landlines only", () => {
    expect(normalizePhone("091234567", "landline", "lenient")).toEqual({
      value: "081234567",
      corrected: true,
    });
    expect(normalizePhone("091234567", "landline", "standard")).toEqual({
      value: "091234567",
      corrected: false,
    });
  });

  it("counts truncation as a correction", () => {
    expect(normalizePhone("0312345678", "landline", "standard")).toEqual({
      value: "031234567",
      corrected: true,
    });
  });

  it("returns empty for input without digits", () => {
    expect(normalizePhone("n/a", "mobile", "lenient")).toEqual({
      value: "",
      corrected: false,
    });
  });
});

describe("scalar normalizers", () => {
  it("maps gender words", () => {
    expect(normalizeGender("זכר")).toBe("male");
    expect(normalizeGender(" F ")).toBe("female");
    expect(normalizeGender("Other")).toBe("other");
  });

  it("turns check marks into X", () => {
    expect(normalizeSignature("✓")).toBe("X");
    expect(normalizeSignature("x")).toBe("X");
    expect(normalizeSignature(" יוסי ")).toBe("יוסי");
  });

  it("rejects labels, digits and single letters as names", () => {
    expect(isImplausibleName("ת.ז")).toBe(true);
    expect(isImplausibleName("מספר ת.ז.")).toBe(true);
    expect(isImplausibleName("12345")).toBe(true);
    expect(isImplausibleName("א")).toBe(true);
    expect(isImplausibleName("Patient ID")).toBe(true);
    expect(isImplausibleName("ID 123")).toBe(true);
  });

  it("accepts ordinary names", () => {
    expect(isImplausibleName("כהן")).toBe(false);
    expect(isImplausibleName("David")).toBe(false);
  });
});

describe("normalizeDateTriple", () => {
  it("splits a date string", () => {
    expect(normalizeDateTriple("1990-03-15")).toEqual({
      day: "15",
      month: "03",
      year: "1990",
    });
  });

  it("accepts numeric parts", () => {
    expect(normalizeDateTriple({ day: 5, month: 3, year: 1990 })).toEqual({
      day: "5",
      month: "3",
      year: "1990",
    });
  });

  it("re-reads parts that were filled in the wrong order", () => {
    expect(
      normalizeDateTriple({ day: "1990", month: "03", year: "15" }),
    ).toEqual({ day: "15", month: "03", year: "1990" });
  });

  it("treats missing values as empty", () => {
    expect(normalizeDateTriple(null)).toEqual({ day: "", month: "", year: "" });
  });
});

describe("normalizeDraft", () => {
  const input = createDraft({
    gender: "נקבה",
    idNumber: "0123456789",
    mobilePhone: "501234567",
    lastName: "ת.ז",
    dateOfBirth: "15/03/1990",
  });

  it("applies every field rule as a new revision", () => {
    const { draft, phoneCorrections } = normalizeDraft(input, "standard");

    expect(getField(draft, "gender")).toBe("female");
    expect(getField(draft, "idNumber")).toBe("123456789");
    expect(getField(draft, "mobilePhone")).toBe("0501234567");
    expect(getField(draft, "landlinePhone")).toBe("");
    expect(getField(draft, "lastName")).toBe("");
    expect(getField(draft, "dateOfBirth")).toEqual({
      day: "15",
      month: "03",
      year: "1990",
    });
    expect(getField(draft, "dateOfInjury")).toEqual({
      day: "",
      month: "",
      year: "",
    });
    expect(phoneCorrections).toEqual([
      "Mobile phone auto-corrected with the standard '0' prefix",
    ]);
    expect(draft.revision).toBe(9);
    expect(draft.changes.every((change) => change.stage === "normalize")).toBe(
      true,
    );
  });

  it("does not touch the input draft", () => {
    normalizeDraft(input, "standard");
    expect(input.revision).toBe(0);
    expect(getField(input, "idNumber")).toBe("0123456789");
  });

  it("is a no-op on its own output", () => {
    const first = normalizeDraft(input, "standard").draft;
    const second = normalizeDraft(first, "standard");
    expect(second.draft.revision).toBe(first.revision);
    expect(second.phoneCorrections).toEqual([]);
  });

  it("blanks a name holding a Latin ID label but keeps names containing the letters", () => {
    const { draft } = normalizeDraft(
      createDraft({ firstName: "ID 123", lastName: "David" }),
      "standard",
    );
    expect(getField(draft, "firstName")).toBe("");
    expect(getField(draft, "lastName")).toBe("David");
  });

  it("marks lenient phone corrections", () => {
    const { phoneCorrections } = normalizeDraft(
      createDraft({ landlinePhone: "931234567" }),
      "lenient",
    );
    expect(phoneCorrections).toEqual([
      "Landline phone auto-corrected with the standard '0' prefix (image processing)",
    ]);
  });
});
