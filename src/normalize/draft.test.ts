import { describe, it, expect } from "vitest";
import { applyFieldChange, createDraft, getField } from "./draft.js";

describe("ExtractionDraft", () => {
  it("starts at revision 0 without changes", () => {
    const draft = createDraft({ lastName: "כהן" });
    expect(draft.revision).toBe(0);
    expect(draft.changes).toEqual([]);
    expect(getField(draft, "lastName")).toBe("כהן");
  });

  it("reads nested paths and returns undefined through non-objects", () => {
    const draft = createDraft({ dateOfBirth: { day: "1" }, idNumber: "5" });
    expect(getField(draft, "dateOfBirth.day")).toBe("1");
    expect(getField(draft, "dateOfBirth.year")).toBeUndefined();
    expect(getField(draft, "idNumber.day")).toBeUndefined();
  });

  it("records each change and leaves the previous revision intact", () => {
    const first = createDraft({ idNumber: "1" });
    const second = applyFieldChange(first, "idNumber", "123456782", "id-repair");
    const third = applyFieldChange(
      second,
      "formReceiptDateAtClinic.day",
      "02",
      "date-override",
    );

    expect(getField(first, "idNumber")).toBe("1");
    expect(third.revision).toBe(2);
    expect(getField(third, "idNumber")).toBe("123456782");
    expect(getField(third, "formReceiptDateAtClinic")).toEqual({ day: "02" });
    expect(third.changes).toEqual([
      { field: "idNumber", previous: "1", next: "123456782", stage: "id-repair" },
      {
        field: "formReceiptDateAtClinic.day",
        previous: undefined,
        next: "02",
        stage: "date-override",
      },
    ]);
  });

  it("replaces a scalar in the way of a nested write", () => {
    const draft = applyFieldChange(
      createDraft({ dateOfInjury: "yesterday" }),
      "dateOfInjury.year",
      "2024",
      "normalize",
    );
    expect(getField(draft, "dateOfInjury")).toEqual({ year: "2024" });
  });

  it("does not share nested objects with the previous revision", () => {
    const first = createDraft({ address: { city: "חיפה", street: "הרצל" } });
    const second = applyFieldChange(first, "address.city", "עכו", "normalize");
    expect(getField(first, "address.city")).toBe("חיפה");
    expect(getField(second, "address")).toEqual({ city: "עכו", street: "הרצל" });
  });
});
