import { describe, it, expect } from "vitest";
import { findReceiptDate } from "./receipt-date.js";

describe("findReceiptDate", () => {
  it("reads ddmmyyyy after the full label", () => {
    expect(findReceiptDate("תאריך קבלת הטופס בקופה 15032024")).toEqual({
      day: "15",
      month: "03",
      year: "2024",
    });
  });

  it("prefers the date next to a label over an earlier one", () => {
    expect(findReceiptDate("01012020 שורה\nתאריך קבלת הטופס 02022021")).toEqual({
      day: "02",
      month: "02",
      year: "2021",
    });
  });

  it("skips runs that are not calendar dates", () => {
    expect(findReceiptDate("תאריך קבלת הטופס 99999999 12052023")).toEqual({
      day: "12",
      month: "05",
      year: "2023",
    });
  });

  it("falls back to the first plausible date anywhere", () => {
    expect(findReceiptDate("נתקבל 07082022")).toEqual({
      day: "07",
      month: "08",
      year: "2022",
    });
  });

  it("returns null without an eight-digit date", () => {
    expect(findReceiptDate("אין תאריך 1234")).toBeNull();
  });
});
