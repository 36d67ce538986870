import { describe, expect, it } from "vitest";
import { addDays, parseCallDate, toIsoDate } from "./dateUtils";

describe("dateUtils", () => {
  it("parses call timestamps with and without a time part as UTC", () => {
    expect(parseCallDate("2024-08-01 17:00:00")).toEqual(
      new Date("2024-08-01T17:00:00.000Z"),
    );
    expect(parseCallDate("2024-08-01")).toEqual(new Date("2024-08-01T00:00:00.000Z"));
  });

  it("rejects malformed and impossible dates", () => {
    expect(parseCallDate("08/01/2024")).toBeNull();
    expect(parseCallDate("2024-02-30")).toBeNull();
    expect(parseCallDate("2024-08-01 25:00:00")).toBeNull();
  });

  it("shifts by whole days and formats date-only strings", () => {
    expect(toIsoDate(addDays(new Date("2024-08-01T17:00:00.000Z"), -30))).toBe(
      "2024-07-02",
    );
  });
});
