import { describe, expect, it } from "vitest";
import {
  addDaysToIso,
  epochSecondsToUtcIso,
  isoToEpochSeconds,
  laterOf,
  previousUtcDate,
  utcDayRange,
  utcMonthRange,
} from "./time.js";

describe("time helpers", () => {
  it("converts provider epoch seconds to UTC ISO", () => {
    expect(epochSecondsToUtcIso(1596803295)).toBe("2020-08-07T12:28:15.000Z");
    expect(isoToEpochSeconds("2020-08-07T12:28:15.000Z")).toBe(1596803295);
  });

  it("computes the inclusive whole-second bounds of a UTC day", () => {
    expect(utcDayRange("2020-05-06")).toEqual({
      startIso: "2020-05-06T00:00:00.000Z",
      endIso: "2020-05-06T23:59:59.000Z",
    });
  });

  it("rejects malformed usage dates", () => {
    expect(() => utcDayRange("2020-5-6")).toThrow(
      "Usage date must be YYYY-MM-DD, received: 2020-5-6",
    );
  });

  it("defaults usage to the previous UTC day", () => {
    expect(previousUtcDate("2020-05-07T00:10:00.000Z")).toBe("2020-05-06");
    expect(previousUtcDate("2021-03-01T12:00:00+02:00")).toBe("2021-02-28");
  });

  it("computes the calendar month range", () => {
    expect(utcMonthRange("2021-02-14T10:00:00.000Z")).toEqual({
      startIso: "2021-02-01T00:00:00.000Z",
      endIso: "2021-02-28T23:59:59.000Z",
    });
  });

  it("adds days and picks the later instant", () => {
    expect(addDaysToIso("2026-01-01T00:00:00.000Z", 365)).toBe(
      "2027-01-01T00:00:00.000Z",
    );
    expect(
      laterOf("2026-01-01T00:00:00.000Z", "2025-12-31T23:59:59.000Z"),
    ).toBe("2026-01-01T00:00:00.000Z");
  });
});
