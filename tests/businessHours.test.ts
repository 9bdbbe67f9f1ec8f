import { describe, expect, it } from "vitest";
import type { BusinessHoursConfig } from "../src/models/_types";
import { overlapHours, wallClockHours } from "../src/utils/businessHours";

const utcHours: BusinessHoursConfig = {
  officeStartHour: 9,
  officeEndHour: 17,
  maxHoursPerDay: 8,
  timezone: "UTC",
  workingWeekdays: [1, 2, 3, 4, 5]
};

describe("overlapHours", () => {
  it("caps a full nine-hour office day at eight hours", () => {
    const config = { ...utcHours, officeEndHour: 18 };
    expect(overlapHours("2025-06-02T08:00:00Z", "2025-06-02T19:00:00Z", config)).toBe(8);
  });

  it("counts the part of an interval inside the office window", () => {
    expect(overlapHours("2025-06-02T10:00:00Z", "2025-06-02T15:30:00Z", utcHours)).toBe(5.5);
  });

  it("ignores weekends", () => {
    expect(overlapHours("2025-06-07T09:00:00Z", "2025-06-08T18:00:00Z", utcHours)).toBe(0);
  });

  it("splits intervals that cross midnight", () => {
    expect(overlapHours("2025-06-02T16:00:00Z", "2025-06-03T11:00:00Z", utcHours)).toBe(3);
  });

  it("skips the weekend between Friday and Monday", () => {
    expect(overlapHours("2025-06-06T15:00:00Z", "2025-06-09T10:00:00Z", utcHours)).toBe(3);
  });

  it("returns zero for empty or inverted intervals", () => {
    expect(overlapHours("2025-06-02T12:00:00Z", "2025-06-02T12:00:00Z", utcHours)).toBe(0);
    expect(overlapHours("2025-06-02T14:00:00Z", "2025-06-02T12:00:00Z", utcHours)).toBe(0);
  });

  it("evaluates office hours in the configured zone", () => {
    const config = { ...utcHours, timezone: "America/Mexico_City" };
    expect(overlapHours("2025-06-02T15:00:00Z", "2025-06-02T23:00:00Z", config)).toBe(8);
    expect(overlapHours("2025-06-02T09:00:00Z", "2025-06-02T15:00:00Z", config)).toBe(0);
  });

  it("keeps an eight hour day on a daylight-saving change", () => {
    const config = { ...utcHours, timezone: "America/New_York", workingWeekdays: [1, 2, 3, 4, 5, 6, 7] };
    expect(overlapHours("2025-03-09T05:00:00Z", "2025-03-10T05:00:00Z", config)).toBe(8);
  });

  it("accepts Date instances", () => {
    expect(overlapHours(new Date("2025-06-02T09:00:00Z"), new Date("2025-06-02T12:00:00Z"), utcHours)).toBe(3);
  });

  it("supports an office window that closes at midnight", () => {
    const config = { ...utcHours, officeStartHour: 20, officeEndHour: 24 };
    expect(overlapHours("2025-06-02T22:00:00Z", "2025-06-03T01:00:00Z", config)).toBe(2);
  });
});

describe("wallClockHours", () => {
  it("measures elapsed hours", () => {
    expect(wallClockHours("2025-06-07T09:00:00Z", "2025-06-07T11:30:00Z")).toBe(2.5);
  });
});
