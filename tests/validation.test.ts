import { describe, expect, it } from "vitest";
import { timeBreakdownSchema } from "../src/utils/validation";

const baseBreakdown = {
  activeHours: 0,
  pausedHours: 0,
  preReopenActiveHours: 0,
  postReopenActiveHours: 0,
  wasReopened: false,
  reopenCount: 0
};

describe("time breakdown schema", () => {
  it("treats a posted breakdown without time or events as having no history", () => {
    expect(timeBreakdownSchema.parse(baseBreakdown).eventCount).toBe(0);
  });

  it("assumes history when time was recorded", () => {
    expect(timeBreakdownSchema.parse({ ...baseBreakdown, activeHours: 6 }).eventCount).toBe(1);
    expect(timeBreakdownSchema.parse({ ...baseBreakdown, totalHours: 2 }).eventCount).toBe(1);
  });

  it("keeps an explicit event count", () => {
    expect(timeBreakdownSchema.parse({ ...baseBreakdown, eventCount: 3 }).eventCount).toBe(3);
  });
});
