import { describe, expect, it } from "vitest";
import { ConfigError } from "../src/utils/errors";
import { DEFAULT_SETTINGS, loadSettingsFromEnv, mergeSettings, validateSettings } from "../src/utils/settings";

describe("metrics settings", () => {
  it("accepts the defaults", () => {
    expect(validateSettings(DEFAULT_SETTINGS)).toEqual(DEFAULT_SETTINGS);
  });

  it("merges section overrides key by key", () => {
    const settings = mergeSettings(DEFAULT_SETTINGS, { businessHours: { timezone: "UTC" } });
    expect(settings.businessHours.timezone).toBe("UTC");
    expect(settings.businessHours.officeStartHour).toBe(9);
    expect(settings.scoring).toEqual(DEFAULT_SETTINGS.scoring);
  });

  it("rejects an office window that ends before it starts", () => {
    expect(() => mergeSettings(DEFAULT_SETTINGS, { businessHours: { officeEndHour: 8 } })).toThrow(ConfigError);
  });

  it("rejects weights that do not sum to one", () => {
    expect(() => mergeSettings(DEFAULT_SETTINGS, { weights: { fairEfficiency: 0.5 } })).toThrow(
      "Developer score weights must sum to 1.0"
    );
  });

  it("rejects unknown time zones", () => {
    expect(() => mergeSettings(DEFAULT_SETTINGS, { businessHours: { timezone: "Mars/Olympus" } })).toThrow(
      ConfigError
    );
  });

  it("reads overrides from the environment", () => {
    const settings = loadSettingsFromEnv({
      METRICS_TIMEZONE: "UTC",
      OFFICE_START_HOUR: "8",
      MIN_ITEMS_FOR_SCORING: "5"
    });
    expect(settings.businessHours.timezone).toBe("UTC");
    expect(settings.businessHours.officeStartHour).toBe(8);
    expect(settings.businessHours.officeEndHour).toBe(17);
    expect(settings.minItemsForScoring).toBe(5);
  });

  it("fails on non-numeric environment values", () => {
    expect(() => loadSettingsFromEnv({ MAX_HOURS_PER_DAY: "eight" })).toThrow(ConfigError);
  });
});
