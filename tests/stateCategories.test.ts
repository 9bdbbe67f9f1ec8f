import { describe, expect, it } from "vitest";
import { ConfigError } from "../src/utils/errors";
import { DEFAULT_STATE_CATEGORIES } from "../src/utils/settings";
import { buildStateClassifier } from "../src/utils/stateCategories";

describe("state classifier", () => {
  const classifier = buildStateClassifier(DEFAULT_STATE_CATEGORIES);

  it("matches labels ignoring case and surrounding spaces", () => {
    expect(classifier.classify("in progress")).toBe("productive");
    expect(classifier.classify("  Done ")).toBe("completion");
    expect(classifier.classify("BLOCKED")).toBe("paused");
  });

  it("falls back to the default category for unknown labels", () => {
    expect(classifier.classify("Triage")).toBe("ignored");
    expect(classifier.isMapped("Triage")).toBe(false);
    expect(classifier.isMapped("Code Review")).toBe(true);
  });

  it("rejects a label mapped to two categories", () => {
    expect(() =>
      buildStateClassifier({ ...DEFAULT_STATE_CATEGORIES, productive: ["Active", "done"] })
    ).toThrow(ConfigError);
  });
});
