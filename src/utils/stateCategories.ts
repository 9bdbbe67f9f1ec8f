import { STATE_CATEGORIES, type StateCategory, type StateCategoryConfig } from "../models/_types";
import { ConfigError } from "./errors";

export type StateClassifier = {
  classify(rawState: string): StateCategory;
  isMapped(rawState: string): boolean;
};

function normalizeLabel(label: string): string {
  return label.trim().toLowerCase();
}

export function buildStateClassifier(config: StateCategoryConfig): StateClassifier {
  const lookup = new Map<string, StateCategory>();
  for (const category of STATE_CATEGORIES) {
    for (const label of config[category]) {
      const key = normalizeLabel(label);
      const existing = lookup.get(key);
      if (existing && existing !== category) {
        throw new ConfigError(`State "${label}" is mapped to both "${existing}" and "${category}".`);
      }
      lookup.set(key, category);
    }
  }
  return {
    classify(rawState: string) {
      return lookup.get(normalizeLabel(rawState)) ?? config.defaultCategory;
    },
    isMapped(rawState: string) {
      return lookup.has(normalizeLabel(rawState));
    }
  };
}
