import type { ErrorType } from "../domain/ErrorType.js";
import { type ClassificationRule, DEFAULT_RULES } from "./rules.js";

export interface Classifier {
  readonly rules: readonly ClassificationRule[];
  classify(message: string): ErrorType;
}

export function createClassifier(rules: readonly ClassificationRule[] = DEFAULT_RULES): Classifier {
  const compiled = rules.map((rule) => ({
    errorType: rule.errorType,
    keywords: rule.keywords.map((k) => k.toLowerCase()).filter((k) => k.length > 0),
  }));

  return {
    rules,
    classify(message) {
      const text = message.toLowerCase();
      for (const rule of compiled) {
        if (rule.keywords.some((k) => text.includes(k))) return rule.errorType;
      }
      return "UNKNOWN";
    },
  };
}
