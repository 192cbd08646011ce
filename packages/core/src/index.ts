export * from "./domain/LogEntry.js";
export * from "./domain/ErrorType.js";
export type * from "./domain/Analysis.js";
export type { Incident } from "./domain/Incident.js";
export * from "./domain/errors.js";

export * from "./ports/index.js";
export { settings } from "./config/settings.js";

export * from "./query/filter.js";
export * from "./query/windowBuilder.js";
export * from "./incident/parseIncident.js";

export * from "./normalize/rawRecord.js";
export * from "./normalize/normalizer.js";

export * from "./classify/rules.js";
export * from "./classify/classifier.js";

export * from "./analyzer/grouping.js";
export * from "./analyzer/timeline.js";
export * from "./analyzer/statistics.js";
export * from "./analyzer/summarize.js";
export * from "./analyzer/recommender.js";
export * from "./analyzer/collect.js";
export * from "./analyzer/pipeline.js";
export * from "./analyzer/createAnalyzer.js";

export * from "./report/payload.js";
export * from "./report/render.js";
export * from "./sinks/consoleSink.js";
export * from "./sinks/jsonFileSink.js";
export { MemoryLogSource } from "./sources/MemoryLogSource.js";
