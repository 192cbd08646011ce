export type { SummarizerPort } from "./SummarizePort.js";
export type { SinkPort } from "./SinkPort.js";
export type { LogSourcePort, Page, PageRequest } from "./LogSourcePort.js";
export type { LoggerPort, LogMeta } from "./LoggerPort.js";
export { silentLogger } from "./LoggerPort.js";
export type { Clock } from "./Clock.js";
export { fixedClock, systemClock } from "./Clock.js";
