import type { TriageReport } from "../domain/Analysis.js";


export interface SummarizerPort {
  summarize(report: TriageReport, hint?: string): Promise<string>;
}
