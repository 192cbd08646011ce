import type { TriageReport } from "../domain/Analysis.js";

export interface SinkPort {
  publish(report: TriageReport): Promise<void>;
}
