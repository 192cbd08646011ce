import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { TriageReport } from "../domain/Analysis.js";
import type { SinkPort } from "../ports/SinkPort.js";
import { type PayloadOptions, buildTriagePayload } from "../report/payload.js";

/** Writes the triage payload as pretty JSON, creating parent directories. */
export function makeJsonFileSink(path: string, opts: PayloadOptions = {}): SinkPort {
  return {
    async publish(report: TriageReport) {
      const payload = buildTriagePayload(report, opts);
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
    },
  };
}
