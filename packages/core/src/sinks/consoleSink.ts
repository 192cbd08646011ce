import type { TriageReport } from "../domain/Analysis.js";
import type { SinkPort } from "../ports/SinkPort.js";
import { renderSummary } from "../report/render.js";

export type Render = (report: TriageReport) => string;
export type Write = (text: string) => void;

const stdoutWrite: Write = (text) => {
  process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
};

export function makeConsoleSink(render: Render = renderSummary, write: Write = stdoutWrite): SinkPort {
  return {
    async publish(report: TriageReport) {
      write(render(report));
    },
  };
}
