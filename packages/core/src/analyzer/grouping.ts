import { settings } from "../config/settings.js";
import type { ClassifiedEntry, ErrorGroup } from "../domain/Analysis.js";

const QUOTED = /"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'/g;
const UUID = /\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/g;
const HEX_ID = /\b(?:0x[0-9a-f]+|(?=[0-9a-f]*\d)[0-9a-f]{8,})\b/g;
const DIGITS = /\d+/g;

/**
 * Message signature used for grouping: variable data (quoted literals, ids,
 * numbers) becomes placeholder tokens. Applying it to its own output is a
 * no-op.
 */
export function normalizeSignature(message: string): string {
  return message
    .toLowerCase()
    .replace(QUOTED, "<str>")
    .replace(UUID, "<id>")
    .replace(HEX_ID, "<id>")
    .replace(DIGITS, "<num>")
    .replace(/\s+/g, " ")
    .trim();
}

export interface GroupingOptions {
  samplesPerGroup?: number; // default: 3
}

export function compareGroups(a: ErrorGroup, b: ErrorGroup): number {
  return (
    b.count - a.count ||
    b.lastSeen.getTime() - a.lastSeen.getTime() ||
    (a.signature < b.signature ? -1 : a.signature > b.signature ? 1 : 0)
  );
}

/** Groups by identical signature; the first member decides the group's type. */
export function groupEntries(entries: readonly ClassifiedEntry[], opts: GroupingOptions = {}): ErrorGroup[] {
  const maxSamples = opts.samplesPerGroup ?? settings.analysis.samplesPerGroup;
  const groups = new Map<string, ErrorGroup>();

  for (const entry of entries) {
    const signature = normalizeSignature(entry.message);
    const current = groups.get(signature);
    if (!current) {
      groups.set(signature, {
        signature,
        errorType: entry.errorType,
        count: 1,
        firstSeen: entry.timestamp,
        lastSeen: entry.timestamp,
        samples: maxSamples > 0 ? [entry.message] : [],
      });
      continue;
    }

    current.count += 1;
    if (entry.timestamp < current.firstSeen) current.firstSeen = entry.timestamp;
    if (entry.timestamp > current.lastSeen) current.lastSeen = entry.timestamp;
    if (current.samples.length < maxSamples) current.samples.push(entry.message);
  }

  return [...groups.values()].sort(compareGroups);
}
