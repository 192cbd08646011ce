import { readFile } from "node:fs/promises";
import { z } from "zod";
import { IncidentParseError } from "../domain/errors.js";
import type { Incident } from "../domain/Incident.js";

// largest instant a Date can hold, in seconds
const MAX_UNIX_SECONDS = 8.64e12;
const unixSeconds = z.number().int().nonnegative().max(MAX_UNIX_SECONDS);
const measured = z.union([z.number(), z.string()]);

export const incidentDescriptorSchema = z.object({
  incident: z
    .object({
      incident_id: z.string().optional(),
      started_at: unixSeconds,
      ended_at: unixSeconds.nullable().optional(),
      state: z.string().optional(),
      resource: z.object({
        type: z.string().min(1),
        labels: z.record(z.string().nullable()),
      }),
      policy_name: z.string().optional(),
      condition_name: z.string().optional(),
      summary: z.string().optional(),
      metric: z.record(z.unknown()).optional(),
      scoping_project_id: z.string().optional(),
      observed_value: measured.nullable().optional(),
      threshold_value: measured.nullable().optional(),
      url: z.string().optional(),
    })
    .passthrough(),
});

export type IncidentDescriptor = z.infer<typeof incidentDescriptorSchema>;

export interface ParseIncidentOptions {
  projectId?: string; // wins over anything found in the descriptor
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

/** Validates an alerting payload once, at the boundary. */
export function parseIncidentDescriptor(json: unknown, opts: ParseIncidentOptions = {}): Incident {
  const parsed = incidentDescriptorSchema.safeParse(json);
  if (!parsed.success) {
    throw new IncidentParseError("invalid incident descriptor", issuesOf(parsed.error));
  }
  const src = parsed.data.incident;

  const labels: Record<string, string> = {};
  for (const [key, value] of Object.entries(src.resource.labels)) {
    if (value) labels[key] = value;
  }

  const incident: Incident = {
    startedAt: new Date(src.started_at * 1000),
    resource: { type: src.resource.type, labels },
  };
  if (src.ended_at != null) incident.endedAt = new Date(src.ended_at * 1000);
  if (src.incident_id) incident.incidentId = src.incident_id;
  if (src.state) incident.state = src.state;
  if (src.policy_name) incident.policyName = src.policy_name;
  if (src.condition_name) incident.conditionName = src.condition_name;
  if (src.summary) incident.summary = src.summary;
  if (src.metric) incident.metric = src.metric;
  if (src.observed_value != null) incident.observedValue = src.observed_value;
  if (src.threshold_value != null) incident.thresholdValue = src.threshold_value;
  if (src.url) incident.url = src.url;

  const projectId = opts.projectId ?? src.scoping_project_id ?? labels["project_id"];
  if (projectId) incident.projectId = projectId;
  return incident;
}

export async function loadIncidentFile(path: string, opts: ParseIncidentOptions = {}): Promise<Incident> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new IncidentParseError(`cannot read incident file ${path}`, [], { cause: err });
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new IncidentParseError(`incident file ${path} is not valid JSON`, [], { cause: err });
  }
  return parseIncidentDescriptor(json, opts);
}
