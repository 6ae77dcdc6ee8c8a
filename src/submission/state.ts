import { promises as fs } from "fs";
import { z } from "zod";
import { MalformedStateError, MissingAccessionError } from "../errors";
import { writeJson } from "../utils/fs";

export const SubmissionStateSchema = z.object({
  schema_version: z.literal("1.0"),
  phase: z.enum(["submitted", "released"]),
  accession: z.string().min(1).nullable(),
  test: z.boolean(),
  original_inputs: z.object({
    sample_accessions: z.array(z.string().min(1)).min(1),
    checklist: z.string().min(1),
    checklist_source: z.enum(["override", "observed", "default"]),
    alias: z.string().min(1),
    center_name: z.string().nullable()
  }),
  updated_at: z.string()
});

export type SubmissionState = z.infer<typeof SubmissionStateSchema>;
export type SubmissionPhase = SubmissionState["phase"];

export async function readSubmissionState(statePath: string): Promise<SubmissionState> {
  let content: string;
  try {
    content = await fs.readFile(statePath, "utf8");
  } catch (error) {
    throw new MalformedStateError(statePath, error instanceof Error ? error.message : String(error));
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new MalformedStateError(statePath, `invalid JSON (${error instanceof Error ? error.message : "unknown error"})`);
  }

  const parsed = SubmissionStateSchema.safeParse(data);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
      .join("; ");
    throw new MalformedStateError(statePath, detail);
  }
  return parsed.data;
}

export async function writeSubmissionState(statePath: string, state: SubmissionState): Promise<void> {
  await writeJson(statePath, SubmissionStateSchema.parse(state));
}

export function requireAccession(state: SubmissionState, statePath: string): string {
  if (!state.accession) throw new MissingAccessionError(statePath);
  return state.accession;
}
