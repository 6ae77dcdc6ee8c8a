import path from "path";
import { runManifestPath } from "./paths";
import { writeJson } from "../utils/fs";
import { PipelineWarning } from "../types/checklist";
import { RunCommand, RunManifest, RunManifestChecklist, RunManifestError } from "../types/runManifest";

export interface RunManifestParams {
  command: RunCommand;
  runDir: string;
  startedAt: string;
  endedAt: string;
  inputs: string[];
  test?: boolean | null;
  checklist?: RunManifestChecklist | null;
  warnings?: PipelineWarning[];
  accession?: string | null;
  files?: string[];
  error?: RunManifestError | null;
}

export function buildRunManifest(params: RunManifestParams): RunManifest {
  const error = params.error ?? null;
  return {
    schema_version: "1.0",
    command: params.command,
    run_dir: params.runDir,
    started_at: params.startedAt,
    ended_at: params.endedAt,
    status: error ? "error" : "success",
    test: params.test ?? null,
    inputs: params.inputs,
    checklist: params.checklist ?? null,
    warnings: params.warnings ?? [],
    accession: params.accession ?? null,
    files: (params.files ?? []).map((file) => path.relative(params.runDir, file)),
    error
  };
}

/** Only the virtual-sample run owns run_manifest.json; the others write their own beside it. */
export function manifestFileFor(runDir: string, command: RunCommand): string {
  return command === "virtual-sample" ? runManifestPath(runDir) : path.join(runDir, `${command}_manifest.json`);
}

export async function writeRunManifest(manifest: RunManifest): Promise<string> {
  const filePath = manifestFileFor(manifest.run_dir, manifest.command);
  await writeJson(filePath, manifest);
  return filePath;
}
