import { ChecklistSelectionSource, PipelineWarning } from "./checklist";

export type RunCommand = "virtual-sample" | "release" | "study" | "umbrella";

export interface RunManifestError {
  message: string;
  stack?: string;
}

export interface RunManifestChecklist {
  accession: string;
  name: string;
  source: ChecklistSelectionSource;
  mandatory_fields: string[];
}

export interface RunManifest {
  schema_version: "1.0";
  command: RunCommand;
  run_dir: string;
  started_at: string;
  ended_at: string;
  status: "success" | "error";
  /** Null when nothing was sent to the drop-box. */
  test: boolean | null;
  inputs: string[];
  checklist: RunManifestChecklist | null;
  warnings: PipelineWarning[];
  accession: string | null;
  files: string[];
  error: RunManifestError | null;
}
