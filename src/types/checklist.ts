export interface ChecklistSpec {
  accession: string;
  name: string;
  mandatoryFields: string[];
  recommendedFields: string[];
  /** Only fields that declare a UNITS block; null when the block names no unit. */
  fieldUnits: Record<string, string | null>;
}

export type ChecklistSelectionSource = "override" | "observed" | "default";

export interface PipelineWarning {
  code: "CHECKLIST_FALLBACK";
  message: string;
}

export interface ChecklistSelection {
  checklist: string;
  source: ChecklistSelectionSource;
  warning: PipelineWarning | null;
}
