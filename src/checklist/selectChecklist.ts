import { ChecklistSelection } from "../types/checklist";

export const DEFAULT_CHECKLIST = "ERC000011";

export interface ChecklistSelectionInput {
  override?: string | null;
  observed: readonly string[];
}

export function selectChecklist(input: ChecklistSelectionInput): ChecklistSelection {
  const override = input.override?.trim();
  if (override) {
    return { checklist: override, source: "override", warning: null };
  }

  const distinct = [...new Set(input.observed)];
  if (distinct.length === 1) {
    return { checklist: distinct[0], source: "observed", warning: null };
  }

  const reason =
    distinct.length === 0
      ? "no checklist found in input samples"
      : `inconsistent checklists in input samples (${distinct.join(", ")})`;
  return {
    checklist: DEFAULT_CHECKLIST,
    source: "default",
    warning: {
      code: "CHECKLIST_FALLBACK",
      message: `Using default checklist ${DEFAULT_CHECKLIST}: ${reason}.`
    }
  };
}
