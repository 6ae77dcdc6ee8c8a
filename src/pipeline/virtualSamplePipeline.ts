import { ChecklistResolver } from "../checklist/resolveChecklist";
import { selectChecklist } from "../checklist/selectChecklist";
import { composeVirtualSample } from "../compose/virtualSample";
import { FetchedSample, SampleSource } from "../ena/browserApi";
import { EnaSubmitError, SampleLookupError } from "../errors";
import { reconcileSamples, Reconciliation } from "../reconcile/reconcileSamples";
import { ChecklistSelection, ChecklistSpec, PipelineWarning } from "../types/checklist";
import { VirtualSample } from "../types/sample";

export interface VirtualSampleRequest {
  sampleAccessions: string[];
  checklistOverride?: string | null;
  alias?: string | null;
  centerName?: string | null;
}

export interface VirtualSampleDependencies {
  samples: SampleSource;
  checklists: ChecklistResolver;
  /** Called after each source record is fetched, in input order. */
  onSampleFetched?: (fetched: FetchedSample) => Promise<void> | void;
}

export interface VirtualSampleBuild {
  sources: FetchedSample[];
  reconciliation: Reconciliation;
  selection: ChecklistSelection;
  checklist: ChecklistSpec;
  virtualSample: VirtualSample;
  warnings: PipelineWarning[];
}

async function fetchSources(
  accessions: string[],
  deps: VirtualSampleDependencies
): Promise<FetchedSample[]> {
  const fetched: FetchedSample[] = [];
  // One at a time: the first record's taxonomy and attribute order win.
  for (const accession of accessions) {
    let result: FetchedSample;
    try {
      result = await deps.samples.fetchSample(accession);
    } catch (error) {
      if (error instanceof EnaSubmitError) throw error;
      throw new SampleLookupError(accession, error instanceof Error ? error.message : String(error), error);
    }
    await deps.onSampleFetched?.(result);
    fetched.push(result);
  }
  return fetched;
}

export async function buildVirtualSample(
  request: VirtualSampleRequest,
  deps: VirtualSampleDependencies
): Promise<VirtualSampleBuild> {
  const sources = await fetchSources(request.sampleAccessions, deps);
  const reconciliation = reconcileSamples(sources.map((source) => source.sample));

  const selection = selectChecklist({
    override: request.checklistOverride,
    observed: reconciliation.observedChecklists
  });
  const checklist = await deps.checklists.resolve(selection.checklist);

  const virtualSample = composeVirtualSample({
    attributes: reconciliation.attributes,
    checklist: selection.checklist,
    mandatoryFields: checklist.mandatoryFields,
    alias: request.alias,
    centerName: request.centerName,
    taxonId: reconciliation.taxonId,
    scientificName: reconciliation.scientificName,
    sourceAccessions: reconciliation.sourceAccessions
  });

  return {
    sources,
    reconciliation,
    selection,
    checklist,
    virtualSample,
    warnings: selection.warning ? [selection.warning] : []
  };
}

export interface TargetDecision {
  test: boolean;
  downgraded: boolean;
}

/**
 * Production is used only when asked for, and only when the build raised no warnings
 * or the operator forced it.
 */
export function decideTarget(options: {
  production: boolean;
  force: boolean;
  warnings: readonly PipelineWarning[];
}): TargetDecision {
  if (!options.production) return { test: true, downgraded: false };
  if (options.warnings.length > 0 && !options.force) return { test: true, downgraded: true };
  return { test: false, downgraded: false };
}
