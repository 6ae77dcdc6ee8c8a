export * from "./errors";
export * from "./types/sample";
export * from "./types/checklist";
export * from "./types/receipt";
export { ChecklistResolver } from "./checklist/resolveChecklist";
export { DEFAULT_CHECKLIST, selectChecklist } from "./checklist/selectChecklist";
export { reconcileSamples, type Reconciliation } from "./reconcile/reconcileSamples";
export {
  composeVirtualSample,
  defaultVirtualSampleAlias,
  describeSources,
  MISSING_VALUE_SENTINEL,
  parseSourceAccessions
} from "./compose/virtualSample";
export { renderSampleSetXml } from "./compose/sampleSetXml";
export { EnaBrowserClient, type ChecklistSource, type SampleSource } from "./ena/browserApi";
export { parseSampleXml } from "./ena/sampleXml";
export { parseChecklistXml } from "./ena/checklistXml";
export { buildVirtualSample, decideTarget } from "./pipeline/virtualSamplePipeline";
export { extractAccession, extractProjectAccession, interpretReceipt } from "./submission/receipt";
export { buildAddSubmissionXml, buildReleaseSubmissionXml } from "./submission/submissionXml";
export { DropBoxTransport, type SubmissionTransport } from "./submission/transport";
export { readSubmissionState, type SubmissionState } from "./submission/state";
