import { EmptySampleSetError, TaxonomyMismatchError } from "../errors";
import { AttributeSet, AttributeValue, CHECKLIST_TAG, SourceSample } from "../types/sample";

export interface Reconciliation {
  taxonId: string;
  scientificName: string;
  /** Tags shared by every sample with the same value and unit, minus the checklist tag. */
  attributes: AttributeSet;
  /** Distinct non-empty checklist tag values, first-seen order. */
  observedChecklists: string[];
  sourceAccessions: string[];
}

function sameValue(a: AttributeValue, b: AttributeValue | undefined): boolean {
  return b !== undefined && a.value === b.value && a.unit === b.unit;
}

function commonEntry(tag: string, samples: SourceSample[]): AttributeValue | null {
  const [first, ...rest] = samples;
  const candidate = first.attributes.get(tag);
  if (!candidate) return null;
  return rest.every((sample) => sameValue(candidate, sample.attributes.get(tag))) ? candidate : null;
}

function assertSameTaxonomy(samples: SourceSample[]): void {
  const [first, ...rest] = samples;
  for (const sample of rest) {
    if (sample.taxonId !== first.taxonId) {
      throw new TaxonomyMismatchError(sample.accession, "taxon_id", sample.taxonId, first.taxonId);
    }
    if (sample.scientificName !== first.scientificName) {
      throw new TaxonomyMismatchError(
        sample.accession,
        "scientific_name",
        sample.scientificName,
        first.scientificName
      );
    }
  }
}

export function reconcileSamples(samples: SourceSample[]): Reconciliation {
  if (samples.length === 0) {
    throw new EmptySampleSetError();
  }
  assertSameTaxonomy(samples);

  const attributes = new Map<string, AttributeValue>();
  for (const tag of samples[0].attributes.keys()) {
    if (tag === CHECKLIST_TAG) continue;
    const common = commonEntry(tag, samples);
    if (common) attributes.set(tag, common);
  }

  const observedChecklists: string[] = [];
  for (const sample of samples) {
    const value = sample.attributes.get(CHECKLIST_TAG)?.value;
    if (value && !observedChecklists.includes(value)) observedChecklists.push(value);
  }

  return {
    taxonId: samples[0].taxonId,
    scientificName: samples[0].scientificName,
    attributes,
    observedChecklists,
    sourceAccessions: samples.map((sample) => sample.accession)
  };
}
