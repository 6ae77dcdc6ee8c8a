export const CHECKLIST_TAG = "ENA-CHECKLIST";

export interface AttributeValue {
  value: string;
  unit: string | null;
}

/** Tag -> value, in document order. */
export type AttributeSet = ReadonlyMap<string, AttributeValue>;

export interface SourceSample {
  accession: string;
  taxonId: string;
  scientificName: string;
  attributes: AttributeSet;
}

export interface SampleAttribute {
  tag: string;
  value: string;
  unit: string | null;
}

export interface VirtualSample {
  alias: string;
  centerName: string | null;
  taxonId: string;
  scientificName: string;
  checklist: string | null;
  title: string;
  attributes: SampleAttribute[];
  sourceAccessions: string[];
}
