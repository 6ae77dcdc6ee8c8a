import { AttributeSet, CHECKLIST_TAG, SampleAttribute, VirtualSample } from "../types/sample";

export const MISSING_VALUE_SENTINEL = "missing: synthetic construct";

const TITLE_PREFIX =
  "This sample is a virtual sample of assembled raw reads from multiple physical " +
  "samples of genome and is composed of physical samples ";

export interface VirtualSampleInput {
  attributes: AttributeSet;
  checklist: string | null;
  mandatoryFields: readonly string[];
  alias?: string | null;
  centerName?: string | null;
  taxonId: string;
  scientificName: string;
  sourceAccessions: readonly string[];
}

export function defaultVirtualSampleAlias(sourceAccessions: readonly string[]): string {
  return ["virtual_sample", ...sourceAccessions].join("_");
}

export function describeSources(sourceAccessions: readonly string[]): string {
  return `${TITLE_PREFIX}${sourceAccessions.join(", ")}.`;
}

/** Inverse of describeSources; null when the text was not produced by it. */
export function parseSourceAccessions(title: string): string[] | null {
  if (!title.startsWith(TITLE_PREFIX) || !title.endsWith(".")) return null;
  const list = title.slice(TITLE_PREFIX.length, -1);
  return list ? list.split(", ") : [];
}

export function composeVirtualSample(input: VirtualSampleInput): VirtualSample {
  const attributes: SampleAttribute[] = [];

  if (input.checklist) {
    attributes.push({ tag: CHECKLIST_TAG, value: input.checklist, unit: null });
  }

  for (const [tag, { value, unit }] of input.attributes) {
    if (tag === CHECKLIST_TAG) continue;
    attributes.push({ tag, value, unit });
  }

  const present = new Set(attributes.map((attribute) => attribute.tag));
  for (const field of input.mandatoryFields) {
    if (present.has(field)) continue;
    attributes.push({ tag: field, value: MISSING_VALUE_SENTINEL, unit: null });
    present.add(field);
  }

  return {
    alias: input.alias || defaultVirtualSampleAlias(input.sourceAccessions),
    centerName: input.centerName || null,
    taxonId: input.taxonId,
    scientificName: input.scientificName,
    checklist: input.checklist,
    title: describeSources(input.sourceAccessions),
    attributes,
    sourceAccessions: [...input.sourceAccessions]
  };
}
