import { AttributeValue, SourceSample } from "../types/sample";
import { childText, loadXml } from "../xml/xmlDocument";

export class SampleXmlError extends Error {}

/**
 * Reads the first SAMPLE of a browser-API sample document. Attribute order follows the
 * document; an empty or absent VALUE reads as "", an empty or absent UNITS as null.
 */
export function parseSampleXml(xml: string, accession: string): SourceSample {
  const $ = loadXml(xml);
  const sample = $("SAMPLE").first();
  if (!sample.length) {
    throw new SampleXmlError(`No SAMPLE element in record for ${accession}`);
  }

  const sampleName = sample.children("SAMPLE_NAME").first();
  const taxonId = childText(sampleName, "TAXON_ID");
  const scientificName = childText(sampleName, "SCIENTIFIC_NAME");
  if (!taxonId || !scientificName) {
    throw new SampleXmlError(`SAMPLE_NAME of ${accession} lacks TAXON_ID or SCIENTIFIC_NAME`);
  }

  const attributes = new Map<string, AttributeValue>();
  sample
    .children("SAMPLE_ATTRIBUTES")
    .children("SAMPLE_ATTRIBUTE")
    .each((_, node) => {
      const attribute = $(node);
      const tag = childText(attribute, "TAG");
      if (!tag) return;
      attributes.set(tag, {
        value: childText(attribute, "VALUE") ?? "",
        unit: childText(attribute, "UNITS") || null
      });
    });

  return {
    accession,
    taxonId,
    scientificName,
    attributes
  };
}
