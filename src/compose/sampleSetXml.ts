import { VirtualSample } from "../types/sample";
import { el, renderXml, textEl, XmlElement } from "../xml/xmlDocument";

function attributeElement(tag: string, value: string, unit: string | null): XmlElement {
  const children = [textEl("TAG", tag), textEl("VALUE", value)];
  if (unit) children.push(textEl("UNITS", unit));
  return el("SAMPLE_ATTRIBUTE", {}, children);
}

export function sampleElement(sample: VirtualSample): XmlElement {
  return el("SAMPLE", { alias: sample.alias, center_name: sample.centerName }, [
    textEl("TITLE", sample.title),
    el("SAMPLE_NAME", {}, [
      textEl("TAXON_ID", sample.taxonId),
      textEl("SCIENTIFIC_NAME", sample.scientificName)
    ]),
    el(
      "SAMPLE_ATTRIBUTES",
      {},
      sample.attributes.map((attribute) => attributeElement(attribute.tag, attribute.value, attribute.unit))
    )
  ]);
}

export function renderSampleSetXml(samples: VirtualSample[]): string {
  return renderXml(el("SAMPLE_SET", {}, samples.map(sampleElement)));
}
