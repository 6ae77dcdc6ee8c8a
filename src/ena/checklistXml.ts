import { ChecklistSpec } from "../types/checklist";
import { childText, loadXml } from "../xml/xmlDocument";

export class ChecklistXmlError extends Error {}

export function parseChecklistXml(xml: string, accession: string): ChecklistSpec {
  const $ = loadXml(xml);
  const descriptor = $("DESCRIPTOR").first();
  if (!descriptor.length) {
    throw new ChecklistXmlError(`No DESCRIPTOR element in checklist ${accession}`);
  }

  const spec: ChecklistSpec = {
    accession,
    name: childText(descriptor, "NAME") ?? accession,
    mandatoryFields: [],
    recommendedFields: [],
    fieldUnits: {}
  };

  descriptor.find("FIELD").each((_, node) => {
    const field = $(node);
    const name = childText(field, "NAME");
    if (!name) return;

    const units = field.children("UNITS").first();
    if (units.length) {
      spec.fieldUnits[name] = childText(units, "UNIT");
    }

    const obligation = childText(field, "MANDATORY");
    if (obligation === "mandatory") {
      spec.mandatoryFields.push(name);
    } else if (obligation === "recommended") {
      spec.recommendedFields.push(name);
    }
  });

  return spec;
}
