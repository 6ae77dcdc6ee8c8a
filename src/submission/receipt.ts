import { ReceiptMessage, SubmissionReceipt } from "../types/receipt";
import { loadXml } from "../xml/xmlDocument";

// The error-shaped form is how the drop-box reports a sample that was already
// registered under the same alias. Its wording is not documented; match loosely.
const SUCCESS_SAMPLE_ACCESSION = /<SAMPLE\b[^>]*?\baccession="(ERS\d+)"/;
const ERROR_SAMPLE_ACCESSION = /accession: "(ERS\d+)"/;

export function extractAccession(raw: string): string | null {
  const success = SUCCESS_SAMPLE_ACCESSION.exec(raw);
  if (success) return success[1];
  const existing = ERROR_SAMPLE_ACCESSION.exec(raw);
  if (existing) return existing[1];
  return null;
}

export function extractProjectAccession(raw: string): string | null {
  const $ = loadXml(raw);
  return $("RECEIPT > PROJECT").first().attr("accession") ?? null;
}

function readReceiptDocument(raw: string): Pick<SubmissionReceipt, "success" | "messages"> {
  const $ = loadXml(raw);
  const receipt = $("RECEIPT").first();
  if (!receipt.length) return { success: null, messages: [] };

  const flag = receipt.attr("success");
  const messages: ReceiptMessage[] = [];
  receipt.find("MESSAGES > ERROR, MESSAGES > INFO").each((_, node) => {
    const item = $(node);
    const level = item.is("ERROR") ? "error" : "info";
    messages.push({ level, text: item.text().trim() });
  });

  return {
    success: flag === "true" ? true : flag === "false" ? false : null,
    messages
  };
}

export function interpretReceipt(raw: string): SubmissionReceipt {
  return {
    raw,
    accession: extractAccession(raw),
    ...readReceiptDocument(raw)
  };
}
