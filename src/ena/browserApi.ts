import { ChecklistSpec } from "../types/checklist";
import { SourceSample } from "../types/sample";
import { parseChecklistXml } from "./checklistXml";
import { parseSampleXml } from "./sampleXml";

export const DEFAULT_BROWSER_API_URL = "https://www.ebi.ac.uk/ena/browser/api";

export interface FetchedSample {
  sample: SourceSample;
  xml: string;
}

/** Resolves a sample accession to its parsed record plus the raw XML it came from. */
export interface SampleSource {
  fetchSample(accession: string): Promise<FetchedSample>;
}

export interface ChecklistSource {
  fetchChecklist(accession: string): Promise<ChecklistSpec>;
}

export interface BrowserApiConfig {
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

export class EnaBrowserClient implements SampleSource, ChecklistSource {
  private baseUrl: string;
  private fetchImpl: typeof fetch;

  constructor(config: BrowserApiConfig = {}) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BROWSER_API_URL).replace(/\/+$/, "");
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async fetchSample(accession: string): Promise<FetchedSample> {
    const params = new URLSearchParams({ download: "true", includeLinks: "false" });
    const xml = await this.getXml(`${this.baseUrl}/xml/${encodeURIComponent(accession)}?${params.toString()}`);
    return { sample: parseSampleXml(xml, accession), xml };
  }

  async fetchChecklist(accession: string): Promise<ChecklistSpec> {
    const xml = await this.getXml(`${this.baseUrl}/xml/${encodeURIComponent(accession)}`);
    return parseChecklistXml(xml, accession);
  }

  private async getXml(url: string): Promise<string> {
    const res = await this.fetchImpl(url);
    const text = await res.text();
    if (!res.ok) {
      throw new Error(`ENA browser request failed: ${res.status} ${res.statusText} - ${text}`);
    }
    return text;
  }
}
