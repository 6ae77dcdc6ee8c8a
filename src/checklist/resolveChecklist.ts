import { ChecklistSource } from "../ena/browserApi";
import { UnknownChecklistError } from "../errors";
import { ChecklistSpec } from "../types/checklist";

/**
 * Resolves checklist accessions through a ChecklistSource. Each instance keeps its own
 * cache and is meant to live for a single run.
 */
export class ChecklistResolver {
  private cache = new Map<string, ChecklistSpec>();

  constructor(private source: ChecklistSource) {}

  async resolve(accession: string): Promise<ChecklistSpec> {
    const cached = this.cache.get(accession);
    if (cached) return cached;

    let spec: ChecklistSpec;
    try {
      spec = await this.source.fetchChecklist(accession);
    } catch (error) {
      throw new UnknownChecklistError(accession, error);
    }
    this.cache.set(accession, spec);
    return spec;
  }
}
