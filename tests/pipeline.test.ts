import { describe, expect, it } from "vitest";
import { ChecklistResolver } from "../src/checklist/resolveChecklist";
import { SampleLookupError, TaxonomyMismatchError } from "../src/errors";
import { buildVirtualSample, decideTarget } from "../src/pipeline/virtualSamplePipeline";
import { SampleSource } from "../src/ena/browserApi";
import { PipelineWarning } from "../src/types/checklist";
import { FixtureChecklistSource, FixtureSampleSource } from "./helpers/fakes";

function deps() {
  const samples = new FixtureSampleSource();
  const checklistSource = new FixtureChecklistSource();
  return { samples, checklistSource, checklists: new ChecklistResolver(checklistSource) };
}

describe("buildVirtualSample", () => {
  it("merges two records under their shared checklist", async () => {
    const { samples, checklists, checklistSource } = deps();
    const fetched: string[] = [];

    const build = await buildVirtualSample(
      { sampleAccessions: ["ERS0000001", "ERS0000002"] },
      { samples, checklists, onSampleFetched: ({ sample }) => void fetched.push(sample.accession) }
    );

    expect(fetched).toEqual(["ERS0000001", "ERS0000002"]);
    expect(checklistSource.requested).toEqual(["ERC000053"]);
    expect(build.selection).toEqual({ checklist: "ERC000053", source: "observed", warning: null });
    expect(build.warnings).toEqual([]);
    expect(build.virtualSample.alias).toBe("virtual_sample_ERS0000001_ERS0000002");
    expect(build.virtualSample.attributes).toEqual([
      { tag: "ENA-CHECKLIST", value: "ERC000053", unit: null },
      { tag: "collection date", value: "2024-05-02", unit: null },
      { tag: "geographic location (latitude)", value: "41.38", unit: "DD" },
      { tag: "geographic location (country and/or sea)", value: "Spain", unit: null },
      { tag: "sex", value: "female", unit: null },
      { tag: "organism part", value: "missing: synthetic construct", unit: null },
      { tag: "lifestage", value: "missing: synthetic construct", unit: null }
    ]);
  });

  it("falls back to the default checklist with a warning on disagreement", async () => {
    const { samples, checklists, checklistSource } = deps();

    const build = await buildVirtualSample({ sampleAccessions: ["ERS0000001", "ERS0000004"] }, { samples, checklists });

    expect(checklistSource.requested).toEqual(["ERC000011"]);
    expect(build.warnings.map((warning) => warning.code)).toEqual(["CHECKLIST_FALLBACK"]);
    expect(build.virtualSample.attributes.map((attribute) => attribute.tag)).toEqual([
      "ENA-CHECKLIST",
      "collection date",
      "sex",
      "geographic location (country and/or sea)"
    ]);
  });

  it("uses an override without a warning", async () => {
    const { samples, checklists } = deps();

    const build = await buildVirtualSample(
      { sampleAccessions: ["ERS0000001", "ERS0000004"], checklistOverride: "ERC000053", alias: "pooled" },
      { samples, checklists }
    );

    expect(build.selection.source).toBe("override");
    expect(build.warnings).toEqual([]);
    expect(build.virtualSample.alias).toBe("pooled");
  });

  it("stops on a taxonomy mismatch before resolving a checklist", async () => {
    const { samples, checklists, checklistSource } = deps();

    await expect(
      buildVirtualSample({ sampleAccessions: ["ERS0000001", "ERS0000003"] }, { samples, checklists })
    ).rejects.toBeInstanceOf(TaxonomyMismatchError);
    expect(checklistSource.requested).toEqual([]);
  });

  it("wraps a failed lookup with the accession", async () => {
    const failing: SampleSource = {
      fetchSample: async () => {
        throw new Error("HTTP 404");
      }
    };
    const { checklists } = deps();

    const run = buildVirtualSample({ sampleAccessions: ["ERS404"] }, { samples: failing, checklists });

    await expect(run).rejects.toBeInstanceOf(SampleLookupError);
    await expect(run).rejects.toThrow("Failed to load sample ERS404: HTTP 404");
  });
});

describe("decideTarget", () => {
  const warning: PipelineWarning = { code: "CHECKLIST_FALLBACK", message: "fallback" };

  it("stays on the test server unless production is requested", () => {
    expect(decideTarget({ production: false, force: true, warnings: [warning] })).toEqual({
      test: true,
      downgraded: false
    });
  });

  it("downgrades a production request with warnings", () => {
    expect(decideTarget({ production: true, force: false, warnings: [warning] })).toEqual({
      test: true,
      downgraded: true
    });
  });

  it("goes to production when clean or forced", () => {
    expect(decideTarget({ production: true, force: false, warnings: [] })).toEqual({ test: false, downgraded: false });
    expect(decideTarget({ production: true, force: true, warnings: [warning] })).toEqual({
      test: false,
      downgraded: false
    });
  });
});
