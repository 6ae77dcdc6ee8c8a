import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runRelease } from "../src/commands/release";
import { runStudy } from "../src/commands/study";
import { runUmbrella } from "../src/commands/umbrella";
import { runVirtualSample, VirtualSampleOptions } from "../src/commands/virtualSample";
import {
  MissingAccessionError,
  MissingProjectInputError,
  OutputExistsError,
  SubmissionRejectedError,
  TaxonomyMismatchError
} from "../src/errors";
import { readSubmissionState } from "../src/submission/state";
import { readJson } from "../src/utils/fs";
import { FixtureChecklistSource, FixtureSampleSource, readFixture, RecordingTransport } from "./helpers/fakes";

let root: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "ena-run-"));
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(root, { recursive: true, force: true });
});

function options(overrides: Partial<VirtualSampleOptions> = {}): VirtualSampleOptions {
  return {
    sampleAccessions: ["ERS0000001", "ERS0000002"],
    outDir: path.join(root, "run"),
    submit: false,
    force: false,
    ...overrides
  };
}

function services(transport: RecordingTransport | null) {
  return { samples: new FixtureSampleSource(), checklists: new FixtureChecklistSource(), transport };
}

describe("runVirtualSample", () => {
  it("writes the documents, submits them and records the accession", async () => {
    const transport = new RecordingTransport([readFixture("receipts", "sample_success.xml")]);

    const outcome = await runVirtualSample(options(), services(transport));

    expect(outcome.accession).toBe("ERS0000099");
    expect(outcome.test).toBe(true);
    expect(transport.requests).toHaveLength(1);
    expect(transport.requests[0].test).toBe(true);
    expect(transport.requests[0].documents.map((document) => document.kind)).toEqual(["SUBMISSION", "SAMPLE"]);

    const runDir = outcome.runDir;
    expect(await fs.readFile(path.join(runDir, "sources", "ERS0000002.xml"), "utf8")).toBe(
      readFixture("samples", "ERS0000002.xml")
    );
    expect(await fs.readFile(path.join(runDir, "virtual_sample.xml"), "utf8")).toBe(
      transport.requests[0].documents[1].xml
    );

    const state = await readSubmissionState(path.join(runDir, "submission_state.json"));
    expect(state.phase).toBe("submitted");
    expect(state.accession).toBe("ERS0000099");
    expect(state.original_inputs).toEqual({
      sample_accessions: ["ERS0000001", "ERS0000002"],
      checklist: "ERC000053",
      checklist_source: "observed",
      alias: "virtual_sample_ERS0000001_ERS0000002",
      center_name: null
    });

    expect(await readJson(path.join(runDir, "run_manifest.json"))).toMatchObject({
      command: "virtual-sample",
      status: "success",
      test: true,
      accession: "ERS0000099",
      checklist: { accession: "ERC000053", source: "observed" },
      files: [
        path.join("sources", "ERS0000001.xml"),
        path.join("sources", "ERS0000002.xml"),
        "virtual_sample.xml",
        "submission.xml",
        "submission_response.xml",
        "submission_state.json"
      ],
      error: null
    });
  });

  it("keeps the accession of a sample that already exists", async () => {
    const transport = new RecordingTransport([readFixture("receipts", "sample_exists.xml")]);

    const outcome = await runVirtualSample(options(), services(transport));

    expect(outcome.accession).toBe("ERS0000077");
  });

  it("switches a production request to test when the checklist fell back", async () => {
    const transport = new RecordingTransport([readFixture("receipts", "sample_success.xml")]);

    const outcome = await runVirtualSample(
      options({ sampleAccessions: ["ERS0000001", "ERS0000004"], submit: true }),
      services(transport)
    );

    expect(outcome.build.warnings).toHaveLength(1);
    expect(outcome.test).toBe(true);
    expect(transport.requests[0].test).toBe(true);
  });

  it("submits to production when forced", async () => {
    const transport = new RecordingTransport([readFixture("receipts", "sample_success.xml")]);

    const outcome = await runVirtualSample(
      options({ sampleAccessions: ["ERS0000001", "ERS0000004"], submit: true, force: true }),
      services(transport)
    );

    expect(outcome.test).toBe(false);
  });

  it("refuses an existing output directory", async () => {
    await fs.mkdir(path.join(root, "run"));
    const transport = new RecordingTransport([]);

    await expect(runVirtualSample(options(), services(transport))).rejects.toBeInstanceOf(OutputExistsError);
    expect(transport.requests).toEqual([]);
  });

  it("sends nothing when the samples disagree on taxonomy and records the failure", async () => {
    const transport = new RecordingTransport([]);

    await expect(
      runVirtualSample(options({ sampleAccessions: ["ERS0000001", "ERS0000003"] }), services(transport))
    ).rejects.toBeInstanceOf(TaxonomyMismatchError);

    expect(transport.requests).toEqual([]);
    expect(await readJson(path.join(root, "run", "run_manifest.json"))).toMatchObject({
      status: "error",
      test: null,
      checklist: null,
      error: { message: "Scientific name mismatch for sample ERS0000003: Exempla altera vs Exempla fictiva" }
    });
  });

  it("writes the XML without state on a dry run", async () => {
    const outcome = await runVirtualSample(options(), services(null));

    expect(outcome.test).toBeNull();
    expect(outcome.accession).toBeNull();
    await expect(fs.access(path.join(outcome.runDir, "virtual_sample.xml"))).resolves.toBeUndefined();
    await expect(fs.access(path.join(outcome.runDir, "submission_state.json"))).rejects.toThrow();
  });
});

describe("runRelease", () => {
  async function submitted(receipt: string): Promise<string> {
    const outcome = await runVirtualSample(options(), services(new RecordingTransport([readFixture("receipts", receipt)])));
    return outcome.runDir;
  }

  it("releases the recorded accession once", async () => {
    const runDir = await submitted("sample_success.xml");
    const transport = new RecordingTransport([readFixture("receipts", "release_success.xml")]);

    const first = await runRelease({ outDir: runDir, submit: false }, transport);
    const second = await runRelease({ outDir: runDir, submit: false }, transport);

    expect(first).toEqual({ accession: "ERS0000099", released: true, test: true });
    expect(second).toEqual({ accession: "ERS0000099", released: false, test: null });
    expect(transport.requests).toHaveLength(1);
    expect(transport.requests[0].documents.map((document) => document.kind)).toEqual(["SUBMISSION", "SAMPLE"]);
    expect(transport.requests[0].documents[0].xml).toContain('<RELEASE target="ERS0000099"/>');
    expect((await readSubmissionState(path.join(runDir, "submission_state.json"))).phase).toBe("released");
    expect(await readJson(path.join(runDir, "release_manifest.json"))).toMatchObject({
      command: "release",
      status: "success",
      accession: "ERS0000099"
    });
  });

  it("fails before contacting the drop-box when no accession was recorded", async () => {
    const runDir = await submitted("sample_failed.xml");
    const transport = new RecordingTransport([]);

    await expect(runRelease({ outDir: runDir, submit: false }, transport)).rejects.toBeInstanceOf(
      MissingAccessionError
    );
    expect(transport.requests).toEqual([]);
  });

  it("keeps the state when the release is rejected", async () => {
    const runDir = await submitted("sample_success.xml");
    const transport = new RecordingTransport([readFixture("receipts", "sample_failed.xml")]);

    await expect(runRelease({ outDir: runDir, submit: false }, transport)).rejects.toThrow(
      new SubmissionRejectedError(["Invalid value for field collection date."])
    );
    expect((await readSubmissionState(path.join(runDir, "submission_state.json"))).phase).toBe("submitted");
  });
});

describe("project commands", () => {
  const common = {
    center: "TEST CENTER",
    tolid: "xxTestFict1",
    species: "Exempla fictiva",
    commonName: "Test moth",
    submit: false,
    release: false,
    date: "2026-01-12"
  };

  it("submits a sequencing study and keeps the register", async () => {
    const transport = new RecordingTransport([readFixture("receipts", "project_success.xml")]);
    const outDir = path.join(root, "projects");

    const outcome = await runStudy({ ...common, project: "ERGA-BGE", studyType: "sequencing", outDir }, transport);

    expect(outcome.accession).toBe("PRJEB00001");
    expect(transport.requests[0].documents.map((document) => document.kind)).toEqual(["SUBMISSION", "PROJECT"]);
    expect(await readJson(path.join(outDir, "study_register.json"))).toEqual({
      xxTestFict1: "erga-bge-xxTestFict1-study-rawdata-2026-01-12"
    });
    expect(await fs.readFile(path.join(outDir, "Exempla_fictiva.study.sequencing.receipt.xml"), "utf8")).toBe(
      readFixture("receipts", "project_success.xml")
    );
  });

  it("adds a hold date when the study is released", async () => {
    const outDir = path.join(root, "projects");

    await runStudy({ ...common, project: "other", studyType: "assembly", release: true, outDir }, null);

    expect(await fs.readFile(path.join(outDir, "Exempla_fictiva.study.assembly.submission.xml"), "utf8")).toContain(
      '<HOLD HoldUntilDate="2026-01-12"/>'
    );
    await expect(fs.access(path.join(outDir, "study_register.json"))).rejects.toThrow();
  });

  it("refuses to overwrite a study written earlier", async () => {
    const outDir = path.join(root, "projects");
    await runStudy({ ...common, project: "other", studyType: "assembly", outDir }, null);

    await expect(
      runStudy({ ...common, project: "other", studyType: "assembly", outDir }, null)
    ).rejects.toBeInstanceOf(OutputExistsError);
  });

  it("raises the receipt errors of a rejected umbrella", async () => {
    const transport = new RecordingTransport([readFixture("receipts", "project_failed.xml")]);
    const outDir = path.join(root, "projects");

    await expect(
      runUmbrella(
        { ...common, project: "ERGA-BGE", taxonId: "9999001", childAccessions: ["PRJEB00001"], outDir },
        transport
      )
    ).rejects.toThrow("Submission was rejected: The object being added already exists in the submission account.");
    expect(await readJson(path.join(outDir, "umbrella_manifest.json"))).toMatchObject({
      command: "umbrella",
      status: "error",
      test: true
    });
  });

  it("stops a pilot umbrella without a sample ambassador", async () => {
    const transport = new RecordingTransport([]);

    await expect(
      runUmbrella(
        {
          ...common,
          project: "ERGA-pilot",
          taxonId: "9999001",
          childAccessions: [],
          outDir: path.join(root, "projects")
        },
        transport
      )
    ).rejects.toBeInstanceOf(MissingProjectInputError);
    expect(transport.requests).toEqual([]);
  });
});
