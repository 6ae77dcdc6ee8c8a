import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runVirtualSample } from "../src/commands/virtualSample";
import { runValidate, validateRun } from "../src/commands/validate";
import { FixtureChecklistSource, FixtureSampleSource, readFixture, RecordingTransport } from "./helpers/fakes";

let root: string;
let runDir: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "ena-validate-"));
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  const outcome = await runVirtualSample(
    { sampleAccessions: ["ERS0000001", "ERS0000002"], outDir: path.join(root, "run"), submit: false, force: false },
    {
      samples: new FixtureSampleSource(),
      checklists: new FixtureChecklistSource(),
      transport: new RecordingTransport([readFixture("receipts", "sample_success.xml")])
    }
  );
  runDir = outcome.runDir;
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(root, { recursive: true, force: true });
});

async function rewrite(fileName: string, edit: (content: string) => string): Promise<void> {
  const filePath = path.join(runDir, fileName);
  await fs.writeFile(filePath, edit(await fs.readFile(filePath, "utf8")), "utf8");
}

describe("validateRun", () => {
  it("accepts a fresh run", async () => {
    const report = await validateRun({ runDir });

    expect(report.checked).toEqual(["run_manifest.json", "submission_state.json", "virtual_sample.xml"]);
    expect(report.problems).toEqual([]);
  });

  it("flags a mandatory field missing from the sample", async () => {
    await rewrite("virtual_sample.xml", (xml) => xml.replace("<TAG>lifestage</TAG>", "<TAG>life stage</TAG>"));

    expect((await validateRun({ runDir })).problems).toEqual(["virtual_sample.xml: mandatory field lifestage is missing"]);
  });

  it("flags a title that disagrees with the submitted inputs", async () => {
    await rewrite("virtual_sample.xml", (xml) => xml.replace("ERS0000001, ERS0000002.", "ERS0000002, ERS0000001."));

    expect((await validateRun({ runDir })).problems).toEqual([
      "virtual_sample.xml: TITLE lists ERS0000002, ERS0000001 but the submission used ERS0000001, ERS0000002"
    ]);
  });

  it("reports manifest schema violations", async () => {
    await rewrite("run_manifest.json", (json) => json.replace('"status": "success"', '"status": "done"'));

    const report = await validateRun({ runDir });

    expect(report.problems).toEqual(["run_manifest.json: /status must be equal to one of the allowed values"]);
  });

  it("reports an unreadable state file", async () => {
    await rewrite("submission_state.json", () => "{");

    const report = await validateRun({ runDir });

    expect(report.problems).toHaveLength(1);
    expect(report.problems[0]).toMatch(/invalid JSON/);
  });
});

describe("runValidate", () => {
  it("throws with the number of problems", async () => {
    await rewrite("virtual_sample.xml", (xml) => xml.replace("<TAG>sex</TAG>", "<TAG>gender</TAG>"));

    await expect(runValidate({ runDir })).rejects.toThrow(`1 problem(s) found in ${runDir}`);
  });

  it("fails on a directory without run files", async () => {
    const empty = path.join(root, "empty");
    await fs.mkdir(empty);

    await expect(runValidate({ runDir: empty })).rejects.toThrow(`Nothing to validate in ${empty}`);
  });
});
