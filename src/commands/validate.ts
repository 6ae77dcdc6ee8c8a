import path from "path";
import { parseSourceAccessions } from "../compose/virtualSample";
import { manifestFileFor } from "../io/runManifest";
import { submissionStatePath, virtualSamplePath } from "../io/paths";
import { readSubmissionState, SubmissionState } from "../submission/state";
import { RunCommand } from "../types/runManifest";
import { pathExists, readJson, readText } from "../utils/fs";
import { getSchemaValidator, runManifestSchemaPath, schemaErrors } from "../validation/jsonSchema";
import { loadXml } from "../xml/xmlDocument";

export interface ValidateOptions {
  runDir: string;
}

export interface ValidationReport {
  runDir: string;
  checked: string[];
  problems: string[];
}

const COMMANDS: RunCommand[] = ["virtual-sample", "release", "study", "umbrella"];

interface ManifestFacts {
  mandatoryFields: string[];
}

async function checkManifests(runDir: string, report: ValidationReport): Promise<ManifestFacts> {
  const validator = await getSchemaValidator(runManifestSchemaPath());
  const facts: ManifestFacts = { mandatoryFields: [] };

  for (const command of COMMANDS) {
    const filePath = manifestFileFor(runDir, command);
    if (!(await pathExists(filePath))) continue;
    report.checked.push(path.basename(filePath));

    const manifest = await readJson(filePath);
    const errors = schemaErrors(validator, manifest);
    report.problems.push(...errors.map((error) => `${path.basename(filePath)}: ${error}`));

    if (command === "virtual-sample" && errors.length === 0) {
      facts.mandatoryFields = mandatoryFieldsOf(manifest);
    }
  }
  return facts;
}

function mandatoryFieldsOf(manifest: unknown): string[] {
  if (typeof manifest !== "object" || manifest === null || !("checklist" in manifest)) return [];
  const checklist = manifest.checklist;
  if (typeof checklist !== "object" || checklist === null || !("mandatory_fields" in checklist)) return [];
  const fields = checklist.mandatory_fields;
  return Array.isArray(fields) ? fields.filter((field): field is string => typeof field === "string") : [];
}

function checkVirtualSample(
  xml: string,
  facts: ManifestFacts,
  state: SubmissionState | null,
  report: ValidationReport
): void {
  const $ = loadXml(xml);
  const sample = $("SAMPLE_SET > SAMPLE").first();
  if (!sample.length) {
    report.problems.push("virtual_sample.xml: no SAMPLE element");
    return;
  }

  const tags = new Set(
    sample
      .find("SAMPLE_ATTRIBUTES > SAMPLE_ATTRIBUTE > TAG")
      .toArray()
      .map((node) => $(node).text().trim())
  );
  for (const field of facts.mandatoryFields) {
    if (!tags.has(field)) report.problems.push(`virtual_sample.xml: mandatory field ${field} is missing`);
  }

  const sources = parseSourceAccessions(sample.children("TITLE").text().trim());
  if (!sources) {
    report.problems.push("virtual_sample.xml: TITLE does not list the source samples");
  } else if (state && sources.join(",") !== state.original_inputs.sample_accessions.join(",")) {
    report.problems.push(
      `virtual_sample.xml: TITLE lists ${sources.join(", ")} but the submission used ` +
        state.original_inputs.sample_accessions.join(", ")
    );
  }
}

export async function validateRun(options: ValidateOptions): Promise<ValidationReport> {
  const runDir = path.resolve(options.runDir);
  const report: ValidationReport = { runDir, checked: [], problems: [] };
  if (!(await pathExists(runDir))) {
    throw new Error(`Run directory not found: ${runDir}`);
  }

  const facts = await checkManifests(runDir, report);

  let state: SubmissionState | null = null;
  if (await pathExists(submissionStatePath(runDir))) {
    report.checked.push("submission_state.json");
    try {
      state = await readSubmissionState(submissionStatePath(runDir));
    } catch (error) {
      report.problems.push(error instanceof Error ? error.message : String(error));
    }
  }

  if (await pathExists(virtualSamplePath(runDir))) {
    report.checked.push("virtual_sample.xml");
    checkVirtualSample(await readText(virtualSamplePath(runDir)), facts, state, report);
  }

  return report;
}

export async function runValidate(options: ValidateOptions): Promise<void> {
  const report = await validateRun(options);
  if (!report.checked.length) {
    throw new Error(`Nothing to validate in ${report.runDir}`);
  }
  for (const problem of report.problems) {
    console.error(problem);
  }
  if (report.problems.length) {
    throw new Error(`${report.problems.length} problem(s) found in ${report.runDir}`);
  }
  console.log(`OK: ${report.checked.join(", ")}`);
}
