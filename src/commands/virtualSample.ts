import path from "path";
import { ChecklistResolver } from "../checklist/resolveChecklist";
import { renderSampleSetXml } from "../compose/sampleSetXml";
import { ChecklistSource, EnaBrowserClient, SampleSource } from "../ena/browserApi";
import { describeError, OutputExistsError } from "../errors";
import {
  responsePath,
  sourceSamplePath,
  submissionPath,
  submissionStatePath,
  virtualSamplePath
} from "../io/paths";
import { buildRunManifest, writeRunManifest } from "../io/runManifest";
import { buildVirtualSample, decideTarget, VirtualSampleBuild } from "../pipeline/virtualSamplePipeline";
import { interpretReceipt } from "../submission/receipt";
import { writeSubmissionState } from "../submission/state";
import { buildAddSubmissionXml } from "../submission/submissionXml";
import { credentialsFromEnv, DropBoxTransport, SubmissionTransport } from "../submission/transport";
import { PipelineWarning } from "../types/checklist";
import { RunManifestError } from "../types/runManifest";
import { ensureDir, pathExists, writeText } from "../utils/fs";
import { nowUtcIsoSeconds } from "../utils/time";

export interface VirtualSampleOptions {
  sampleAccessions: string[];
  outDir: string;
  /** Submit to the production drop-box instead of the test one. */
  submit: boolean;
  force: boolean;
  checklist?: string;
  alias?: string;
  center?: string;
  /** Write the XML documents but do not contact the drop-box. */
  dryRun?: boolean;
}

export interface VirtualSampleServices {
  samples: SampleSource;
  checklists: ChecklistSource;
  transport: SubmissionTransport | null;
}

export interface VirtualSampleOutcome {
  runDir: string;
  build: VirtualSampleBuild;
  test: boolean | null;
  accession: string | null;
}

export function defaultVirtualSampleServices(dryRun: boolean): VirtualSampleServices {
  const browser = new EnaBrowserClient({ baseUrl: process.env.ENA_BROWSER_API_URL });
  return {
    samples: browser,
    checklists: browser,
    transport: dryRun
      ? null
      : new DropBoxTransport({
          credentials: credentialsFromEnv(),
          productionUrl: process.env.ENA_SUBMIT_URL,
          testUrl: process.env.ENA_SUBMIT_TEST_URL
        })
  };
}

function logWarnings(warnings: PipelineWarning[]): void {
  for (const warning of warnings) {
    console.warn(warning.message);
  }
}

export async function runVirtualSample(
  options: VirtualSampleOptions,
  services: VirtualSampleServices = defaultVirtualSampleServices(Boolean(options.dryRun))
): Promise<VirtualSampleOutcome> {
  const runDir = path.resolve(options.outDir);
  if (await pathExists(runDir)) {
    throw new OutputExistsError(runDir);
  }
  await ensureDir(runDir);

  const startedAt = nowUtcIsoSeconds();
  const files: string[] = [];
  let build: VirtualSampleBuild | null = null;
  let test: boolean | null = null;
  let accession: string | null = null;
  let failure: RunManifestError | null = null;

  try {
    build = await buildVirtualSample(
      {
        sampleAccessions: options.sampleAccessions,
        checklistOverride: options.checklist,
        alias: options.alias,
        centerName: options.center
      },
      {
        samples: services.samples,
        checklists: new ChecklistResolver(services.checklists),
        onSampleFetched: async ({ sample, xml }) => {
          console.log(`Downloaded XML for sample ${sample.accession}`);
          const filePath = sourceSamplePath(runDir, sample.accession);
          await writeText(filePath, xml);
          files.push(filePath);
        }
      }
    );

    console.log(`Using checklist ${build.checklist.accession} (${build.checklist.name}, ${build.selection.source})`);
    logWarnings(build.warnings);

    const target = decideTarget({ production: options.submit, force: options.force, warnings: build.warnings });
    if (target.downgraded) {
      console.warn("Warnings detected, switching to test mode.");
    }

    const sampleXml = renderSampleSetXml([build.virtualSample]);
    const submissionXml = buildAddSubmissionXml();
    await writeText(virtualSamplePath(runDir), sampleXml);
    await writeText(submissionPath(runDir), submissionXml);
    files.push(virtualSamplePath(runDir), submissionPath(runDir));

    if (services.transport) {
      test = target.test;
      console.log(`Submitting virtual sample ${build.virtualSample.alias} to the ${test ? "test" : "production"} server`);
      const raw = await services.transport.submit({
        test,
        documents: [
          { kind: "SUBMISSION", fileName: "submission.xml", xml: submissionXml },
          { kind: "SAMPLE", fileName: "virtual_sample.xml", xml: sampleXml }
        ]
      });
      await writeText(responsePath(runDir), raw);
      files.push(responsePath(runDir));

      const receipt = interpretReceipt(raw);
      accession = receipt.accession;
      if (accession && receipt.success === false) {
        console.log(`Sample already exists with accession: ${accession}`);
      } else if (accession) {
        console.log(`Sample submitted with accession: ${accession}`);
      } else {
        console.warn("No sample accession found in response");
        for (const message of receipt.messages.filter((item) => item.level === "error")) {
          console.warn(`  ${message.text}`);
        }
      }

      await writeSubmissionState(submissionStatePath(runDir), {
        schema_version: "1.0",
        phase: "submitted",
        accession,
        test,
        original_inputs: {
          sample_accessions: options.sampleAccessions,
          checklist: build.selection.checklist,
          checklist_source: build.selection.source,
          alias: build.virtualSample.alias,
          center_name: build.virtualSample.centerName
        },
        updated_at: nowUtcIsoSeconds()
      });
      files.push(submissionStatePath(runDir));
    }

    return { runDir, build, test, accession };
  } catch (error) {
    failure = describeError(error);
    throw error;
  } finally {
    await writeRunManifest(
      buildRunManifest({
        command: "virtual-sample",
        runDir,
        startedAt,
        endedAt: nowUtcIsoSeconds(),
        inputs: options.sampleAccessions,
        test,
        checklist: build
          ? {
              accession: build.checklist.accession,
              name: build.checklist.name,
              source: build.selection.source,
              mandatory_fields: build.checklist.mandatoryFields
            }
          : null,
        warnings: build?.warnings ?? [],
        accession,
        files,
        error: failure
      })
    );
  }
}
