import path from "path";
import { describeError, SubmissionRejectedError } from "../errors";
import {
  releasePath,
  releaseResponsePath,
  submissionStatePath,
  virtualSamplePath
} from "../io/paths";
import { buildRunManifest, writeRunManifest } from "../io/runManifest";
import { interpretReceipt } from "../submission/receipt";
import { readSubmissionState, requireAccession, writeSubmissionState } from "../submission/state";
import { buildReleaseSubmissionXml } from "../submission/submissionXml";
import { credentialsFromEnv, DropBoxTransport, SubmissionDocument, SubmissionTransport } from "../submission/transport";
import { RunManifestError } from "../types/runManifest";
import { pathExists, readText, writeText } from "../utils/fs";
import { nowUtcIsoSeconds } from "../utils/time";

export interface ReleaseOptions {
  outDir: string;
  submit: boolean;
}

export interface ReleaseOutcome {
  accession: string;
  released: boolean;
  test: boolean | null;
}

export function defaultReleaseTransport(): SubmissionTransport {
  return new DropBoxTransport({
    credentials: credentialsFromEnv(),
    productionUrl: process.env.ENA_SUBMIT_URL,
    testUrl: process.env.ENA_SUBMIT_TEST_URL
  });
}

/**
 * Second phase of a virtual sample submission: reads the state left by the submit run and
 * asks the drop-box to release the recorded accession. Replaying it after a successful
 * release does nothing.
 */
export async function runRelease(
  options: ReleaseOptions,
  transport: SubmissionTransport = defaultReleaseTransport()
): Promise<ReleaseOutcome> {
  const runDir = path.resolve(options.outDir);
  const statePath = submissionStatePath(runDir);
  const state = await readSubmissionState(statePath);
  const accession = requireAccession(state, statePath);

  if (state.phase === "released") {
    console.log(`Sample ${accession} was already released; nothing to do.`);
    return { accession, released: false, test: null };
  }

  const test = !options.submit;
  if (test !== state.test) {
    console.warn(
      `Sample ${accession} was submitted to the ${state.test ? "test" : "production"} server; ` +
        `releasing on the ${test ? "test" : "production"} server.`
    );
  }

  const startedAt = nowUtcIsoSeconds();
  const files: string[] = [];
  let failure: RunManifestError | null = null;

  try {
    const releaseXml = buildReleaseSubmissionXml(accession);
    await writeText(releasePath(runDir), releaseXml);
    files.push(releasePath(runDir));

    const documents: SubmissionDocument[] = [{ kind: "SUBMISSION" as const, fileName: "release.xml", xml: releaseXml }];
    if (await pathExists(virtualSamplePath(runDir))) {
      documents.push({
        kind: "SAMPLE" as const,
        fileName: "virtual_sample.xml",
        xml: await readText(virtualSamplePath(runDir))
      });
    }

    console.log(`Releasing sample ${accession} on the ${test ? "test" : "production"} server`);
    const raw = await transport.submit({ test, documents });
    await writeText(releaseResponsePath(runDir), raw);
    files.push(releaseResponsePath(runDir));

    const receipt = interpretReceipt(raw);
    if (receipt.success === false) {
      throw new SubmissionRejectedError(
        receipt.messages.filter((message) => message.level === "error").map((message) => message.text)
      );
    }

    await writeSubmissionState(statePath, { ...state, phase: "released", updated_at: nowUtcIsoSeconds() });
    console.log(`Sample ${accession} released`);
    return { accession, released: true, test };
  } catch (error) {
    failure = describeError(error);
    throw error;
  } finally {
    await writeRunManifest(
      buildRunManifest({
        command: "release",
        runDir,
        startedAt,
        endedAt: nowUtcIsoSeconds(),
        inputs: [accession],
        test,
        accession,
        files,
        error: failure
      })
    );
  }
}
