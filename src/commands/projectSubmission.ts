import path from "path";
import { OutputExistsError, SubmissionRejectedError } from "../errors";
import { extractProjectAccession, interpretReceipt } from "../submission/receipt";
import { buildAddSubmissionXml } from "../submission/submissionXml";
import { credentialsFromEnv, DropBoxTransport, SubmissionTransport } from "../submission/transport";
import { pathExists, writeText } from "../utils/fs";

export interface ProjectSubmissionParams {
  runDir: string;
  /** Base name for the project XML, e.g. "Homo_sapiens.study.assembly". */
  baseName: string;
  projectXml: string;
  test: boolean;
  holdUntil: string | null;
  transport: SubmissionTransport | null;
}

export interface ProjectSubmissionResult {
  accession: string | null;
  files: string[];
}

export function defaultProjectTransport(dryRun: boolean): SubmissionTransport | null {
  if (dryRun) return null;
  return new DropBoxTransport({
    credentials: credentialsFromEnv(),
    productionUrl: process.env.ENA_SUBMIT_URL,
    testUrl: process.env.ENA_SUBMIT_TEST_URL
  });
}

export async function assertFreshFile(filePath: string): Promise<void> {
  if (await pathExists(filePath)) throw new OutputExistsError(filePath);
}

export async function writeAndSubmitProject(params: ProjectSubmissionParams): Promise<ProjectSubmissionResult> {
  const projectPath = path.join(params.runDir, `${params.baseName}.xml`);
  const submissionPath = path.join(params.runDir, `${params.baseName}.submission.xml`);
  const submissionXml = buildAddSubmissionXml({ holdUntil: params.holdUntil });

  await writeText(projectPath, params.projectXml);
  await writeText(submissionPath, submissionXml);
  const files = [projectPath, submissionPath];

  if (!params.transport) {
    console.log(`Wrote ${projectPath}`);
    return { accession: null, files };
  }

  console.log(`Submitting ${path.basename(projectPath)} to the ${params.test ? "test" : "production"} server`);
  const raw = await params.transport.submit({
    test: params.test,
    documents: [
      { kind: "SUBMISSION", fileName: "submission.xml", xml: submissionXml },
      { kind: "PROJECT", fileName: path.basename(projectPath), xml: params.projectXml }
    ]
  });

  const receiptPath = path.join(params.runDir, `${params.baseName}.receipt.xml`);
  await writeText(receiptPath, raw);
  files.push(receiptPath);

  const receipt = interpretReceipt(raw);
  if (receipt.success === false) {
    throw new SubmissionRejectedError(
      receipt.messages.filter((message) => message.level === "error").map((message) => message.text)
    );
  }

  const accession = extractProjectAccession(raw);
  if (accession) console.log(accession);
  console.log(params.test ? "Test submission was successful" : "Submission was successful");
  return { accession, files };
}
