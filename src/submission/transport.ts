import { MissingCredentialsError, TransportError } from "../errors";

export const PRODUCTION_SUBMIT_URL = "https://www.ebi.ac.uk/ena/submit/drop-box/submit/";
export const TEST_SUBMIT_URL = "https://wwwdev.ebi.ac.uk/ena/submit/drop-box/submit/";

/** Form field name as the drop-box expects it, e.g. SUBMISSION, SAMPLE, PROJECT. */
export type DocumentKind = "SUBMISSION" | "SAMPLE" | "PROJECT";

export interface SubmissionDocument {
  kind: DocumentKind;
  fileName: string;
  xml: string;
}

export interface SubmissionRequest {
  documents: SubmissionDocument[];
  test: boolean;
}

export interface SubmissionTransport {
  submit(request: SubmissionRequest): Promise<string>;
}

export interface WebinCredentials {
  username: string;
  password: string;
}

export interface DropBoxConfig {
  credentials: WebinCredentials;
  productionUrl?: string;
  testUrl?: string;
  fetchImpl?: typeof fetch;
}

export function credentialsFromEnv(env: NodeJS.ProcessEnv = process.env): WebinCredentials {
  const username = env.ENA_WEBIN_USER;
  if (!username) throw new MissingCredentialsError("ENA_WEBIN_USER");
  const password = env.ENA_WEBIN_PASSWORD;
  if (!password) throw new MissingCredentialsError("ENA_WEBIN_PASSWORD");
  return { username, password };
}

/** Multipart upload to the Webin drop-box, one form field per document. */
export class DropBoxTransport implements SubmissionTransport {
  private credentials: WebinCredentials;
  private productionUrl: string;
  private testUrl: string;
  private fetchImpl: typeof fetch;

  constructor(config: DropBoxConfig) {
    this.credentials = config.credentials;
    this.productionUrl = config.productionUrl ?? PRODUCTION_SUBMIT_URL;
    this.testUrl = config.testUrl ?? TEST_SUBMIT_URL;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  targetUrl(test: boolean): string {
    return test ? this.testUrl : this.productionUrl;
  }

  async submit(request: SubmissionRequest): Promise<string> {
    const form = new FormData();
    for (const document of request.documents) {
      form.append(document.kind, new Blob([document.xml], { type: "application/xml" }), document.fileName);
    }

    const auth = Buffer.from(`${this.credentials.username}:${this.credentials.password}`).toString("base64");
    let response: Response;
    try {
      response = await this.fetchImpl(this.targetUrl(request.test), {
        method: "POST",
        headers: { Authorization: `Basic ${auth}` },
        body: form
      });
    } catch (error) {
      throw new TransportError(null, `Drop-box request failed: ${error instanceof Error ? error.message : String(error)}`, error);
    }

    const text = await response.text();
    // Rejected submissions still come back as a RECEIPT worth keeping.
    if (!response.ok && !text.includes("<RECEIPT")) {
      throw new TransportError(response.status, `Drop-box request failed (${response.status}): ${text}`);
    }
    return text;
  }
}
