export type EnaSubmitErrorCode =
  | "UNKNOWN_CHECKLIST"
  | "TAXONOMY_MISMATCH"
  | "EMPTY_SAMPLE_SET"
  | "SAMPLE_LOOKUP_FAILED"
  | "MISSING_ACCESSION"
  | "MALFORMED_STATE"
  | "MISSING_CREDENTIALS"
  | "TRANSPORT_FAILED"
  | "SUBMISSION_REJECTED"
  | "OUTPUT_EXISTS"
  | "UNKNOWN_PROJECT"
  | "MISSING_PROJECT_INPUT"
  | "TEMPLATE_FAILED";

export class EnaSubmitError extends Error {
  readonly code: EnaSubmitErrorCode;

  constructor(code: EnaSubmitErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnknownChecklistError extends EnaSubmitError {
  constructor(readonly checklist: string, cause?: unknown) {
    const reason = cause instanceof Error ? ` => ${cause.message}` : "";
    super("UNKNOWN_CHECKLIST", `Unknown ENA checklist ${checklist}${reason}`, { cause });
  }
}

export type TaxonomyField = "taxon_id" | "scientific_name";

export class TaxonomyMismatchError extends EnaSubmitError {
  constructor(
    readonly accession: string,
    readonly field: TaxonomyField,
    readonly found: string,
    readonly expected: string
  ) {
    const label = field === "taxon_id" ? "Taxon ID" : "Scientific name";
    super("TAXONOMY_MISMATCH", `${label} mismatch for sample ${accession}: ${found} vs ${expected}`);
  }
}

export class EmptySampleSetError extends EnaSubmitError {
  constructor() {
    super("EMPTY_SAMPLE_SET", "At least one source sample is required to build a virtual sample");
  }
}

export class SampleLookupError extends EnaSubmitError {
  constructor(readonly accession: string, message: string, cause?: unknown) {
    super("SAMPLE_LOOKUP_FAILED", `Failed to load sample ${accession}: ${message}`, { cause });
  }
}

export class MissingAccessionError extends EnaSubmitError {
  constructor(statePath: string) {
    super("MISSING_ACCESSION", `No sample accession recorded in ${statePath}; nothing to release`);
  }
}

export class MalformedStateError extends EnaSubmitError {
  constructor(statePath: string, detail: string) {
    super("MALFORMED_STATE", `Submission state ${statePath} is unreadable: ${detail}`);
  }
}

export class MissingCredentialsError extends EnaSubmitError {
  constructor(variable: string) {
    super("MISSING_CREDENTIALS", `${variable} is not set in the environment.`);
  }
}

export class TransportError extends EnaSubmitError {
  constructor(readonly status: number | null, message: string, cause?: unknown) {
    super("TRANSPORT_FAILED", message, { cause });
  }
}

export class SubmissionRejectedError extends EnaSubmitError {
  constructor(readonly errors: string[]) {
    const detail = errors.length ? errors.join("; ") : "no error message in receipt";
    super("SUBMISSION_REJECTED", `Submission was rejected: ${detail}`);
  }
}

export class OutputExistsError extends EnaSubmitError {
  constructor(outDir: string) {
    super(
      "OUTPUT_EXISTS",
      `Output directory '${outDir}' already exists. Please specify a new directory.`
    );
  }
}

export class UnknownProjectError extends EnaSubmitError {
  constructor(project: string, known: string[]) {
    super("UNKNOWN_PROJECT", `Unknown project ${project} (expected one of: ${known.join(", ")})`);
  }
}

export class MissingProjectInputError extends EnaSubmitError {
  constructor(project: string, input: string) {
    super("MISSING_PROJECT_INPUT", `Required ${input} details for ${project} projects`);
  }
}

export class TemplateError extends EnaSubmitError {
  constructor(template: string, message: string, cause?: unknown) {
    super("TEMPLATE_FAILED", `Template ${template}: ${message}`, { cause });
  }
}

export function describeError(error: unknown): { message: string; stack?: string } {
  return {
    message: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined
  };
}
