import path from "path";
import Ajv, { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { schemasDir } from "../io/paths";
import { readText } from "../utils/fs";

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

const validatorCache = new Map<string, ValidateFunction>();

export function runManifestSchemaPath(): string {
  return path.join(schemasDir(), "run_manifest.schema.json");
}

export async function loadJsonSchema(schemaPath: string): Promise<object> {
  const content = await readText(schemaPath);
  if (!content.trim()) {
    throw new Error(`Schema file is empty: ${schemaPath}`);
  }
  const schema: unknown = JSON.parse(content);
  if (typeof schema !== "object" || schema === null) {
    throw new Error(`Schema file is not a JSON object: ${schemaPath}`);
  }
  return schema;
}

export async function getSchemaValidator(schemaPath: string): Promise<ValidateFunction> {
  const cached = validatorCache.get(schemaPath);
  if (cached) return cached;
  const schema = await loadJsonSchema(schemaPath);
  const validator = ajv.compile(schema);
  validatorCache.set(schemaPath, validator);
  return validator;
}

export function schemaErrors(validator: ValidateFunction, data: unknown): string[] {
  if (validator(data)) return [];
  return (validator.errors ?? []).map((error) => `${error.instancePath || "<root>"} ${error.message ?? "is invalid"}`);
}
