import path from "path";

export function projectRoot(): string {
  return path.resolve(__dirname, "..", "..");
}

export function templatesDir(): string {
  return path.join(projectRoot(), "templates");
}

export function defaultProjectRegistryPath(): string {
  return path.join(projectRoot(), "config", "projects.json");
}

export function schemasDir(): string {
  return path.join(projectRoot(), "schemas");
}

export function sourceSamplePath(runDir: string, accession: string): string {
  return path.join(runDir, "sources", `${accession}.xml`);
}

export function virtualSamplePath(runDir: string): string {
  return path.join(runDir, "virtual_sample.xml");
}

export function submissionPath(runDir: string): string {
  return path.join(runDir, "submission.xml");
}

export function releasePath(runDir: string): string {
  return path.join(runDir, "release.xml");
}

export function responsePath(runDir: string): string {
  return path.join(runDir, "submission_response.xml");
}

export function releaseResponsePath(runDir: string): string {
  return path.join(runDir, "release_response.xml");
}

export function submissionStatePath(runDir: string): string {
  return path.join(runDir, "submission_state.json");
}

export function runManifestPath(runDir: string): string {
  return path.join(runDir, "run_manifest.json");
}
