import path from "path";
import { describeError } from "../errors";
import { defaultProjectRegistryPath, templatesDir } from "../io/paths";
import { buildRunManifest, writeRunManifest } from "../io/runManifest";
import { getProject, loadProjectRegistry } from "../projects/registry";
import { TemplateRenderer } from "../projects/templates";
import { buildUmbrellaProject, renderUmbrellaProjectSet, UmbrellaProject } from "../projects/umbrellaProject";
import { SubmissionTransport } from "../submission/transport";
import { RunManifestError } from "../types/runManifest";
import { ensureDir } from "../utils/fs";
import { nowUtcIsoSeconds, utcDate } from "../utils/time";
import { assertFreshFile, defaultProjectTransport, writeAndSubmitProject } from "./projectSubmission";

export interface UmbrellaOptions {
  project: string;
  center: string;
  tolid: string;
  species: string;
  taxonId: string;
  commonName?: string;
  sampleAmbassador?: string;
  childAccessions: string[];
  outDir: string;
  submit: boolean;
  release: boolean;
  registryPath?: string;
  templatesDir?: string;
  dryRun?: boolean;
  date?: string;
}

export interface UmbrellaOutcome {
  umbrella: UmbrellaProject;
  accession: string | null;
}

export async function runUmbrella(
  options: UmbrellaOptions,
  transport: SubmissionTransport | null = defaultProjectTransport(Boolean(options.dryRun))
): Promise<UmbrellaOutcome> {
  const runDir = path.resolve(options.outDir);
  const baseName = `${options.species.replace(/ /g, "_")}.umbrella`;
  await assertFreshFile(path.join(runDir, `${baseName}.xml`));
  await ensureDir(runDir);

  const startedAt = nowUtcIsoSeconds();
  const test = !options.submit;
  let files: string[] = [];
  let accession: string | null = null;
  let failure: RunManifestError | null = null;

  try {
    const registry = await loadProjectRegistry(options.registryPath ?? defaultProjectRegistryPath());
    const project = getProject(registry, options.project);
    const date = options.date ?? utcDate();

    const umbrella = await buildUmbrellaProject(
      {
        project,
        center: options.center,
        tolid: options.tolid,
        species: options.species,
        taxonId: options.taxonId,
        commonName: options.commonName,
        sampleAmbassador: options.sampleAmbassador,
        childAccessions: options.childAccessions,
        date
      },
      new TemplateRenderer(options.templatesDir ?? templatesDir())
    );

    const result = await writeAndSubmitProject({
      runDir,
      baseName,
      projectXml: renderUmbrellaProjectSet(umbrella, project, options.center),
      test,
      holdUntil: options.release ? date : null,
      transport
    });
    files = result.files;
    accession = result.accession;
    return { umbrella, accession };
  } catch (error) {
    failure = describeError(error);
    throw error;
  } finally {
    await writeRunManifest(
      buildRunManifest({
        command: "umbrella",
        runDir,
        startedAt,
        endedAt: nowUtcIsoSeconds(),
        inputs: [options.project, options.tolid, options.species, ...options.childAccessions],
        test: transport ? test : null,
        accession,
        files,
        error: failure
      })
    );
  }
}
