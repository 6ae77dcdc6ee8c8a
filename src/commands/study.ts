import path from "path";
import { describeError } from "../errors";
import { defaultProjectRegistryPath, templatesDir } from "../io/paths";
import { buildRunManifest, writeRunManifest } from "../io/runManifest";
import { getProject, loadProjectRegistry } from "../projects/registry";
import {
  buildStudyProject,
  NO_LOCUS_TAG,
  renderStudyProjectSet,
  StudyProject,
  StudyRegister,
  StudyType
} from "../projects/studyProject";
import { TemplateRenderer } from "../projects/templates";
import { SubmissionTransport } from "../submission/transport";
import { RunManifestError } from "../types/runManifest";
import { ensureDir, writeJson } from "../utils/fs";
import { nowUtcIsoSeconds, utcDate } from "../utils/time";
import { assertFreshFile, defaultProjectTransport, writeAndSubmitProject } from "./projectSubmission";

export interface StudyOptions {
  project: string;
  center: string;
  tolid: string;
  species: string;
  commonName?: string;
  sampleAmbassador?: string;
  studyType: StudyType;
  locusTag?: string;
  outDir: string;
  submit: boolean;
  /** Make the study public today rather than holding it. */
  release: boolean;
  registryPath?: string;
  templatesDir?: string;
  dryRun?: boolean;
  date?: string;
}

export interface StudyOutcome {
  study: StudyProject;
  register: StudyRegister;
  accession: string | null;
}

export async function runStudy(
  options: StudyOptions,
  transport: SubmissionTransport | null = defaultProjectTransport(Boolean(options.dryRun))
): Promise<StudyOutcome> {
  const runDir = path.resolve(options.outDir);
  const baseName = `${options.species.replace(/ /g, "_")}.study.${options.studyType}`;
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
    const templates = new TemplateRenderer(options.templatesDir ?? templatesDir());
    const register: StudyRegister = new Map();
    const date = options.date ?? utcDate();

    const study = await buildStudyProject(
      {
        project,
        center: options.center,
        tolid: options.tolid,
        species: options.species,
        commonName: options.commonName,
        sampleCoordinator: options.sampleAmbassador,
        studyType: options.studyType,
        locusTag: options.locusTag ?? NO_LOCUS_TAG,
        date
      },
      templates,
      register
    );

    const result = await writeAndSubmitProject({
      runDir,
      baseName,
      projectXml: renderStudyProjectSet([study], project, options.center),
      test,
      holdUntil: options.release ? date : null,
      transport
    });
    files = result.files;
    accession = result.accession;

    if (register.size) {
      const registerPath = path.join(runDir, "study_register.json");
      await writeJson(registerPath, Object.fromEntries(register));
      files.push(registerPath);
    }

    return { study, register, accession };
  } catch (error) {
    failure = describeError(error);
    throw error;
  } finally {
    await writeRunManifest(
      buildRunManifest({
        command: "study",
        runDir,
        startedAt,
        endedAt: nowUtcIsoSeconds(),
        inputs: [options.project, options.tolid, options.species, options.studyType],
        test: transport ? test : null,
        accession,
        files,
        error: failure
      })
    );
  }
}
