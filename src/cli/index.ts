#!/usr/bin/env node
import path from "path";
import { readFileSync } from "fs";
import dotenv from "dotenv";
import { Command, Option } from "commander";
import { projectRoot } from "../io/paths";
import { runVirtualSample } from "../commands/virtualSample";
import { runRelease } from "../commands/release";
import { runStudy } from "../commands/study";
import { runUmbrella } from "../commands/umbrella";
import { runValidate } from "../commands/validate";
import { DEFAULT_CHECKLIST } from "../checklist/selectChecklist";

const PROJECTS = ["ERGA-BGE", "CBP", "ERGA-pilot", "EASI", "ATLASea", "other"];

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.ENA_SUBMIT_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function packageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(path.join(projectRoot(), "package.json"), "utf8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("ena-submit")
  .description("Build ENA sample and project XML and submit it to the Webin drop-box")
  .version(packageVersion());

program.option(
  "--env-file <path>",
  "Path to .env file (overrides ENA_SUBMIT_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("virtual-sample")
  .description("Merge the shared metadata of several samples into one virtual sample and submit it")
  .argument("<accessions...>", "Source sample accessions, in the order their metadata should win")
  .requiredOption("--out <dir>", "Output directory for XML files (must not exist)")
  .option("--submit", "Submit to the production server instead of the test server", false)
  .option(
    "--checklist <accession>",
    `Checklist for the virtual sample; overrides the one shared by the inputs (fallback ${DEFAULT_CHECKLIST})`
  )
  .option("--alias <alias>", "Alias for the virtual sample")
  .option("--center <name>", "Center name for the virtual sample")
  .option("--force", "Submit to production despite warnings", false)
  .option("--dry-run", "Write the XML files without contacting the drop-box", false)
  .action(async (accessions: string[], opts) => {
    await runVirtualSample({
      sampleAccessions: accessions,
      outDir: opts.out,
      submit: opts.submit,
      force: opts.force,
      checklist: opts.checklist,
      alias: opts.alias,
      center: opts.center,
      dryRun: opts.dryRun
    });
  });

program
  .command("release")
  .description("Release a virtual sample submitted by an earlier virtual-sample run")
  .requiredOption("--out <dir>", "Output directory of the virtual-sample run")
  .option("--submit", "Release on the production server instead of the test server", false)
  .action(async (opts) => {
    await runRelease({ outDir: opts.out, submit: opts.submit });
  });

program
  .command("study")
  .description("Build and submit a study project")
  .addOption(new Option("-p, --project <project>", "Project").choices(PROJECTS).default("ERGA-BGE"))
  .requiredOption("-c, --center <name>", "Center name")
  .option("-n, --name <name>", "Species common name")
  .option("--sample-ambassador <name>", "Sample ambassador (ERGA-pilot projects)")
  .requiredOption("-t, --tolid <tolid>", "ToLID")
  .requiredOption("-s, --species <name>", "Species scientific name")
  .option("-l, --locus-tag <prefix>", "Locus tag prefix to register ('-' for none)", "-")
  .addOption(
    new Option("--study-type <type>", "Study type").choices(["assembly", "sequencing"]).makeOptionMandatory()
  )
  .requiredOption("--out <dir>", "Output directory for XML files")
  .option("--submit", "Submit to the production server instead of the test server", false)
  .option("--release", "Make the study public today", false)
  .option("--registry <path>", "Path to projects.json")
  .option("--dry-run", "Write the XML files without contacting the drop-box", false)
  .action(async (opts) => {
    await runStudy({
      project: opts.project,
      center: opts.center,
      tolid: opts.tolid,
      species: opts.species,
      commonName: opts.name,
      sampleAmbassador: opts.sampleAmbassador,
      studyType: opts.studyType,
      locusTag: opts.locusTag,
      outDir: opts.out,
      submit: opts.submit,
      release: opts.release,
      registryPath: opts.registry,
      dryRun: opts.dryRun
    });
  });

program
  .command("umbrella")
  .description("Build and submit an umbrella project grouping existing studies")
  .addOption(new Option("-p, --project <project>", "Project").choices(PROJECTS).default("ERGA-BGE"))
  .requiredOption("-c, --center <name>", "Center name")
  .option("-n, --name <name>", "Species common name")
  .option("--sample-ambassador <name>", "Sample ambassador (ERGA-pilot projects)")
  .requiredOption("-t, --tolid <tolid>", "ToLID")
  .requiredOption("-s, --species <name>", "Species scientific name")
  .requiredOption("-x, --taxon-id <id>", "Species taxon id")
  .requiredOption("-a, --children-accessions <accession...>", "Child project accessions")
  .requiredOption("--out <dir>", "Output directory for XML files")
  .option("--submit", "Submit to the production server instead of the test server", false)
  .option("--release", "Make the umbrella project public today", false)
  .option("--registry <path>", "Path to projects.json")
  .option("--dry-run", "Write the XML files without contacting the drop-box", false)
  .action(async (opts) => {
    await runUmbrella({
      project: opts.project,
      center: opts.center,
      tolid: opts.tolid,
      species: opts.species,
      taxonId: opts.taxonId,
      commonName: opts.name,
      sampleAmbassador: opts.sampleAmbassador,
      childAccessions: opts.childrenAccessions,
      outDir: opts.out,
      submit: opts.submit,
      release: opts.release,
      registryPath: opts.registry,
      dryRun: opts.dryRun
    });
  });

program
  .command("validate")
  .requiredOption("--run <path>", "Run directory to validate")
  .action(async (opts) => {
    await runValidate({ runDir: opts.run });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
