import { MissingProjectInputError } from "../errors";
import { el, renderXml, textEl } from "../xml/xmlDocument";
import { ProjectProfile } from "./registry";
import { keywordAttributes, projectVars } from "./studyProject";
import { renderString, TemplateRenderer } from "./templates";

export interface UmbrellaInput {
  project: ProjectProfile;
  center: string;
  tolid: string;
  species: string;
  taxonId: string;
  commonName?: string | null;
  sampleAmbassador?: string | null;
  childAccessions: string[];
  date: string;
}

export interface UmbrellaProject {
  alias: string;
  name: string;
  title: string;
  description: string;
  taxonId: string;
  scientificName: string;
  childAccessions: string[];
}

export async function buildUmbrellaProject(
  input: UmbrellaInput,
  templates: TemplateRenderer
): Promise<UmbrellaProject> {
  const profile = input.project.umbrella;
  if (profile.requires_sample_ambassador && !input.sampleAmbassador) {
    throw new MissingProjectInputError(input.project.id, "sample ambassador");
  }

  const vars = projectVars(input);
  const alias = renderString(profile.alias, vars, `${input.project.id} umbrella alias`);
  const description = await templates.render(profile.description, {
    ...vars,
    alias,
    sample_ambassador: input.sampleAmbassador
  });

  return {
    alias,
    name: input.tolid,
    title: input.species,
    description,
    taxonId: input.taxonId,
    scientificName: input.species,
    childAccessions: [...input.childAccessions]
  };
}

export function renderUmbrellaProjectSet(
  umbrella: UmbrellaProject,
  project: ProjectProfile,
  center: string
): string {
  const related = umbrella.childAccessions.length
    ? [
        el(
          "RELATED_PROJECTS",
          {},
          umbrella.childAccessions.map((accession) =>
            el("RELATED_PROJECT", {}, [el("CHILD_PROJECT", { accession })])
          )
        )
      ]
    : [];

  return renderXml(
    el("PROJECT_SET", {}, [
      el("PROJECT", { center_name: center, alias: umbrella.alias }, [
        textEl("NAME", umbrella.name),
        textEl("TITLE", umbrella.title),
        textEl("DESCRIPTION", umbrella.description),
        el("UMBRELLA_PROJECT", {}, [
          el("ORGANISM", {}, [
            textEl("TAXON_ID", umbrella.taxonId),
            textEl("SCIENTIFIC_NAME", umbrella.scientificName)
          ])
        ]),
        ...related,
        ...keywordAttributes(project)
      ])
    ])
  );
}
