import { underscored } from "../utils/text";
import { el, renderXml, textEl, XmlElement } from "../xml/xmlDocument";
import { ProjectProfile } from "./registry";
import { renderString, TemplateRenderer, TemplateVars } from "./templates";

export type StudyType = "assembly" | "sequencing";

export const NO_LOCUS_TAG = "-";

/** ToLID -> alias of its sequencing-data study, filled while studies are built. */
export type StudyRegister = Map<string, string>;

export interface StudyInput {
  project: ProjectProfile;
  center: string;
  tolid: string;
  species: string;
  commonName?: string | null;
  sampleCoordinator?: string | null;
  studyType: StudyType;
  locusTag?: string | null;
  /** YYYY-MM-DD used in date-stamped aliases. */
  date: string;
}

export interface StudyProject {
  alias: string;
  name: string;
  title: string;
  description: string;
  studyType: StudyType;
  locusTag: string | null;
}

export function projectVars(input: {
  species: string;
  tolid: string;
  commonName?: string | null;
  date: string;
}): TemplateVars {
  return {
    species: input.species,
    tolid: input.tolid,
    cname: input.commonName,
    cname_underscored: input.commonName ? underscored(input.commonName) : null,
    date: input.date
  };
}

export function keywordAttributes(project: ProjectProfile): XmlElement[] {
  if (!project.keyword) return [];
  return [
    el("PROJECT_ATTRIBUTES", {}, [
      el("PROJECT_ATTRIBUTE", {}, [textEl("TAG", "Keyword"), textEl("VALUE", project.id)])
    ])
  ];
}

export async function buildStudyProject(
  input: StudyInput,
  templates: TemplateRenderer,
  register: StudyRegister
): Promise<StudyProject> {
  const profile = input.project.study[input.studyType];
  const vars: TemplateVars = {
    ...projectVars(input),
    sample_coordinator: input.sampleCoordinator,
    data: input.studyType
  };

  const alias = renderString(profile.alias, vars, `${input.project.id} ${input.studyType} alias`);
  const title = await templates.render(profile.title, vars);
  const description = await templates.render(profile.description, vars);

  if (input.studyType === "sequencing") {
    register.set(input.tolid, alias);
  }

  const locusTag =
    input.studyType === "assembly" && input.locusTag && input.locusTag !== NO_LOCUS_TAG
      ? input.locusTag
      : null;

  return { alias, name: input.tolid, title, description, studyType: input.studyType, locusTag };
}

export function studyProjectElement(study: StudyProject, project: ProjectProfile, center: string): XmlElement {
  const sequencing = el(
    "SEQUENCING_PROJECT",
    {},
    study.locusTag ? [textEl("LOCUS_TAG_PREFIX", study.locusTag)] : []
  );
  return el("PROJECT", { center_name: center, alias: study.alias }, [
    textEl("NAME", study.name),
    textEl("TITLE", study.title),
    textEl("DESCRIPTION", study.description),
    el("SUBMISSION_PROJECT", {}, [sequencing]),
    ...keywordAttributes(project)
  ]);
}

export function renderStudyProjectSet(studies: StudyProject[], project: ProjectProfile, center: string): string {
  return renderXml(
    el(
      "PROJECT_SET",
      {},
      studies.map((study) => studyProjectElement(study, project, center))
    )
  );
}
