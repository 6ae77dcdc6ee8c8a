import { z } from "zod";
import { UnknownProjectError } from "../errors";
import { readJson } from "../utils/fs";

const StudyProfileSchema = z.object({
  alias: z.string().min(1),
  title: z.string().min(1),
  description: z.string().min(1)
});

const ProjectProfileSchema = z.object({
  id: z.string().min(1),
  keyword: z.boolean(),
  study: z.object({
    assembly: StudyProfileSchema,
    sequencing: StudyProfileSchema
  }),
  umbrella: z.object({
    alias: z.string().min(1),
    description: z.string().min(1),
    requires_sample_ambassador: z.boolean()
  })
});

export const ProjectRegistrySchema = z.object({
  version: z.string(),
  projects: z.array(ProjectProfileSchema).min(1)
});

export type ProjectRegistry = z.infer<typeof ProjectRegistrySchema>;
export type ProjectProfile = z.infer<typeof ProjectProfileSchema>;
export type StudyProfile = z.infer<typeof StudyProfileSchema>;

export async function loadProjectRegistry(registryPath: string): Promise<ProjectRegistry> {
  const data = await readJson(registryPath);
  return ProjectRegistrySchema.parse(data);
}

export function getProject(registry: ProjectRegistry, projectId: string): ProjectProfile {
  const project = registry.projects.find((candidate) => candidate.id === projectId);
  if (!project) {
    throw new UnknownProjectError(
      projectId,
      registry.projects.map((candidate) => candidate.id)
    );
  }
  return project;
}
