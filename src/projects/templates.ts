import path from "path";
import { TemplateError } from "../errors";
import { readText } from "../utils/fs";

export type TemplateVars = Record<string, string | null | undefined>;

const PLACEHOLDER = /\{\{\s*(\w+)\s*\}\}/g;

/** Replaces `{{ name }}` placeholders; a placeholder without a value is an error. */
export function renderString(template: string, vars: TemplateVars, label = "<inline>"): string {
  return template.replace(PLACEHOLDER, (_, name: string) => {
    const value = vars[name];
    if (value === null || value === undefined) {
      throw new TemplateError(label, `no value for {{ ${name} }}`);
    }
    return value;
  });
}

export class TemplateRenderer {
  private cache = new Map<string, string>();

  constructor(private dir: string) {}

  async render(name: string, vars: TemplateVars): Promise<string> {
    return renderString(await this.load(name), vars, name);
  }

  private async load(name: string): Promise<string> {
    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;
    let content: string;
    try {
      content = await readText(path.join(this.dir, name));
    } catch (error) {
      throw new TemplateError(name, "cannot read template file", error);
    }
    // A single trailing newline belongs to the file, not the text.
    content = content.replace(/\r?\n$/, "");
    this.cache.set(name, content);
    return content;
  }
}
