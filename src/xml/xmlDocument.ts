import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
const INDENT = "  ";

export interface XmlElement {
  name: string;
  attributes?: Record<string, string | null | undefined>;
  text?: string | null;
  children?: XmlElement[];
}

export function el(
  name: string,
  attributes: XmlElement["attributes"] = {},
  children: XmlElement[] = []
): XmlElement {
  return { name, attributes, children };
}

export function textEl(name: string, text: string | null): XmlElement {
  return { name, text };
}

export function loadXml(xml: string): cheerio.CheerioAPI {
  return cheerio.load(xml, { xml: true });
}

function buildNode($: cheerio.CheerioAPI, spec: XmlElement, depth: number): cheerio.Cheerio<AnyNode> {
  const node = $(`<${spec.name}/>`);
  for (const [key, value] of Object.entries(spec.attributes ?? {})) {
    if (value !== null && value !== undefined) node.attr(key, value);
  }

  const children = spec.children ?? [];
  if (typeof spec.text === "string") {
    node.text(spec.text);
  } else if (children.length) {
    const indent = INDENT.repeat(depth + 1);
    for (const child of children) {
      node.append(`\n${indent}`);
      node.append(buildNode($, child, depth + 1));
    }
    node.append(`\n${INDENT.repeat(depth)}`);
  }
  return node;
}

/** Serialises an element tree with two-space indentation and an XML declaration. */
export function renderXml(root: XmlElement): string {
  const $ = loadXml("");
  $.root().append(buildNode($, root, 0));
  return `${XML_DECLARATION}\n${$.xml()}\n`;
}

/** Text of the first direct child named `name`, or null when there is no such child. */
export function childText(node: cheerio.Cheerio<AnyNode>, name: string): string | null {
  const child = node.children(name).first();
  if (!child.length) return null;
  return child.text().trim();
}
