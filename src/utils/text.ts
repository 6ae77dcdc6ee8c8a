export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function underscored(text: string): string {
  return normalizeWhitespace(text).replace(/ /g, "_");
}
