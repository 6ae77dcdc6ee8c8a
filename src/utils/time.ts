export function nowUtcIsoSeconds(): string {
  const iso = new Date().toISOString();
  return iso.replace(/\.\d{3}Z$/, "Z");
}

/** YYYY-MM-DD of the given instant, UTC. */
export function utcDate(date: Date = new Date()): string {
  return date.toISOString().slice(0, 10);
}
