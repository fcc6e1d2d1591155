/**
 * Minimal YAML frontmatter writer for note metadata.
 * Strings are emitted double-quoted (JSON string syntax is valid YAML).
 */

export type FrontmatterValue = string | number | boolean | readonly string[] | { raw: string };

export function yamlString(value: string): string {
  return JSON.stringify(value);
}

function yamlValue(value: FrontmatterValue): string {
  if (typeof value === "string") return yamlString(value);
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if ("raw" in value) return value.raw;
  return `[${value.map(yamlString).join(", ")}]`;
}

/** `{ raw }` values are written as-is (dates, enum words). */
export function renderFrontmatter(fields: Array<[string, FrontmatterValue | undefined]>): string {
  const lines = fields
    .filter((entry): entry is [string, FrontmatterValue] => entry[1] !== undefined)
    .map(([key, value]) => `${key}: ${yamlValue(value)}`);
  return `---\n${lines.join("\n")}\n---\n`;
}
