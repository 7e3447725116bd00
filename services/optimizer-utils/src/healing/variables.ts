// Shortest run between a `{` and the next `}` on the same line. `{{foo}}` yields `{foo`,
// which never matches a real placeholder and is left for escaping.
const VARIABLE_PATTERN = /\{(.+?)\}/g;

/** Distinct placeholder names in `template`, in order of first appearance. */
export function extractVariables(template: string): string[] {
  const seen = new Set<string>();
  for (const match of template.matchAll(VARIABLE_PATTERN)) {
    seen.add(match[1]);
  }
  return [...seen];
}

export function placeholder(name: string): string {
  return `{${name}}`;
}
