const PLACEHOLDER = /\$\{(\w+)\}/g;

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (value !== null && typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Substitutes `${key}` placeholders with values from `data`.
 * Unknown keys are left as written so a missing input stays visible.
 */
export function renderTemplate(template: string, data: Readonly<Record<string, unknown>>): string {
  return template.replace(PLACEHOLDER, (match, key: string) => {
    const value = data[key];
    return value === undefined ? match : stringify(value);
  });
}

/** Keys referenced by a template that `data` does not provide. */
export function missingPlaceholders(template: string, data: Readonly<Record<string, unknown>>): string[] {
  const missing = new Set<string>();
  for (const m of template.matchAll(PLACEHOLDER)) {
    if (data[m[1]] === undefined) missing.add(m[1]);
  }
  return [...missing];
}
