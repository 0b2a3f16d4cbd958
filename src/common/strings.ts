/**
 * `true` for `undefined`, `null`, the empty string and whitespace-only strings.
 */
export function isBlank(value: string | null | undefined): boolean {
  return value === undefined || value === null || value.trim().length === 0;
}

export function isNotBlank(value: string | null | undefined): value is string {
  return !isBlank(value);
}

export function equalsIgnoreCase(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
