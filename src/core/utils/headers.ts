import type { IncomingHttpHeaders } from 'node:http';

/**
 * Case-insensitive header lookup. Repeated headers are joined with `, `.
 */
export function getHeaderValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];

  if (value === undefined) {
    return undefined;
  }

  if (Array.isArray(value)) {
    return value.length > 0 ? value.join(', ') : undefined;
  }

  return value;
}

/**
 * Existing `Set-Cookie` values of a response as a list, ready to be extended.
 */
export function toHeaderList(value: string | number | string[] | undefined): string[] {
  if (value === undefined) {
    return [];
  }

  if (Array.isArray(value)) {
    return [...value];
  }

  return [String(value)];
}
