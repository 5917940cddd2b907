import { HeaderMap } from '../interfaces';

export type RawHeaders = Readonly<Record<string, string | readonly string[] | undefined>>;

/**
 * Lower-case header names and collapse repeated values, last one wins
 */
export function normalizeHeaders(raw: RawHeaders): HeaderMap {
  const headers: Record<string, string> = {};

  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined) continue;

    if (typeof value === 'string') {
      headers[name.toLowerCase()] = value;
    } else if (value.length > 0) {
      headers[name.toLowerCase()] = value[value.length - 1];
    }
  }

  return headers;
}

export function getHeader(headers: HeaderMap, name: string): string | undefined {
  return headers[name.toLowerCase()];
}

/**
 * Media type without parameters, lower-cased
 * ('Application/JSON; charset=utf-8' -> 'application/json')
 */
export function mediaType(headers: HeaderMap): string {
  const contentType = getHeader(headers, 'content-type') ?? '';
  return contentType.split(';')[0].trim().toLowerCase();
}

/**
 * Copy of the headers safe to log: values of sensitive headers are masked
 */
export function redactHeaders(
  headers: HeaderMap,
  redactPatterns: readonly string[],
): Record<string, string> {
  const patterns = redactPatterns.map((pattern) => pattern.toLowerCase());
  const redacted: Record<string, string> = {};

  for (const [name, value] of Object.entries(headers)) {
    const sensitive = patterns.some((pattern) => name.includes(pattern));
    redacted[name] = sensitive ? '[REDACTED]' : value;
  }

  return redacted;
}
