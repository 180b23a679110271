import { isValid, parseISO } from 'date-fns';

/**
 * Regular expression to match ISO 8601 date strings.
 */
const ISO_DATE_REGEX = /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Check if a value looks like an ISO date string.
 */
export function isISODateString(value: unknown): value is string {
  return typeof value === 'string' && ISO_DATE_REGEX.test(value);
}

/**
 * Parse an ISO 8601 datetime as PayPal (or a user) writes it.
 * Offsets without a colon (`+0000`) are accepted.
 *
 * @throws {RangeError} If the string is not a valid ISO 8601 datetime
 */
export function parseApiDate(value: string): Date {
  const date = isISODateString(value) ? parseISO(value) : new Date(NaN);
  if (!isValid(date)) {
    throw new RangeError(`invalid ISO 8601 datetime '${value}'`);
  }
  return date;
}

/**
 * Format a date for PayPal query parameters: ISO 8601, whole seconds, UTC.
 *
 * @example
 * formatApiDate(new Date('2020-10-01T12:00:00.750Z')) // '2020-10-01T12:00:00Z'
 */
export function formatApiDate(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

/**
 * Resolve an API path against a root URL.
 */
export function joinUrl(rootUrl: string, path: string): string {
  return new URL(path, rootUrl).toString();
}

/**
 * Build URL search params from an object, filtering out undefined values.
 */
export function buildSearchParams(params: Readonly<Record<string, unknown>>): URLSearchParams {
  const searchParams = new URLSearchParams();

  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null) {
      searchParams.append(key, String(value));
    }
  }

  return searchParams;
}

/**
 * Message of a caught value, whether or not it is an Error.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
