import { addMilliseconds, isAfter, isBefore, isValid, max, min } from 'date-fns';
import { formatApiDate } from './utils.js';

/**
 * Query parameters sent with a PayPal GET request.
 */
export type QueryParams = Readonly<Record<string, string>>;

/**
 * One window's request parameters: the caller's extra params plus the
 * window's `start_date` and `end_date`.
 */
export type WindowParams = QueryParams & {
  readonly start_date: string;
  readonly end_date: string;
};

/**
 * Options for generateWindows.
 */
export interface WindowOptions {
  /**
   * Longest span of one window, in 24-hour days.
   * @default 30
   */
  maxSpanDays?: number;

  /** Extra parameters merged into every window. */
  params?: QueryParams;
}

/**
 * The transaction search endpoint rejects spans over 31 days.
 */
export const DEFAULT_MAX_SPAN_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Split a date range into request windows no longer than `maxSpanDays`.
 *
 * When `start` is after `end` the windows run backward, newest first: the
 * first window ends at `start` and the last one begins at `end`. Otherwise
 * they run forward from `start` to `end`. Consecutive windows share a
 * boundary, and at least one window is always produced, so a zero-length
 * range yields the single point.
 *
 * The sequence is lazy and can be consumed once.
 *
 * @example
 * for (const params of generateWindows(from, to, { params: { fields: 'transaction_info' } })) {
 *   await fetchPage(params);
 * }
 *
 * @throws {RangeError} If a date is invalid or `maxSpanDays` is not positive
 */
export function generateWindows(
  start: Date,
  end: Date,
  options: WindowOptions = {}
): Generator<WindowParams, void, undefined> {
  const maxSpanDays = options.maxSpanDays ?? DEFAULT_MAX_SPAN_DAYS;
  if (!Number.isFinite(maxSpanDays) || maxSpanDays <= 0) {
    throw new RangeError(`maxSpanDays must be a positive number, got ${maxSpanDays}`);
  }
  if (!isValid(start) || !isValid(end)) {
    throw new RangeError('generateWindows needs valid start and end dates');
  }

  const spanMs = maxSpanDays * DAY_MS;
  const params = options.params ?? {};
  return isAfter(start, end)
    ? backwardWindows(start, end, spanMs, params)
    : forwardWindows(start, end, spanMs, params);
}

function makeWindow(params: QueryParams, from: Date, to: Date): WindowParams {
  return { ...params, start_date: formatApiDate(from), end_date: formatApiDate(to) };
}

function* forwardWindows(
  start: Date,
  end: Date,
  spanMs: number,
  params: QueryParams
): Generator<WindowParams, void, undefined> {
  let cursor = start;
  do {
    const windowEnd = min([addMilliseconds(cursor, spanMs), end]);
    yield makeWindow(params, cursor, windowEnd);
    cursor = windowEnd;
  } while (isBefore(cursor, end));
}

function* backwardWindows(
  latest: Date,
  earliest: Date,
  spanMs: number,
  params: QueryParams
): Generator<WindowParams, void, undefined> {
  let cursor = latest;
  do {
    const windowStart = max([addMilliseconds(cursor, -spanMs), earliest]);
    yield makeWindow(params, windowStart, cursor);
    cursor = windowStart;
  } while (isAfter(cursor, earliest));
}
