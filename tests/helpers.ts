/**
 * Test doubles and fixture builders shared by the unit tests.
 */

import type { HttpSession } from '../src/http.js';
import { createLogger, type Logger, type LogLevel } from '../src/logger.js';
import type { JsonObject, JsonValue } from '../src/models/common.js';
import type { QueryParams } from '../src/windows.js';

export const START_DATE = new Date('2020-10-01T12:00:00Z');
export const END_DATE = new Date('2020-10-25T12:00:00Z');

export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Build a JSON response the way PayPal sends one.
 */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export interface CannedResponse {
  body: unknown;
  status?: number;
}

export interface RecordedRequest {
  url: URL;
  params: QueryParams;
}

/**
 * PayPal error payload with one `{ issue, location: 'test' }` detail per issue.
 */
export function errorBody(name = 'TEST_ERROR', message = 'Test error', ...issues: string[]): JsonObject {
  return {
    name,
    message,
    debug_id: '0000',
    details: issues.map((issue) => ({ issue, location: 'test' })),
  };
}

/**
 * HttpSession that records each request and answers from a fixed list.
 * With `repeat`, the list cycles; otherwise extra requests get a 509.
 */
export class FakeSession implements HttpSession {
  readonly requests: RecordedRequest[] = [];

  constructor(
    private readonly responses: CannedResponse[],
    private readonly repeat = false
  ) {}

  async get(url: string, params: QueryParams = {}): Promise<Response> {
    const index = this.requests.length;
    this.requests.push({ url: new URL(url), params });
    const canned = this.repeat ? this.responses[index % this.responses.length] : this.responses[index];
    if (canned === undefined) {
      return jsonResponse(
        { name: 'NO_RESPONSE', message: 'FakeSession got more requests than expected' },
        509
      );
    }
    return jsonResponse(canned.body, canned.status ?? 200);
  }
}

/**
 * One page of a transaction search.
 */
export function searchPage(details: JsonObject[] = [], page = 1, totalPages = 1): CannedResponse {
  return { body: { page, total_pages: totalPages, transaction_details: details } };
}

/**
 * Writable that keeps everything written to it.
 */
export class MemoryStream {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  text(): string {
    return this.chunks.join('');
  }
}

export interface LogRecord {
  level: number;
  msg: string;
  name?: string;
  [key: string]: unknown;
}

/**
 * Parse the JSON log lines pino wrote to a stream.
 */
export function logRecords(stream: MemoryStream): LogRecord[] {
  return stream
    .text()
    .split('\n')
    .filter((line) => line.startsWith('{'))
    .map((line): LogRecord => JSON.parse(line));
}

export function memoryLogger(level: LogLevel = 'trace'): { logger: Logger; stream: MemoryStream } {
  const stream = new MemoryStream();
  return { logger: createLogger({ level, destination: stream }), stream };
}

// =============================================================================
// Response fixtures
// =============================================================================

export interface TransactionInfoOptions {
  transactionId?: string;
  value?: string;
  currency?: string;
  feeValue?: string | null;
  initDate?: string;
  updateDate?: string;
  status?: string;
  subject?: string;
}

export function transactionInfo(options: TransactionInfoOptions = {}): JsonObject {
  const currency = options.currency ?? 'USD';
  const initDate = options.initDate ?? '2020-10-02T14:15:16+00:00';
  const info: Record<string, JsonValue> = {
    transaction_id: options.transactionId ?? 'TRANSACTION123456',
    transaction_status: options.status ?? 'S',
    transaction_initiation_date: initDate,
    transaction_updated_date: options.updateDate ?? initDate,
    transaction_amount: { value: options.value ?? '5.00', currency_code: currency },
  };
  const feeValue = options.feeValue === undefined ? '-0.49' : options.feeValue;
  if (feeValue !== null) {
    info['fee_amount'] = { value: feeValue, currency_code: currency };
  }
  if (options.subject !== undefined) {
    info['transaction_subject'] = options.subject;
  }
  return info;
}

export function payerInfo(givenName = 'Payer', email = 'payer@example.org'): JsonObject {
  return {
    account_id: 'PAYER12345678',
    email_address: email,
    payer_name: {
      given_name: givenName,
      surname: 'Smith',
      alternate_full_name: `${givenName} Smith`,
    },
  };
}

export interface ItemOptions {
  name?: string;
  quantity?: number;
  unitValue?: string;
  totalValue?: string;
  currency?: string;
}

/**
 * One `item_details` entry. Name, description and code are all `name`.
 */
export function itemSource(options: ItemOptions = {}): JsonObject {
  const currency = options.currency ?? 'USD';
  const unitValue = options.unitValue ?? '15.99';
  const item: Record<string, JsonValue> = {
    item_quantity: String(options.quantity ?? 1),
    item_unit_price: { value: unitValue, currency_code: currency },
    item_amount: { value: options.totalValue ?? unitValue, currency_code: currency },
  };
  if (options.name !== undefined) {
    item['item_name'] = options.name;
    item['item_description'] = options.name;
    item['item_code'] = options.name;
  }
  return item;
}

export function cartInfo(...items: ItemOptions[]): JsonObject {
  return { item_details: items.map(itemSource) };
}
