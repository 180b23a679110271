import { stringify } from 'yaml';
import type { TransactionField, TransactionFields } from '../fields.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../models/common.js';
import type { Transaction } from '../models/transaction.js';

/**
 * Order in which a transaction's field groups are printed.
 */
export const TRANSACTION_GROUP_ORDER: readonly TransactionField[] = [
  'shipping',
  'payer',
  'transaction',
  'cart',
  'store',
  'auction',
  'incentive',
];

/**
 * Copy of a JSON value with every object's keys sorted.
 */
export function sortKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isJsonObject(value)) {
    const sorted: Record<string, JsonValue> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

/**
 * The requested field groups of a transaction, in print order. Groups the
 * response left out are skipped.
 */
export function transactionDocument(txn: Transaction, fields: TransactionFields): JsonObject {
  const selected = new Set(fields.baseFields());
  const document: Record<string, JsonValue> = {};
  for (const field of TRANSACTION_GROUP_ORDER) {
    const key = `${field}_info`;
    const group = txn.get(key);
    if (selected.has(field) && group !== undefined) {
      document[key] = sortKeys(group);
    }
  }
  return document;
}

/**
 * One YAML document, starting with a `---` marker.
 */
export function dumpDocument(document: JsonValue): string {
  return `---\n${stringify(document)}`;
}
