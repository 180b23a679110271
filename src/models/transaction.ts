/**
 * Transaction Models
 *
 * Read-only view over one element of a transaction search response's
 * `transaction_details` array, with typed accessors for the fields this
 * library uses.
 */

import { isDeepStrictEqual } from 'node:util';
import { z } from 'zod';
import { MissingFieldError, MissingKeyError, PayPalError } from '../errors.js';
import { errorMessage, parseApiDate } from '../utils.js';
import { Amount, AmountSourceSchema, DECIMAL_STRING_REGEX } from './amount.js';
import { isJsonObject, type JsonObject, type JsonValue } from './common.js';

// =============================================================================
// Enums
// =============================================================================

/**
 * Transaction status codes and their labels.
 */
export const TransactionStatus = {
  D: 'Denied',
  F: 'Partially Refunded',
  P: 'Pending',
  S: 'Successful',
  V: 'Reversed',
} as const;

export type TransactionStatusCode = keyof typeof TransactionStatus;
export type TransactionStatusLabel = (typeof TransactionStatus)[TransactionStatusCode];

const STATUS_ALIASES: Readonly<Record<string, TransactionStatusCode>> = {
  D: 'D',
  DENIED: 'D',
  F: 'F',
  REFUNDED: 'F',
  P: 'P',
  PENDING: 'P',
  S: 'S',
  SUCCESSFUL: 'S',
  SUCCESS: 'S',
  V: 'V',
  REVERSED: 'V',
};

/**
 * Resolve a status code or alias (`S`, `success`, `REFUNDED`, ...) to its code.
 */
export function parseTransactionStatus(value: string): TransactionStatusCode {
  const code = STATUS_ALIASES[value.toUpperCase()];
  if (code === undefined) {
    throw new PayPalError(`unknown transaction status '${value}'`);
  }
  return code;
}

export function transactionStatusLabel(code: TransactionStatusCode): TransactionStatusLabel {
  return TransactionStatus[code];
}

// =============================================================================
// Cart items
// =============================================================================

/**
 * One line of a transaction's cart.
 */
export interface CartItem {
  readonly code: string | null;
  readonly name: string | null;
  readonly description: string | null;
  readonly quantity: number;
  readonly unitPrice: Amount;
  readonly totalPrice: Amount;
}

const CartItemSourceSchema = z.object({
  item_code: z.string().optional(),
  item_name: z.string().optional(),
  item_description: z.string().optional(),
  item_quantity: z
    .union([z.string().regex(DECIMAL_STRING_REGEX), z.number()])
    .transform(Number)
    .optional(),
  item_unit_price: AmountSourceSchema.optional(),
  item_amount: AmountSourceSchema,
});

/**
 * Build a CartItem from one `item_details` entry.
 *
 * Returns null for lines that cannot be priced, such as refund lines that
 * only carry `item_quantity`.
 *
 * @param defaultName - Name to use when the line has none
 */
export function parseCartItem(source: unknown, defaultName: string | null = null): CartItem | null {
  const result = CartItemSourceSchema.safeParse(source);
  if (!result.success) {
    return null;
  }
  const item = result.data;
  const quantity = item.item_quantity ?? 1;
  const totalPrice = Amount.fromApi(item.item_amount);
  let unitPrice: Amount;
  if (item.item_unit_price) {
    unitPrice = Amount.fromApi(item.item_unit_price);
  } else if (quantity !== 0) {
    unitPrice = totalPrice.dividedBy(quantity);
  } else {
    return null;
  }
  return {
    code: item.item_code ?? null,
    name: item.item_name ?? defaultName,
    description: item.item_description ?? null,
    quantity,
    unitPrice,
    totalPrice,
  };
}

// =============================================================================
// Transaction view
// =============================================================================

type FieldPath = readonly [string, ...string[]];

function formatPath(path: readonly string[]): string {
  return path.map((key) => `'${key}'`).join('→');
}

/**
 * A transaction from the reporting API.
 *
 * Structural accessors (`has`, `get`, `keys`, `size`, iteration) expose the
 * raw response. Typed accessors read a fixed path: when the first key is
 * absent the field group was not requested and they throw
 * `MissingFieldError`; when a later key is absent they throw
 * `MissingKeyError`.
 *
 * @example
 * const txn = await client.getTransaction('5TY05013RG002845M', {
 *   fields: TransactionFields.TRANSACTION.union(TransactionFields.PAYER),
 * });
 * console.log(`${txn.payerFullname()} paid ${txn.amount()}`);
 */
export class Transaction implements Iterable<string> {
  constructor(private readonly source: JsonObject) {}

  // ---------------------------------------------------------------------------
  // Structural access
  // ---------------------------------------------------------------------------

  has(key: string): boolean {
    return Object.hasOwn(this.source, key);
  }

  get(key: string): JsonValue | undefined {
    return this.has(key) ? this.source[key] : undefined;
  }

  keys(): string[] {
    return Object.keys(this.source);
  }

  get size(): number {
    return this.keys().length;
  }

  [Symbol.iterator](): Iterator<string> {
    return this.keys()[Symbol.iterator]();
  }

  /**
   * Deep equality with another Transaction or a plain response object.
   */
  equals(other: unknown): boolean {
    return isDeepStrictEqual(this.source, other instanceof Transaction ? other.source : other);
  }

  toJSON(): JsonObject {
    return this.source;
  }

  // ---------------------------------------------------------------------------
  // Typed accessors
  // ---------------------------------------------------------------------------

  amount(): Amount {
    return this.amountAt(['transaction_info', 'transaction_amount']);
  }

  /**
   * The fee PayPal charged, or null when none was charged.
   *
   * Unlike other sub-fields, an absent `fee_amount` is not an error.
   */
  feeAmount(): Amount | null {
    const info = this.objectAt(['transaction_info']);
    if (!Object.hasOwn(info, 'fee_amount')) {
      return null;
    }
    return this.amountAt(['transaction_info', 'fee_amount']);
  }

  initiationDate(): Date {
    return this.dateAt(['transaction_info', 'transaction_initiation_date']);
  }

  updatedDate(): Date {
    return this.dateAt(['transaction_info', 'transaction_updated_date']);
  }

  status(): TransactionStatusCode {
    const path: FieldPath = ['transaction_info', 'transaction_status'];
    const value = this.stringAt(path);
    try {
      return parseTransactionStatus(value);
    } catch (error) {
      throw new PayPalError(`${this.label()} ${formatPath(path)}: ${errorMessage(error)}`);
    }
  }

  transactionId(): string {
    return this.stringAt(['transaction_info', 'transaction_id']);
  }

  /**
   * The transaction's subject line, or null when it has none.
   */
  subject(): string | null {
    const info = this.objectAt(['transaction_info']);
    if (!Object.hasOwn(info, 'transaction_subject')) {
      return null;
    }
    return this.stringAt(['transaction_info', 'transaction_subject']);
  }

  payerEmail(): string {
    return this.stringAt(['payer_info', 'email_address']);
  }

  payerFullname(): string {
    return this.stringAt(['payer_info', 'payer_name', 'alternate_full_name']);
  }

  /**
   * Priced lines of the cart. Lines that cannot be priced are skipped, and
   * unnamed lines take the transaction's subject when it is loaded.
   */
  cartItems(): CartItem[] {
    const cart = this.objectAt(['cart_info']);
    const details = cart['item_details'];
    if (!Array.isArray(details)) {
      return [];
    }
    const defaultName = this.has('transaction_info') ? this.subject() : null;
    const items: CartItem[] = [];
    for (const source of details) {
      const item = parseCartItem(source, defaultName);
      if (item) {
        items.push(item);
      }
    }
    return items;
  }

  // ---------------------------------------------------------------------------
  // Path traversal
  // ---------------------------------------------------------------------------

  /**
   * Human-readable name for error messages.
   */
  private label(): string {
    const info = this.source['transaction_info'];
    if (isJsonObject(info)) {
      const id = info['transaction_id'];
      if (typeof id === 'string') {
        return `Transaction ${id}`;
      }
    }
    return 'Transaction';
  }

  private lookup(path: FieldPath): JsonValue {
    let node: JsonValue = this.source;
    for (const [index, key] of path.entries()) {
      if (!isJsonObject(node) || !Object.hasOwn(node, key)) {
        if (index === 0) {
          throw new MissingFieldError(`${this.label()} was not loaded with '${key}' field`, key);
        }
        const missing = path.slice(0, index + 1);
        throw new MissingKeyError(`${this.label()} ${formatPath(missing)}`, missing);
      }
      node = node[key];
    }
    return node;
  }

  private objectAt(path: FieldPath): JsonObject {
    const value = this.lookup(path);
    if (!isJsonObject(value)) {
      throw new PayPalError(`${this.label()} ${formatPath(path)} is not an object`);
    }
    return value;
  }

  private stringAt(path: FieldPath): string {
    const value = this.lookup(path);
    if (typeof value !== 'string') {
      throw new PayPalError(`${this.label()} ${formatPath(path)} is not a string`);
    }
    return value;
  }

  private dateAt(path: FieldPath): Date {
    const value = this.stringAt(path);
    try {
      return parseApiDate(value);
    } catch (error) {
      throw new PayPalError(`${this.label()} ${formatPath(path)}: ${errorMessage(error)}`);
    }
  }

  private amountAt(path: FieldPath): Amount {
    const value = this.lookup(path);
    try {
      return Amount.fromApi(value);
    } catch (error) {
      if (error instanceof MissingKeyError) {
        const missing = [...path, ...error.path];
        throw new MissingKeyError(`${this.label()} ${formatPath(missing)}`, missing);
      }
      throw new PayPalError(`${this.label()} ${formatPath(path)}: ${errorMessage(error)}`);
    }
  }
}
