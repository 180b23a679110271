/**
 * Field selectors for PayPal's `fields` query parameter.
 *
 * PayPal only returns the optional detail groups a request names. A selector
 * is a set of named base fields; `ALL` is the union of every base field of
 * its kind, computed once.
 */

import { UnknownFieldError } from './errors.js';

/**
 * Shared behavior for a closed set of named base fields.
 */
abstract class FieldSelector<F extends string, Self extends FieldSelector<F, Self>> {
  protected readonly fields: ReadonlySet<F>;

  protected constructor(fields: Iterable<F>) {
    this.fields = new Set(fields);
  }

  /** Every base field of this kind, in canonical (declaration) order. */
  protected abstract get catalog(): readonly F[];

  /** Build a selector of the same kind from a set of base fields. */
  protected abstract create(fields: Iterable<F>): Self;

  /** API parameter name for one base field. */
  protected abstract paramName(field: F): string;

  /**
   * The base fields contained in this selector, in canonical order.
   */
  baseFields(): F[] {
    return this.catalog.filter((field) => this.fields.has(field));
  }

  /**
   * True when exactly one base field is selected.
   */
  isBaseField(): boolean {
    return this.fields.size === 1;
  }

  /**
   * True when every field of `other` is also selected here.
   */
  has(other: Self): boolean {
    return other.baseFields().every((field) => this.fields.has(field));
  }

  union(other: Self): Self {
    return this.create([...this.fields, ...other.baseFields()]);
  }

  equals(other: Self): boolean {
    return this.fields.size === other.baseFields().length && this.has(other);
  }

  /**
   * Comma-separated value for the API's `fields` parameter.
   *
   * @example
   * TransactionFields.TRANSACTION.union(TransactionFields.PAYER).paramValue()
   * // 'transaction_info,payer_info'
   */
  paramValue(): string {
    return this.baseFields()
      .map((field) => this.paramName(field))
      .join(',');
  }

  toString(): string {
    return this.paramValue();
  }
}

/**
 * Fold a list of selectors together; an empty or missing list means `all`.
 */
function combineFields<S extends { union(other: S): S }>(all: S, fields?: readonly S[]): S {
  const [first, ...rest] = fields ?? [];
  if (first === undefined) {
    return all;
  }
  return rest.reduce((combined, field) => combined.union(field), first);
}

/**
 * Look up a selector by case-insensitive name.
 */
function lookupField<S>(
  typeName: string,
  named: ReadonlyMap<string, S>,
  arg: string
): S {
  const field = named.get(arg.toLowerCase());
  if (field === undefined) {
    throw new UnknownFieldError(typeName, arg);
  }
  return field;
}

// =============================================================================
// Subscription fields
// =============================================================================

export const SUBSCRIPTION_FIELD_NAMES = ['last_failed_payment', 'plan'] as const;

export type SubscriptionField = (typeof SUBSCRIPTION_FIELD_NAMES)[number];

/**
 * Optional detail groups of `GET /v1/billing/subscriptions/{id}`.
 */
export class SubscriptionFields extends FieldSelector<SubscriptionField, SubscriptionFields> {
  static readonly LAST_FAILED_PAYMENT = new SubscriptionFields(['last_failed_payment']);
  static readonly PLAN = new SubscriptionFields(['plan']);
  static readonly ALL = new SubscriptionFields(SUBSCRIPTION_FIELD_NAMES);

  private static readonly named: ReadonlyMap<string, SubscriptionFields> = new Map([
    ['last_failed_payment', SubscriptionFields.LAST_FAILED_PAYMENT],
    ['plan', SubscriptionFields.PLAN],
    ['all', SubscriptionFields.ALL],
  ]);

  protected get catalog(): readonly SubscriptionField[] {
    return SUBSCRIPTION_FIELD_NAMES;
  }

  protected create(fields: Iterable<SubscriptionField>): SubscriptionFields {
    return new SubscriptionFields(fields);
  }

  protected paramName(field: SubscriptionField): string {
    return field;
  }

  static combine(fields?: readonly SubscriptionFields[]): SubscriptionFields {
    return combineFields(SubscriptionFields.ALL, fields);
  }

  /**
   * @throws {UnknownFieldError} If `arg` names no subscription field
   */
  static fromArg(arg: string): SubscriptionFields {
    return lookupField('SubscriptionFields', SubscriptionFields.named, arg);
  }

  static choices(): string[] {
    return [...SubscriptionFields.named.keys()];
  }
}

// =============================================================================
// Transaction fields
// =============================================================================

export const TRANSACTION_FIELD_NAMES = [
  'transaction',
  'payer',
  'shipping',
  'auction',
  'cart',
  'incentive',
  'store',
] as const;

export type TransactionField = (typeof TRANSACTION_FIELD_NAMES)[number];

/**
 * Optional detail groups of `GET /v1/reporting/transactions`. Each one maps
 * to a `<name>_info` key in the response.
 */
export class TransactionFields extends FieldSelector<TransactionField, TransactionFields> {
  static readonly TRANSACTION = new TransactionFields(['transaction']);
  static readonly PAYER = new TransactionFields(['payer']);
  static readonly SHIPPING = new TransactionFields(['shipping']);
  static readonly AUCTION = new TransactionFields(['auction']);
  static readonly CART = new TransactionFields(['cart']);
  static readonly INCENTIVE = new TransactionFields(['incentive']);
  static readonly STORE = new TransactionFields(['store']);
  static readonly ALL = new TransactionFields(TRANSACTION_FIELD_NAMES);

  private static readonly named: ReadonlyMap<string, TransactionFields> = new Map([
    ['transaction', TransactionFields.TRANSACTION],
    ['payer', TransactionFields.PAYER],
    ['shipping', TransactionFields.SHIPPING],
    ['auction', TransactionFields.AUCTION],
    ['cart', TransactionFields.CART],
    ['incentive', TransactionFields.INCENTIVE],
    ['store', TransactionFields.STORE],
    ['all', TransactionFields.ALL],
  ]);

  protected get catalog(): readonly TransactionField[] {
    return TRANSACTION_FIELD_NAMES;
  }

  protected create(fields: Iterable<TransactionField>): TransactionFields {
    return new TransactionFields(fields);
  }

  protected paramName(field: TransactionField): string {
    return `${field}_info`;
  }

  static combine(fields?: readonly TransactionFields[]): TransactionFields {
    return combineFields(TransactionFields.ALL, fields);
  }

  /**
   * @throws {UnknownFieldError} If `arg` names no transaction field
   */
  static fromArg(arg: string): TransactionFields {
    return lookupField('TransactionFields', TransactionFields.named, arg);
  }

  static choices(): string[] {
    return [...TransactionFields.named.keys()];
  }
}
