import { MissingFieldError, MissingKeyError } from '../errors.js';
import type { Amount } from '../models/amount.js';
import { transactionStatusLabel, type CartItem, type Transaction } from '../models/transaction.js';

const quantityFormat = new Intl.NumberFormat('en-US', { maximumSignificantDigits: 6 });

/**
 * `YYYY-MM-DD HH:MM` in UTC.
 */
function formatMinute(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

function payerSuffix(txn: Transaction): string {
  try {
    return `\t${txn.payerFullname()} (${txn.payerEmail()})`;
  } catch (error) {
    if (error instanceof MissingFieldError || error instanceof MissingKeyError) {
      return '';
    }
    throw error;
  }
}

function itemName(item: CartItem): string {
  return item.name || item.description || item.code || 'Unknown Item';
}

/**
 * Single-line item standing in for a whole amount.
 */
function lumpItem(name: string, amount: Amount): CartItem {
  return { code: null, name, description: null, quantity: 1, unitPrice: amount, totalPrice: amount };
}

/**
 * Render one transaction as a header line plus one aligned line per item.
 *
 * @example
 * 2020-10-01 12:00	5TY05013RG002845M	Successful	Jane Doe (jane@example.com)
 *   Widget │ 15.98 USD (2 @ 7.99 USD)
 *   PayPal Fee │ -0.49 USD
 */
export function summarizeTransaction(txn: Transaction): string[] {
  const header = `${formatMinute(txn.updatedDate())}\t${txn.transactionId()}\t${transactionStatusLabel(txn.status())}${payerSuffix(txn)}`;

  const cart = txn.has('cart_info') ? txn.cartItems() : [];
  if (cart.length === 0) {
    cart.push(lumpItem(txn.subject() ?? 'Gross Amount', txn.amount()));
  }
  const fee = txn.feeAmount();
  if (fee !== null) {
    cart.push(lumpItem('PayPal Fee', fee));
  }

  const rows = cart.map((item) => ({ item, name: itemName(item), total: item.totalPrice.toString() }));
  const nameWidth = Math.max(...rows.map((row) => row.name.length));
  const totalWidth = Math.max(...rows.map((row) => row.total.length));

  const lines = rows.map(({ item, name, total }) => {
    const unit = item.quantity !== 1 ? ` (${quantityFormat.format(item.quantity)} @ ${item.unitPrice})` : '';
    return `  ${name.padStart(nameWidth)} │ ${total.padStart(totalWidth)}${unit}`;
  });
  return [header, ...lines];
}
