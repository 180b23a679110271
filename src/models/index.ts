/**
 * Models for paypal-rest
 */

export * from './amount.js';
export * from './common.js';
export * from './transaction.js';
