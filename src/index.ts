/**
 * paypal-rest
 *
 * A TypeScript client for PayPal's REST reporting API.
 *
 * @example
 * import { PayPalClient, TransactionFields, loadConfig } from 'paypal-rest';
 *
 * const paypal = PayPalClient.fromConfig(await loadConfig());
 *
 * // Look up one transaction
 * const txn = await paypal.getTransaction('5TY05013RG002845M', {
 *   fields: TransactionFields.TRANSACTION.union(TransactionFields.PAYER),
 * });
 * console.log(`${txn.payerFullname()} paid ${txn.amount()}`);
 *
 * // Every transaction of the last week
 * const end = new Date();
 * const start = new Date(end.getTime() - 7 * 24 * 60 * 60 * 1000);
 * for await (const txn of paypal.iterTransactions(start, end)) {
 *   console.log(txn.transactionId(), txn.status());
 * }
 *
 * @packageDocumentation
 */

// Main client
export { PayPalClient, resolveSite, TRANSACTION_HISTORY_DAYS } from './client.js';
export type { GetTransactionOptions, PayPalClientOptions, PayPalCredentials } from './client.js';

// HTTP session (for advanced usage)
export { PayPalSession, TOKEN_PATH } from './http.js';
export type { HttpSession, PayPalSessionOptions } from './http.js';

// Configuration
export { DEFAULT_CONFIG_SECTION, defaultConfigPath, loadConfig, readConfigFile } from './config.js';
export type { LoadConfigOptions } from './config.js';

// Logging
export { createLogger, getDefaultLogger, LOG_LEVELS, parseLogLevel, ROOT_LOGGER_NAME } from './logger.js';
export type { Logger, LoggerOptions, LogLevel } from './logger.js';

// Errors
export {
  PayPalError,
  APIError,
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  ValidationError,
  ServerError,
  NetworkError,
  MissingFieldError,
  MissingKeyError,
  TransactionNotFoundError,
  UnknownFieldError,
  ConfigError,
} from './errors.js';

// Field selectors
export {
  SubscriptionFields,
  TransactionFields,
  SUBSCRIPTION_FIELD_NAMES,
  TRANSACTION_FIELD_NAMES,
} from './fields.js';
export type { SubscriptionField, TransactionField } from './fields.js';

// Date windows and pagination
export { DEFAULT_MAX_SPAN_DAYS, generateWindows } from './windows.js';
export type { QueryParams, WindowOptions, WindowParams } from './windows.js';
export { iterPages, PageIterator } from './pagination.js';
export type { PageFetcher } from './pagination.js';

// Models
export {
  Amount,
  PayPalSite,
  Transaction,
  TransactionStatus,
  isJsonObject,
  parseCartItem,
  parseTransactionStatus,
  siteUrl,
  transactionStatusLabel,
} from './models/index.js';
export type {
  AmountSource,
  CartItem,
  JsonObject,
  JsonValue,
  PayPalErrorBody,
  TransactionStatusCode,
  TransactionStatusLabel,
} from './models/index.js';

// Utilities
export { formatApiDate, parseApiDate } from './utils.js';

export { VERSION } from './version.js';
