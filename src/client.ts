import {
  APIError,
  AuthenticationError,
  AuthorizationError,
  ConfigError,
  NotFoundError,
  ServerError,
  TransactionNotFoundError,
  ValidationError,
} from './errors.js';
import { SubscriptionFields, TransactionFields } from './fields.js';
import { PayPalSession, type HttpSession, type PayPalSessionOptions } from './http.js';
import { getDefaultLogger, ROOT_LOGGER_NAME, type Logger } from './logger.js';
import {
  isJsonObject,
  PayPalErrorBodySchema,
  PayPalSite,
  siteUrl,
  type JsonObject,
  type PayPalErrorBody,
} from './models/common.js';
import { Transaction } from './models/transaction.js';
import { iterPages, PageIterator } from './pagination.js';
import { joinUrl } from './utils.js';
import { generateWindows, type QueryParams } from './windows.js';

/**
 * How far back PayPal's transaction search reaches.
 */
export const TRANSACTION_HISTORY_DAYS = 365 * 3;

const DAY_MS = 24 * 60 * 60 * 1000;

const SUBSCRIPTIONS_PATH = '/v1/billing/subscriptions';
const TRANSACTIONS_PATH = '/v1/reporting/transactions';

/**
 * Configuration options for PayPalClient.
 */
export interface PayPalClientOptions {
  /**
   * PayPal site, or a full root URL such as a local mock server.
   * @default PayPalSite.SANDBOX
   */
  site?: PayPalSite | string;

  /**
   * Logger for API errors. Defaults to a child of the package logger named
   * after the API host.
   */
  logger?: Logger;
}

/**
 * Client credentials plus an optional site, as read from configuration.
 */
export interface PayPalCredentials {
  clientId: string;
  clientSecret: string;
  /** Site alias (`sandbox`, `live`) or a root URL. */
  site?: string;
}

/**
 * Options for getTransaction.
 */
export interface GetTransactionOptions {
  /** @default TransactionFields.TRANSACTION */
  fields?: TransactionFields;
  /** Earliest time to search. @default three years ago */
  start?: Date;
  /** Latest time to search. @default now */
  end?: Date;
}

/**
 * Resolve a site alias (`sandbox`, `live`, any case) or root URL.
 *
 * @throws {ConfigError} If `site` is neither an alias nor a URL
 */
export function resolveSite(site: PayPalSite | string | undefined): string {
  if (site === undefined) {
    return siteUrl(PayPalSite.SANDBOX);
  }
  switch (site.toUpperCase()) {
    case 'SANDBOX':
    case PayPalSite.SANDBOX.toUpperCase():
      return siteUrl(PayPalSite.SANDBOX);
    case 'LIVE':
    case PayPalSite.LIVE.toUpperCase():
      return siteUrl(PayPalSite.LIVE);
    default:
      return parseRootUrl(site);
  }
}

function parseRootUrl(site: string): string {
  const root = site.replace(/\/+$/, '');
  if (!URL.canParse(root)) {
    throw new ConfigError(`site must be 'sandbox', 'live' or a URL, got '${site}'`);
  }
  return root;
}

/**
 * Logger name derived from the API host, most significant label first,
 * e.g. `paypal-rest.client.com.paypal.sandbox.api-m`.
 */
function loggerNameFor(rootUrl: string): string {
  const host = new URL(rootUrl).hostname;
  return `${ROOT_LOGGER_NAME}.client.${host.split('.').reverse().join('.')}`;
}

/**
 * Client for PayPal's REST reporting API.
 *
 * @example
 * // Basic usage
 * import { PayPalClient, TransactionFields } from 'paypal-rest';
 *
 * const paypal = PayPalClient.fromClientSecret('client-id', 'client-secret', {
 *   site: 'live',
 * });
 *
 * @example
 * // Look up one transaction, newest month first
 * const txn = await paypal.getTransaction('5TY05013RG002845M');
 * console.log(`${txn.transactionId()}: ${txn.amount()}`);
 *
 * @example
 * // Every transaction in a range
 * for await (const txn of paypal.iterTransactions(start, end, TransactionFields.ALL)) {
 *   console.log(txn.payerEmail());
 * }
 */
export class PayPalClient {
  readonly rootUrl: string;
  readonly logger: Logger;

  /**
   * Create a new client over an authenticated session.
   *
   * @param session - Session that attaches credentials to requests
   * @param options - Configuration options
   */
  constructor(
    private readonly session: HttpSession,
    options: PayPalClientOptions = {}
  ) {
    this.rootUrl = resolveSite(options.site);
    this.logger = options.logger ?? getDefaultLogger().child({ name: loggerNameFor(this.rootUrl) });
  }

  /**
   * Create a client that authenticates with OAuth2 client credentials.
   */
  static fromClientSecret(
    clientId: string,
    clientSecret: string,
    options: PayPalClientOptions & PayPalSessionOptions = {}
  ): PayPalClient {
    const session = new PayPalSession(clientId, clientSecret, { timeout: options.timeout });
    return new PayPalClient(session, options);
  }

  /**
   * Create a client from loaded configuration. A configured `site` takes
   * precedence over `options.site`.
   */
  static fromConfig(
    config: PayPalCredentials,
    options: PayPalClientOptions & PayPalSessionOptions = {}
  ): PayPalClient {
    return PayPalClient.fromClientSecret(config.clientId, config.clientSecret, {
      ...options,
      site: config.site ?? options.site,
    });
  }

  /**
   * Get one subscription.
   *
   * @param subscriptionId - Subscription ID, e.g. `I-BW452GLLEP1G`
   * @param fields - Optional detail groups to include
   * @returns The subscription as PayPal returns it
   * @throws {APIError} If the request fails
   */
  async getSubscription(
    subscriptionId: string,
    fields: SubscriptionFields = SubscriptionFields.ALL
  ): Promise<JsonObject> {
    return this.getJson(`${SUBSCRIPTIONS_PATH}/${encodeURIComponent(subscriptionId)}`, {
      fields: fields.paramValue(),
    });
  }

  /**
   * Find one transaction by ID.
   *
   * Searches month-sized windows from `end` back to `start`, newest first,
   * and returns the first match.
   *
   * @throws {TransactionNotFoundError} If no window contains the transaction
   * @throws {APIError} If a request fails
   */
  async getTransaction(
    transactionId: string,
    options: GetTransactionOptions = {}
  ): Promise<Transaction> {
    const now = Date.now();
    const end = options.end ?? new Date(now);
    const start = options.start ?? new Date(now - TRANSACTION_HISTORY_DAYS * DAY_MS);
    const fields = options.fields ?? TransactionFields.TRANSACTION;

    // Newest window first: the generator runs backward when start > end.
    for (const params of generateWindows(end, start, {
      params: { transaction_id: transactionId, fields: fields.paramValue() },
    })) {
      const response = await this.getJson(TRANSACTIONS_PATH, params);
      const [first] = transactionDetails(response);
      if (first) {
        return new Transaction(first);
      }
    }
    throw new TransactionNotFoundError(transactionId);
  }

  /**
   * Iterate every transaction between `start` and `end`.
   *
   * Requests are made lazily, one window and one page at a time, as the
   * iterator is consumed.
   *
   * @returns PageIterator of transactions in API order
   */
  iterTransactions(
    start: Date,
    end: Date,
    fields: TransactionFields = TransactionFields.TRANSACTION
  ): PageIterator<Transaction> {
    const windows = generateWindows(start, end, { params: { fields: fields.paramValue() } });
    return new PageIterator(this.transactionsIn(windows));
  }

  private async *transactionsIn(
    windows: Iterable<QueryParams>
  ): AsyncGenerator<Transaction, void, undefined> {
    const fetchPage = (params: QueryParams): Promise<JsonObject> =>
      this.getJson(TRANSACTIONS_PATH, params);
    for (const params of windows) {
      for await (const page of iterPages(fetchPage, params)) {
        for (const source of transactionDetails(page)) {
          yield new Transaction(source);
        }
      }
    }
  }

  /**
   * GET a path and parse the JSON body, logging and throwing on failure.
   */
  private async getJson(path: string, params?: QueryParams): Promise<JsonObject> {
    const response = await this.session.get(joinUrl(this.rootUrl, path), params);
    const data = await readJson(response);

    if (!response.ok) {
      const parsed = PayPalErrorBodySchema.safeParse(data);
      const body = parsed.success ? parsed.data : undefined;
      const error = toAPIError(response, body);
      if (body) {
        this.logError(body);
      } else {
        this.logger.error({ status: response.status }, error.message);
      }
      throw error;
    }

    if (!isJsonObject(data)) {
      throw new APIError(`Expected a JSON object from ${path}`, response.status);
    }
    return data;
  }

  /**
   * Log an API error as one line: `NAME: message — issue (in location)`.
   */
  private logError(body: PayPalErrorBody): void {
    const details = body.details ?? [];
    const parts = [
      `${body.name}: ${body.message}`,
      ...details.map((detail) => `${detail.issue} (in ${detail.location ?? 'unknown'})`),
    ];
    this.logger.error(
      { errorName: body.name, debugId: body.debug_id, details },
      parts.join(' — ')
    );
  }
}

/**
 * The `transaction_details` entries of a search response.
 */
function transactionDetails(response: JsonObject): JsonObject[] {
  const details = response['transaction_details'];
  if (!Array.isArray(details)) {
    return [];
  }
  return details.filter(isJsonObject);
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Map a failed response to the matching APIError subclass.
 */
function toAPIError(response: Response, body: PayPalErrorBody | undefined): APIError {
  const status = response.status;
  const message = body
    ? `${body.name}: ${body.message}`
    : `HTTP ${status}${response.statusText ? ` ${response.statusText}` : ''}`;

  switch (status) {
    case 400:
    case 422:
      return new ValidationError(message, status, body);
    case 401:
      return new AuthenticationError(message, body);
    case 403:
      return new AuthorizationError(message, body);
    case 404:
      return new NotFoundError(message, body);
    default:
      return status >= 500 ? new ServerError(message, status, body) : new APIError(message, status, body);
  }
}
