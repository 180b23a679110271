import { z } from 'zod';
import { AuthenticationError, NetworkError, PayPalError } from './errors.js';
import { buildSearchParams, errorMessage } from './utils.js';
import type { QueryParams } from './windows.js';

/**
 * Minimal HTTP session the API client needs.
 *
 * Implementations attach credentials and apply their own retry policy;
 * the client only inspects the returned Response.
 */
export interface HttpSession {
  get(url: string, params?: QueryParams): Promise<Response>;
}

/**
 * Options for PayPalSession.
 */
export interface PayPalSessionOptions {
  /**
   * Request timeout in milliseconds.
   * @default 30000
   */
  timeout?: number;
}

/**
 * OAuth2 token endpoint, resolved against each request's origin.
 */
export const TOKEN_PATH = '/v1/oauth2/token';

const TokenResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
});

/**
 * HTTP session authenticated with OAuth2 client credentials.
 *
 * Handles:
 * - Bearer token authentication
 * - Fetching a fresh token and retrying once on a 401 response
 * - Timeouts and network failure mapping
 *
 * The session holds no lock around the token; use one session per
 * sequence of calls.
 */
export class PayPalSession implements HttpSession {
  private accessToken: string | null = null;
  private readonly timeout: number;

  /**
   * Create a new session.
   *
   * @param clientId - REST app client ID
   * @param clientSecret - REST app secret
   */
  constructor(
    private readonly clientId: string,
    private readonly clientSecret: string,
    options: PayPalSessionOptions = {}
  ) {
    this.timeout = options.timeout ?? 30000;
  }

  /**
   * Check if the session currently holds an access token.
   */
  hasToken(): boolean {
    return this.accessToken !== null;
  }

  /**
   * Drop the current access token.
   */
  clearToken(): void {
    this.accessToken = null;
  }

  /**
   * Make a GET request, fetching a new token and retrying once if PayPal
   * answers 401. A second 401 is returned to the caller unchanged.
   */
  async get(url: string, params?: QueryParams): Promise<Response> {
    let fullUrl = url;
    if (params) {
      const queryString = buildSearchParams(params).toString();
      if (queryString) {
        fullUrl += `${url.includes('?') ? '&' : '?'}${queryString}`;
      }
    }

    const response = await this.send(fullUrl);
    if (response.status !== 401) {
      return response;
    }

    this.clearToken();
    await this.fetchToken(new URL(TOKEN_PATH, fullUrl).toString());
    return this.send(fullUrl);
  }

  /**
   * Send one GET request with the current token, if any.
   */
  private async send(url: string): Promise<Response> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.accessToken) {
      headers['Authorization'] = `Bearer ${this.accessToken}`;
    }
    return this.fetchWithTimeout(url, { method: 'GET', headers });
  }

  /**
   * Request a client-credentials token and store it.
   */
  private async fetchToken(tokenUrl: string): Promise<void> {
    const credentials = Buffer.from(`${this.clientId}:${this.clientSecret}`).toString('base64');
    const response = await this.fetchWithTimeout(tokenUrl, {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        Authorization: `Basic ${credentials}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
    });

    if (!response.ok) {
      throw new AuthenticationError(`Token request failed with HTTP ${response.status}`);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new AuthenticationError(
        `Token response is not JSON: ${errorMessage(error)}`
      );
    }
    const parsed = TokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new AuthenticationError('Token response has no access_token');
    }
    this.accessToken = parsed.data.access_token;
  }

  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    // Create abort controller for timeout
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (error instanceof PayPalError) {
        throw error;
      }

      if (error instanceof Error) {
        if (error.name === 'AbortError') {
          throw new NetworkError('Request timed out', error);
        }
        throw new NetworkError(error.message, error);
      }

      throw new NetworkError('Unknown network error');
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
