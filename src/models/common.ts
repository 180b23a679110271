import { z } from 'zod';

/**
 * Any value that can appear in a parsed PayPal JSON response.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | JsonObject;

/**
 * A parsed JSON object. Responses are treated as read-only trees.
 */
export interface JsonObject {
  readonly [key: string]: JsonValue;
}

/**
 * Narrow an unknown value to a JSON object (not an array, not null).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * PayPal API hosts.
 */
export const PayPalSite = {
  /** Developer sandbox */
  SANDBOX: 'api-m.sandbox.paypal.com',
  /** Production */
  LIVE: 'api-m.paypal.com',
} as const;

export type PayPalSite = (typeof PayPalSite)[keyof typeof PayPalSite];

/**
 * Root URL for a PayPal site.
 */
export function siteUrl(site: PayPalSite): string {
  return `https://${site}`;
}

/**
 * One `{ issue, location }` entry in an error response.
 */
export const PayPalErrorDetailSchema = z
  .object({
    issue: z.string(),
    location: z.string().optional(),
    field: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough();

/**
 * Error payload PayPal returns with non-2xx responses.
 *
 * @example
 * { "name": "INVALID_REQUEST", "message": "Request is not well-formed",
 *   "debug_id": "90957fca61718",
 *   "details": [{ "issue": "INVALID_PARAMETER_VALUE", "location": "query" }] }
 */
export const PayPalErrorBodySchema = z
  .object({
    name: z.string(),
    message: z.string(),
    debug_id: z.string().optional(),
    details: z.array(PayPalErrorDetailSchema).optional(),
  })
  .passthrough();

export type PayPalErrorBody = z.infer<typeof PayPalErrorBodySchema>;
