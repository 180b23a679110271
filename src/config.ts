/**
 * Client Configuration
 *
 * Loads PayPal credentials from an optional INI file and the environment,
 * and validates them.
 *
 * @example config.ini
 * [query]
 * client_id = <client id>
 * client_secret = <secret>
 * site = live
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import ini from 'ini';
import { z } from 'zod';
import type { PayPalCredentials } from './client.js';
import { ConfigError } from './errors.js';

export const DEFAULT_CONFIG_SECTION = 'query';

const CONFIG_RELATIVE_PATH = join('paypal_rest', 'config.ini');

const ConfigSectionSchema = z.object({
  client_id: z.string().min(1).optional(),
  client_secret: z.string().min(1).optional(),
  site: z.string().min(1).optional(),
});

type ConfigSection = z.infer<typeof ConfigSectionSchema>;

const ConfigFileSchema = z.record(z.string(), ConfigSectionSchema.passthrough());

const EnvSchema = z.object({
  PAYPAL_CLIENT_ID: z.string().min(1).optional(),
  PAYPAL_CLIENT_SECRET: z.string().min(1).optional(),
  PAYPAL_SITE: z.string().min(1).optional(),
});

export interface LoadConfigOptions {
  /** Explicit config file; a missing file is then an error. */
  path?: string;
  /** @default 'query' */
  section?: string;
  /** @default process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Default config file location under `$XDG_CONFIG_HOME` (or `~/.config`).
 */
export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const configHome = env['XDG_CONFIG_HOME'] || join(homedir(), '.config');
  return join(configHome, CONFIG_RELATIVE_PATH);
}

/**
 * Read one section of an INI config file. Returns an empty section when the
 * section is absent, or when the file is missing and not `required`.
 */
export async function readConfigFile(
  path: string,
  section: string,
  required: boolean
): Promise<ConfigSection> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (!required && isNotFound(error)) {
      return {};
    }
    throw error;
  }

  // Settings outside a [section] fail the schema below.
  const document: unknown = ini.parse(text);
  const result = ConfigFileSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigError(`${path}: ${formatIssues(result.error)}`);
  }
  return result.data[section] ?? {};
}

/**
 * Load client credentials. Environment variables override the file.
 *
 * @throws {ConfigError} If the client ID or secret is not configured
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<PayPalCredentials> {
  const env = options.env ?? process.env;
  const section = options.section ?? DEFAULT_CONFIG_SECTION;
  const fromFile = await readConfigFile(
    options.path ?? defaultConfigPath(env),
    section,
    options.path !== undefined
  );

  const envResult = EnvSchema.safeParse(env);
  if (!envResult.success) {
    throw new ConfigError(`environment: ${formatIssues(envResult.error)}`);
  }
  const fromEnv = envResult.data;

  const clientId = fromEnv.PAYPAL_CLIENT_ID ?? fromFile.client_id;
  const clientSecret = fromEnv.PAYPAL_CLIENT_SECRET ?? fromFile.client_secret;
  const site = fromEnv.PAYPAL_SITE ?? fromFile.site;

  if (clientId === undefined) {
    throw new ConfigError("configuration missing 'client_id'");
  }
  if (clientSecret === undefined) {
    throw new ConfigError("configuration missing 'client_secret'");
  }
  return site === undefined ? { clientId, clientSecret } : { clientId, clientSecret, site };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function formatIssues(error: z.ZodError): string {
  return error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
