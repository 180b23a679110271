/**
 * `paypal-query` CLI Command
 *
 * Look up PayPal transactions and subscriptions by ID, or summarize every
 * transaction in a date range.
 *
 * Usage:
 *   paypal-query [options] [ids...]
 *
 * Options:
 *   -b, --begin <datetime>               - Start of the search (default: 24 hours before --end)
 *   -e, --end <datetime>                 - End of the search (default: now)
 *   -T, --transaction-fields <field>     - Transaction field group to show (repeatable)
 *   -S, --subscription-fields <field>    - Subscription field group to show (repeatable)
 *   -C, --config-file <path>             - INI configuration file
 *   -c, --config-section <name>          - Section of the configuration file (default: query)
 *   --loglevel <level>                   - Show logs at this level and above (default: info)
 *
 * `--start`, `--stop`, `--txn-fields`, `--sub-fields`, `--copyright` and
 * `--license` are accepted as hidden aliases.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { PayPalClient, type PayPalClientOptions, type PayPalCredentials } from '../client.js';
import { DEFAULT_CONFIG_SECTION, loadConfig } from '../config.js';
import { SubscriptionFields, TransactionFields } from '../fields.js';
import {
  createLogger,
  LOG_LEVELS,
  parseLogLevel,
  ROOT_LOGGER_NAME,
  type Logger,
  type LogLevel,
} from '../logger.js';
import { errorMessage, parseApiDate } from '../utils.js';
import { VERSION } from '../version.js';
import { dumpDocument, sortKeys, transactionDocument } from './documents.js';
import { ExitCode, reportFailure } from './exit-codes.js';
import { summarizeTransaction } from './summary.js';

export const PROGNAME = 'paypal-query';

const DAY_MS = 24 * 60 * 60 * 1000;

export const LICENSE_NOTICE = `
Copyright © 2020  Brett Smith

This program is free software: you can redistribute it and/or modify
it under the terms of the GNU Affero General Public License as published by
the Free Software Foundation, either version 3 of the License, or
(at your option) any later version.

This program is distributed in the hope that it will be useful,
but WITHOUT ANY WARRANTY; without even the implied warranty of
MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
GNU Affero General Public License for more details.

You should have received a copy of the GNU Affero General Public License
along with this program.  If not, see <https://www.gnu.org/licenses/>.`;

/**
 * Anything with a string `write`, such as `process.stdout`.
 */
export interface OutputStream {
  write(chunk: string): unknown;
}

export type ClientFactory = (
  config: PayPalCredentials,
  options: PayPalClientOptions
) => PayPalClient;

/**
 * Process surroundings of one run. Everything but the streams defaults to
 * the real process.
 */
export interface QueryIO {
  stdout: OutputStream;
  stderr: OutputStream;
  /** @default process.env */
  env?: NodeJS.ProcessEnv;
  /** @default () => new Date() */
  now?: () => Date;
  /** @default PayPalClient.fromConfig */
  createClient?: ClientFactory;
}

type QueryOptions = {
  begin?: Date;
  end?: Date;
  transactionFields: TransactionFields[];
  txnFields: TransactionFields[];
  subscriptionFields: SubscriptionFields[];
  subFields: SubscriptionFields[];
  configFile?: string;
  configSection: string;
  loglevel: LogLevel;
};

function parseDateArg(value: string): Date {
  try {
    return parseApiDate(value);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
}

function collectFields<S>(fromArg: (arg: string) => S): (value: string, previous: S[]) => S[] {
  return (value, previous) => {
    try {
      return [...previous, fromArg(value)];
    } catch (error) {
      throw new InvalidArgumentError(errorMessage(error));
    }
  };
}

function parseLevelArg(value: string): LogLevel {
  const level = parseLogLevel(value);
  if (level === undefined) {
    throw new InvalidArgumentError(`unknown loglevel '${value}'`);
  }
  return level;
}

/**
 * Build the command. Help, version and usage errors are written to `io`
 * and thrown as CommanderError instead of exiting the process.
 */
export function createProgram(io: QueryIO): Command {
  const program = new Command(PROGNAME);
  const versionText = `${PROGNAME} version ${VERSION}\n${LICENSE_NOTICE}`;

  // Parses a hidden alias and stores the result under the documented option.
  const aliasOf =
    <T>(key: string, parse: (value: string) => T) =>
    (value: string): T => {
      const parsed = parse(value);
      program.setOptionValueWithSource(key, parsed, 'cli');
      return parsed;
    };

  const showVersion = (): never => {
    io.stdout.write(`${versionText}\n`);
    throw new CommanderError(0, 'commander.version', versionText);
  };

  return program
    .description('Look up PayPal transactions and subscriptions')
    .version(versionText, '--version', 'Show program version and license information')
    .argument(
      '[ids...]',
      'IDs of PayPal objects to look up. Without any, summarize every transaction in the date range.'
    )
    .option('-b, --begin <datetime>', 'Datetime to begin the search, in ISO 8601 format', parseDateArg)
    .option('-e, --end <datetime>', 'Datetime to end the search, in ISO 8601 format', parseDateArg)
    .option(
      '-T, --transaction-fields <field>',
      `Only show these field(s) in transaction results. Repeatable. Choices are ${TransactionFields.choices().join(', ')}.`,
      collectFields(TransactionFields.fromArg),
      []
    )
    .option(
      '-S, --subscription-fields <field>',
      `Only show these field(s) in subscription results. Repeatable. Choices are ${SubscriptionFields.choices().join(', ')}.`,
      collectFields(SubscriptionFields.fromArg),
      []
    )
    .option('-C, --config-file <path>', 'Read client configuration from this INI file')
    .option(
      '-c, --config-section <name>',
      'Read client configuration from this section of the config file',
      DEFAULT_CONFIG_SECTION
    )
    .option(
      '--loglevel <level>',
      `Show logs at this level and above. Specify one of ${LOG_LEVELS.join(', ')}.`,
      parseLevelArg,
      'info'
    )
    .addOption(new Option('--start <datetime>').hideHelp().argParser(aliasOf('begin', parseDateArg)))
    .addOption(new Option('--stop <datetime>').hideHelp().argParser(aliasOf('end', parseDateArg)))
    .addOption(
      new Option('--txn-fields <field>').hideHelp().argParser(collectFields(TransactionFields.fromArg)).default([])
    )
    .addOption(
      new Option('--sub-fields <field>').hideHelp().argParser(collectFields(SubscriptionFields.fromArg)).default([])
    )
    .addOption(new Option('--copyright').hideHelp())
    .addOption(new Option('--license').hideHelp())
    .on('option:copyright', showVersion)
    .on('option:license', showVersion)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    });
}

/**
 * Run `paypal-query` and resolve to its exit code.
 *
 * @param argv - Arguments after the program name
 */
export async function main(argv: readonly string[], io: QueryIO): Promise<number> {
  const program = createProgram(io);
  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? ExitCode.OK : ExitCode.USAGE;
    }
    throw error;
  }

  const options = program.opts<QueryOptions>();
  const logger = createLogger({ level: options.loglevel, destination: io.stderr });
  try {
    await runQuery(program.args, options, io, logger);
  } catch (error) {
    return reportFailure(error, logger);
  }
  return ExitCode.OK;
}

async function runQuery(
  ids: readonly string[],
  options: QueryOptions,
  io: QueryIO,
  logger: Logger
): Promise<void> {
  const config = await loadConfig({
    path: options.configFile,
    section: options.configSection,
    env: io.env,
  });
  const createClient = io.createClient ?? PayPalClient.fromConfig;
  const paypal = createClient(config, { logger: logger.child({ name: `${ROOT_LOGGER_NAME}.client` }) });

  const now = io.now ?? (() => new Date());
  const end = options.end ?? now();
  const transactionFields = TransactionFields.combine([...options.transactionFields, ...options.txnFields]);
  const subscriptionFields = SubscriptionFields.combine([...options.subscriptionFields, ...options.subFields]);

  if (ids.length === 0) {
    const start = options.begin ?? new Date(end.getTime() - DAY_MS);
    const fields = transactionFields.union(TransactionFields.TRANSACTION);
    for await (const txn of paypal.iterTransactions(start, end, fields)) {
      for (const line of summarizeTransaction(txn)) {
        io.stdout.write(`${line}\n`);
      }
    }
    return;
  }

  for (const rawId of ids) {
    const paypalId = rawId.toUpperCase();
    if (paypalId.startsWith('I-')) {
      const subscription = await paypal.getSubscription(paypalId, subscriptionFields);
      io.stdout.write(dumpDocument(sortKeys(subscription)));
    } else {
      const txn = await paypal.getTransaction(paypalId, {
        start: options.begin,
        end,
        fields: transactionFields,
      });
      io.stdout.write(dumpDocument(transactionDocument(txn, transactionFields)));
    }
  }
}
