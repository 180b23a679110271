/**
 * Unit tests for the paypal-query CLI.
 */

import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { describe, it, expect } from 'vitest';
import { PayPalClient } from '../src/client.js';
import { dumpDocument, sortKeys, transactionDocument } from '../src/cli/documents.js';
import { classifyError, ExitCode } from '../src/cli/exit-codes.js';
import { LICENSE_NOTICE, main, type QueryIO } from '../src/cli/query.js';
import { summarizeTransaction } from '../src/cli/summary.js';
import {
  APIError,
  AuthenticationError,
  ConfigError,
  NetworkError,
  ServerError,
  TransactionNotFoundError,
  UnknownFieldError,
} from '../src/errors.js';
import { TransactionFields } from '../src/fields.js';
import { Transaction } from '../src/models/transaction.js';
import {
  cartInfo,
  errorBody,
  FakeSession,
  logRecords,
  MemoryStream,
  payerInfo,
  searchPage,
  transactionInfo,
  type CannedResponse,
} from './helpers.js';

describe('summarizeTransaction()', () => {
  it('should list cart items and the fee under a header', () => {
    const txn = new Transaction({
      transaction_info: transactionInfo({ transactionId: 'TESTTXN000000001', value: '15.98' }),
      payer_info: payerInfo(),
      cart_info: cartInfo({ name: 'Widget', quantity: 2, unitValue: '7.99', totalValue: '15.98' }),
    });

    expect(summarizeTransaction(txn)).toEqual([
      '2020-10-02 14:15\tTESTTXN000000001\tSuccessful\tPayer Smith (payer@example.org)',
      '      Widget │ 15.98 USD (2 @ 7.99 USD)',
      '  PayPal Fee │ -0.49 USD',
    ]);
  });

  it('should name a cartless transaction after its subject', () => {
    const txn = new Transaction({
      transaction_info: transactionInfo({
        transactionId: 'TESTTXN000000002',
        value: '25.00',
        status: 'P',
        feeValue: null,
        subject: 'Monthly dues',
      }),
    });

    expect(summarizeTransaction(txn)).toEqual([
      '2020-10-02 14:15\tTESTTXN000000002\tPending',
      '  Monthly dues │ 25.00 USD',
    ]);
  });

  it('should fall back to "Gross Amount" and align columns', () => {
    const txn = new Transaction({
      transaction_info: transactionInfo({ transactionId: 'TESTTXN000000003' }),
      cart_info: {},
    });

    expect(summarizeTransaction(txn)).toEqual([
      '2020-10-02 14:15\tTESTTXN000000003\tSuccessful',
      '  Gross Amount │  5.00 USD',
      '    PayPal Fee │ -0.49 USD',
    ]);
  });

  it('should name items by description or code when unnamed', () => {
    const txn = new Transaction({
      transaction_info: transactionInfo({ transactionId: 'TESTTXN000000004', feeValue: null }),
      cart_info: {
        item_details: [
          { item_code: 'SKU-1', item_amount: { value: '1.00', currency_code: 'USD' } },
          { item_description: 'Sticker', item_amount: { value: '2.00', currency_code: 'USD' } },
        ],
      },
    });

    expect(summarizeTransaction(txn).slice(1)).toEqual(['    SKU-1 │ 1.00 USD', '  Sticker │ 2.00 USD']);
  });
});

describe('transactionDocument()', () => {
  const txn = new Transaction({
    transaction_info: { transaction_id: 'ABC123', transaction_status: 'S' },
    payer_info: { email_address: 'payer@example.org' },
    cart_info: {},
  });

  it('should order loaded groups for printing', () => {
    expect(Object.keys(transactionDocument(txn, TransactionFields.ALL))).toEqual([
      'payer_info',
      'transaction_info',
      'cart_info',
    ]);
  });

  it('should keep only the requested groups', () => {
    expect(transactionDocument(txn, TransactionFields.TRANSACTION)).toEqual({
      transaction_info: { transaction_id: 'ABC123', transaction_status: 'S' },
    });
  });
});

describe('dumpDocument()', () => {
  it('should start each document with a marker', () => {
    expect(dumpDocument({ id: 'I-TEST', status: 'ACTIVE' })).toBe('---\nid: I-TEST\nstatus: ACTIVE\n');
  });

  it('should sort nested keys with sortKeys', () => {
    expect(JSON.stringify(sortKeys({ b: 1, a: { d: [{ z: 1, y: 2 }], c: 3 } }))).toBe(
      '{"a":{"c":3,"d":[{"y":2,"z":1}]},"b":1}'
    );
  });
});

describe('classifyError()', () => {
  it.each([
    [new AuthenticationError(), ExitCode.NOPERM],
    [new APIError('FORBIDDEN: no', 403), ExitCode.NOPERM],
    [new APIError('BAD_REQUEST: no', 400), ExitCode.SOFTWARE],
    [new ServerError('INTERNAL_SERVER_ERROR: no', 500), ExitCode.UNAVAILABLE],
    [new NetworkError('fetch failed'), ExitCode.UNAVAILABLE],
    [new ConfigError("configuration missing 'client_id'"), ExitCode.CONFIG],
    [new TransactionNotFoundError('ABC'), ExitCode.SOFTWARE],
    [new UnknownFieldError('TransactionFields', 'bogus'), ExitCode.SOFTWARE],
    [Object.assign(new Error("ENOENT: no such file or directory, open '/x'"), { syscall: 'open' }), ExitCode.IOERR],
    [new Error('boom'), ExitCode.SOFTWARE],
  ])('should map %s to exit code %i', (error, exitCode) => {
    expect(classifyError(error).exitCode).toBe(exitCode);
  });

  it('should call unexpected errors internal', () => {
    expect(classifyError(new RangeError('boom'))).toEqual({
      exitCode: ExitCode.SOFTWARE,
      kind: 'internal RangeError',
      message: 'boom',
    });
  });
});

describe('main()', () => {
  const NOW = new Date('2020-10-02T12:00:00Z');

  function run(argv: string[], responses: CannedResponse[] = [], env: NodeJS.ProcessEnv = {}) {
    const session = new FakeSession(responses);
    const stdout = new MemoryStream();
    const stderr = new MemoryStream();
    const io: QueryIO = {
      stdout,
      stderr,
      now: () => NOW,
      env: {
        XDG_CONFIG_HOME: join(tmpdir(), 'paypal-rest-missing-config'),
        PAYPAL_CLIENT_ID: 'test-id',
        PAYPAL_CLIENT_SECRET: 'test-secret',
        ...env,
      },
      createClient: (_config, options) => new PayPalClient(session, options),
    };
    return { result: main(argv, io), session, stdout, stderr };
  }

  it('should print a subscription as YAML', async () => {
    const { result, session, stdout } = run(['i-bw452gllep1g'], [
      { body: { id: 'I-BW452GLLEP1G', status: 'ACTIVE' } },
    ]);

    expect(await result).toBe(ExitCode.OK);
    expect(stdout.text()).toBe('---\nid: I-BW452GLLEP1G\nstatus: ACTIVE\n');
    expect(session.requests[0].url.pathname).toBe('/v1/billing/subscriptions/I-BW452GLLEP1G');
    expect(session.requests[0].params).toEqual({ fields: 'last_failed_payment,plan' });
  });

  it('should print the requested groups of a transaction', async () => {
    const { result, session, stdout } = run(
      ['abc123', '-T', 'transaction', '--begin', '2020-10-01T00:00:00Z', '--end', '2020-10-02T00:00:00Z'],
      [
        searchPage([
          {
            transaction_info: { transaction_status: 'S', transaction_id: 'ABC123' },
            payer_info: { email_address: 'payer@example.org' },
          },
        ]),
      ]
    );

    expect(await result).toBe(ExitCode.OK);
    expect(stdout.text()).toBe('---\ntransaction_info:\n  transaction_id: ABC123\n  transaction_status: S\n');
    expect(session.requests[0].params).toEqual({
      transaction_id: 'ABC123',
      fields: 'transaction_info',
      start_date: '2020-10-01T00:00:00Z',
      end_date: '2020-10-02T00:00:00Z',
    });
  });

  it('should summarize the last day of transactions without ids', async () => {
    const { result, session, stdout } = run(
      ['-T', 'payer'],
      [
        searchPage([
          {
            transaction_info: transactionInfo({ transactionId: 'TESTTXN000000005', feeValue: null }),
            payer_info: payerInfo('Robin'),
          },
        ]),
      ]
    );

    expect(await result).toBe(ExitCode.OK);
    expect(stdout.text()).toBe(
      '2020-10-02 14:15\tTESTTXN000000005\tSuccessful\tRobin Smith (payer@example.org)\n' +
        '  Gross Amount │ 5.00 USD\n'
    );
    expect(session.requests[0].params).toEqual({
      fields: 'transaction_info,payer_info',
      start_date: '2020-10-01T12:00:00Z',
      end_date: '2020-10-02T12:00:00Z',
      page: '1',
    });
  });

  it('should exit 78 without credentials', async () => {
    const { result, stderr } = run(['I-TEST'], [], { PAYPAL_CLIENT_ID: undefined });

    expect(await result).toBe(ExitCode.CONFIG);
    const [record] = logRecords(stderr).filter((r) => r.level === 60);
    expect(record.msg).toBe("configuration error: configuration missing 'client_id'");
  });

  it('should exit 74 when the config file cannot be read', async () => {
    const { result } = run(['I-TEST', '-C', join(tmpdir(), 'paypal-rest-missing-config', 'nope.ini')]);

    expect(await result).toBe(ExitCode.IOERR);
  });

  it.each([
    [401, ExitCode.NOPERM],
    [403, ExitCode.NOPERM],
    [422, ExitCode.SOFTWARE],
    [503, ExitCode.UNAVAILABLE],
  ])('should map HTTP %i to exit code %i', async (status, exitCode) => {
    const { result, stderr } = run(['I-TEST'], [{ body: errorBody('TEST_ERROR'), status }]);

    expect(await result).toBe(exitCode);
    const fatal = logRecords(stderr).filter((r) => r.level === 60);
    expect(fatal.map((r) => r.msg)).toEqual(['PayPal API error: TEST_ERROR: Test error']);
  });

  it('should exit 70 when a transaction is not found', async () => {
    const { result, stderr } = run(
      ['NOSUCHTXN', '--begin', '2020-10-01T00:00:00Z', '--end', '2020-10-02T00:00:00Z'],
      [searchPage()]
    );

    expect(await result).toBe(ExitCode.SOFTWARE);
    const [record] = logRecords(stderr).filter((r) => r.level === 60);
    expect(record.msg).toBe("lookup error: transaction 'NOSUCHTXN' not found");
  });

  it.each([
    [['--bogus']],
    [['-T', 'bogus']],
    [['--loglevel', 'loud']],
    [['--end', 'yesterday']],
  ])('should exit 64 on a usage error: %j', async (argv) => {
    const { result, session, stderr } = run(argv);

    expect(await result).toBe(ExitCode.USAGE);
    expect(stderr.text()).toMatch(/^error: /);
    expect(session.requests).toHaveLength(0);
  });

  it('should accept loglevel aliases', async () => {
    const { result } = run(['I-TEST', '--loglevel', 'warning'], [{ body: { id: 'I-TEST' } }]);

    expect(await result).toBe(ExitCode.OK);
  });

  it.each(['--version', '--copyright', '--license'])('should print the version and license for %s', async (flag) => {
    const { result, session, stdout } = run([flag]);

    expect(await result).toBe(ExitCode.OK);
    expect(stdout.text()).toBe(`paypal-query version 1.1.0\n${LICENSE_NOTICE}\n`);
    expect(session.requests).toHaveLength(0);
  });

  it('should include the copyright line and full notice', () => {
    const lines = LICENSE_NOTICE.split('\n');

    expect(lines[1]).toBe('Copyright © 2020  Brett Smith');
    expect(lines[lines.length - 1]).toBe('along with this program.  If not, see <https://www.gnu.org/licenses/>.');
  });

  it('should accept the --start, --stop and --txn-fields aliases', async () => {
    const { result, session, stdout } = run(
      ['abc123', '--txn-fields', 'transaction', '--start', '2020-10-01T00:00:00Z', '--stop', '2020-10-02T00:00:00Z'],
      [searchPage([{ transaction_info: { transaction_id: 'ABC123' } }])]
    );

    expect(await result).toBe(ExitCode.OK);
    expect(stdout.text()).toBe('---\ntransaction_info:\n  transaction_id: ABC123\n');
    expect(session.requests[0].params).toEqual({
      transaction_id: 'ABC123',
      fields: 'transaction_info',
      start_date: '2020-10-01T00:00:00Z',
      end_date: '2020-10-02T00:00:00Z',
    });
  });

  it('should accept the --sub-fields alias', async () => {
    const { result, session } = run(['I-TEST', '--sub-fields', 'plan'], [{ body: { id: 'I-TEST' } }]);

    expect(await result).toBe(ExitCode.OK);
    expect(session.requests[0].params).toEqual({ fields: 'plan' });
  });

  it('should reject a malformed date given to an alias', async () => {
    const { result, stderr } = run(['--start', 'yesterday']);

    expect(await result).toBe(ExitCode.USAGE);
    expect(stderr.text()).toMatch(/^error: option '--start <datetime>' argument 'yesterday' is invalid/);
  });
});
