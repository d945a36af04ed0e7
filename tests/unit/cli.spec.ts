/**
 * Command Line Unit Tests
 *
 * @module tests/unit/cli.spec
 */

import { describe, it, expect, vi, beforeAll, afterAll, type Mock } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

// Mock logger
vi.mock('../../src/main/utils/logger', () => ({
  createLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
  logger: {
    setLevel: vi.fn(),
  },
}));

import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runCli, type CliIo } from '../../src/main/cli';
import { logger } from '../../src/main/utils/logger';
import {
  ACCOUNT_ID,
  cashTransaction,
  section,
  singleStatementDocument,
  successEnvelope,
  tradeDocument,
} from '../fixtures/flex-documents';

interface CapturedRun {
  code: number;
  stdout: string;
  stderr: string;
}

async function run(
  argv: string[],
  options: { env?: NodeJS.ProcessEnv; fetch?: typeof fetch } = {}
): Promise<CapturedRun> {
  let stdout = '';
  let stderr = '';
  const io: CliIo = {
    stdout: (text) => {
      stdout += text;
    },
    stderr: (text) => {
      stderr += text;
    },
    env: options.env ?? {},
    fetch: options.fetch,
    sleep: async () => undefined,
  };
  const code = await runCli(argv, io);
  return { code, stdout, stderr };
}

const TRADES_SUMMARY = {
  queryName: 'test-query',
  type: 'AF',
  statements: [
    {
      accountId: ACCOUNT_ID,
      fromDate: '2017-01-01',
      toDate: '2017-12-31',
      period: 'LastYear',
      sections: { Trades: 1 },
    },
  ],
  diagnostics: 0,
};

describe('runCli', () => {
  let directory: string;
  let tradesFile: string;

  beforeAll(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'flex-cli-'));
    tradesFile = path.join(directory, 'trades.xml');
    await fs.writeFile(tradesFile, tradeDocument(), 'utf-8');
  });

  afterAll(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  // ==========================================================================
  // General
  // ==========================================================================

  describe('general', () => {
    it('prints usage for --help', async () => {
      const result = await run(['--help']);

      expect(result.code).toBe(EXIT_OK);
      expect(result.stdout.startsWith('Usage:\n')).toBe(true);
      expect(result.stderr).toBe('');
    });

    it('applies the log level from the environment', async () => {
      await run(['-h'], { env: { FLEX_LOG_LEVEL: 'DEBUG' } });

      expect(logger.setLevel).toHaveBeenLastCalledWith('debug');
    });

    it('rejects a missing command', async () => {
      const result = await run([]);

      expect(result.code).toBe(EXIT_USAGE);
      expect(result.stderr.startsWith('error: No command given\n')).toBe(true);
    });

    it('rejects an unknown command', async () => {
      const result = await run(['export']);

      expect(result.code).toBe(EXIT_USAGE);
      expect(result.stderr.startsWith('error: Unknown command "export"\n')).toBe(true);
    });

    it('rejects an unknown flag', async () => {
      const result = await run(['parse', tradesFile, '--lenient']);

      expect(result.code).toBe(EXIT_USAGE);
      expect(result.stdout).toBe('');
    });

    it('rejects an invalid environment', async () => {
      const result = await run(['parse', tradesFile], { env: { FLEX_LOG_LEVEL: 'verbose' } });

      expect(result.code).toBe(EXIT_USAGE);
      expect(result.stderr.startsWith('error: invalid environment: logLevel: ')).toBe(true);
    });
  });

  // ==========================================================================
  // parse
  // ==========================================================================

  describe('parse', () => {
    it('prints the parsed response as JSON', async () => {
      const result = await run(['parse', tradesFile]);

      expect(result.code).toBe(EXIT_OK);
      expect(result.stdout.endsWith('}\n')).toBe(true);
      const output: unknown = JSON.parse(result.stdout);
      expect(output).toMatchObject({
        response: {
          queryName: 'test-query',
          FlexStatements: [
            {
              accountId: ACCOUNT_ID,
              fromDate: '2017-01-01',
              Trades: [{ quantity: '80', tradePrice: '4.61', tradeMoney: '368.8', orderTime: '2017-06-06T09:35:12' }],
            },
          ],
        },
        diagnostics: [],
      });
    });

    it('prints a summary', async () => {
      const result = await run(['parse', tradesFile, '--summary']);

      expect(result.code).toBe(EXIT_OK);
      expect(JSON.parse(result.stdout)).toEqual(TRADES_SUMMARY);
    });

    it('honours --date-format', async () => {
      const filePath = path.join(directory, 'cash.xml');
      await fs.writeFile(
        filePath,
        singleStatementDocument([section('CashTransactions', [cashTransaction('05/06/2017')])]),
        'utf-8'
      );

      const result = await run(['parse', filePath, '--date-format', 'legacy-dayfirst']);

      expect(result.code).toBe(EXIT_OK);
      expect(JSON.parse(result.stdout)).toMatchObject({
        response: { FlexStatements: [{ CashTransactions: [{ dateTime: '2017-06-05' }] }] },
      });
    });

    it('rejects an unknown date format', async () => {
      const result = await run(['parse', tradesFile, '--date-format', 'european']);

      expect(result.code).toBe(EXIT_USAGE);
      expect(result.stderr.startsWith('error: Unknown date format "european"\n')).toBe(true);
    });

    it('rejects --strict with --permissive', async () => {
      const result = await run(['parse', tradesFile, '--strict', '--permissive']);

      expect(result.code).toBe(EXIT_USAGE);
      expect(result.stderr.startsWith('error: --strict and --permissive cannot be combined\n')).toBe(true);
    });

    it('requires a file', async () => {
      const result = await run(['parse']);

      expect(result.code).toBe(EXIT_USAGE);
      expect(result.stderr.startsWith('error: parse needs a file\n')).toBe(true);
    });

    it('fails on a missing file', async () => {
      const result = await run(['parse', path.join(directory, 'missing.xml')]);

      expect(result.code).toBe(EXIT_FAILURE);
      expect(result.stderr.startsWith('error: ENOENT')).toBe(true);
    });

    it('reports parser errors with their code', async () => {
      const filePath = path.join(directory, 'broken.xml');
      await fs.writeFile(filePath, '<FlexQueryResponse queryName="q">', 'utf-8');

      const result = await run(['parse', filePath]);

      expect(result.code).toBe(EXIT_FAILURE);
      expect(result.stderr.startsWith('error: [FLEX_MALFORMED_XML] ')).toBe(true);
      expect(result.stdout).toBe('');
    });

    it('fails on drift under --strict', async () => {
      const filePath = path.join(directory, 'drift.xml');
      await fs.writeFile(filePath, tradeDocument({ newVendorField: 'x' }), 'utf-8');

      expect((await run(['parse', filePath])).code).toBe(EXIT_OK);
      const result = await run(['parse', filePath, '--strict']);

      expect(result.code).toBe(EXIT_FAILURE);
      expect(result.stderr.startsWith('error: [FLEX_UNDECLARED_ATTRIBUTE] ')).toBe(true);
    });
  });

  // ==========================================================================
  // download
  // ==========================================================================

  describe('download', () => {
    function serviceFetch(): Mock<typeof fetch> {
      return vi
        .fn<typeof fetch>()
        .mockResolvedValueOnce(new Response(successEnvelope('REF1', 'https://flex.test/GetStatement')))
        .mockResolvedValueOnce(new Response(tradeDocument()));
    }

    it('requires a token', async () => {
      const result = await run(['download', '--query', '42']);

      expect(result.code).toBe(EXIT_USAGE);
      expect(result.stderr.startsWith('error: --token: ')).toBe(true);
    });

    it('rejects a non-numeric query id', async () => {
      const result = await run(['download', '--token', 'test-token', '--query', 'abc']);

      expect(result.code).toBe(EXIT_USAGE);
      expect(result.stderr.startsWith('error: --query: Query ID must be numeric\n')).toBe(true);
    });

    it('prints the raw statement', async () => {
      const fetchMock = serviceFetch();

      const result = await run(['download', '--token', 'test-token', '--query', '42'], { fetch: fetchMock });

      expect(result.code).toBe(EXIT_OK);
      expect(result.stdout).toBe(tradeDocument());
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('reads credentials from the environment and summarizes', async () => {
      const fetchMock = serviceFetch();

      const result = await run(['download', '--summary'], {
        env: { FLEX_TOKEN: 'test-token', FLEX_QUERY_ID: '42' },
        fetch: fetchMock,
      });

      expect(result.code).toBe(EXIT_OK);
      expect(JSON.parse(result.stdout)).toEqual(TRADES_SUMMARY);
      expect(String(fetchMock.mock.calls[0]?.[0])).toContain('&q=42');
    });

    it('reports service errors with their code', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(new Response('unavailable', { status: 503 }));

      const result = await run(['download', '--token', 'test-token', '--query', '42'], { fetch: fetchMock });

      expect(result.code).toBe(EXIT_FAILURE);
      expect(result.stderr.startsWith('error: [FLEX_CLIENT_HTTP_ERROR] ')).toBe(true);
    });
  });
});
