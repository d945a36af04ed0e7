#!/usr/bin/env node
/**
 * Command Line
 *
 *   flex-statement download --token T --query Q [--parse] [--summary] [--date-format MODE]
 *   flex-statement parse <file> [--strict | --permissive] [--summary] [--date-format MODE]
 *
 * Documents and JSON go to stdout, logs to stderr. Exit code 0 on success,
 * 1 on a fatal error, 2 on a usage error.
 *
 * @module main/cli
 */

import { parseArgs } from 'util';
import { ZodError } from 'zod';
import {
  DateFormatModeSchema,
  FlexQueryIdSchema,
  FlexTokenSchema,
  PERMISSIVE_PARSE_OPTIONS,
  STRICT_PARSE_OPTIONS,
  loadCliConfig,
  type ParseOptionsInput,
} from '../shared/types/config.types';
import { isFlexParserError } from '../shared/flex/errors';
import type { FlexParseResult } from '../shared/flex/parser';
import { FlexClient, FlexClientError } from './services/flex-client.service';
import { StatementService, summarizeStatement } from './services/statement.service';
import { logger } from './utils/logger';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const USAGE = `Usage:
  flex-statement download --token <token> --query <queryId> [--parse] [--summary] [--date-format <mode>]
  flex-statement parse <file> [--strict | --permissive] [--summary] [--date-format <mode>]

Date format modes: iso, legacy, legacy-dayfirst, auto
FLEX_TOKEN and FLEX_QUERY_ID supply --token and --query when omitted.
`;

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env?: NodeJS.ProcessEnv;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const OPTIONS = {
  token: { type: 'string' },
  query: { type: 'string' },
  parse: { type: 'boolean' },
  summary: { type: 'boolean' },
  strict: { type: 'boolean' },
  permissive: { type: 'boolean' },
  'date-format': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

type CliValues = ReturnType<typeof readArgs>['values'];

function parseOptionsFrom(values: CliValues): ParseOptionsInput {
  if (values.strict && values.permissive) {
    throw new UsageError('--strict and --permissive cannot be combined');
  }

  const base = values.strict ? STRICT_PARSE_OPTIONS : values.permissive ? PERMISSIVE_PARSE_OPTIONS : {};
  if (values['date-format'] === undefined) return base;

  const mode = DateFormatModeSchema.safeParse(values['date-format']);
  if (!mode.success) {
    throw new UsageError(`Unknown date format "${values['date-format']}"`);
  }
  return { ...base, dateFormat: mode.data };
}

function toJson(result: FlexParseResult, summary: boolean | undefined): string {
  const output = summary
    ? summarizeStatement(result.response, result.diagnostics.length)
    : { response: result.response, diagnostics: result.diagnostics };
  return `${JSON.stringify(output, null, 2)}\n`;
}

async function runParse(positionals: string[], values: CliValues, io: CliIo): Promise<number> {
  const [file, ...rest] = positionals;
  if (file === undefined) throw new UsageError('parse needs a file');
  if (rest.length > 0) throw new UsageError(`Unexpected argument "${rest[0]}"`);

  const service = new StatementService({ parseOptions: parseOptionsFrom(values) });
  const result = await service.parseFile(file);
  io.stdout(toJson(result, values.summary));
  return EXIT_OK;
}

async function runDownload(positionals: string[], values: CliValues, io: CliIo): Promise<number> {
  if (positionals.length > 0) throw new UsageError(`Unexpected argument "${positionals[0]}"`);

  const config = loadCliConfig(io.env);
  const token = FlexTokenSchema.safeParse(values.token ?? config.token);
  if (!token.success) throw new UsageError(`--token: ${token.error.issues[0]?.message ?? 'invalid'}`);
  const queryId = FlexQueryIdSchema.safeParse(values.query ?? config.queryId);
  if (!queryId.success) throw new UsageError(`--query: ${queryId.error.issues[0]?.message ?? 'invalid'}`);

  const client = new FlexClient({}, { fetch: io.fetch, sleep: io.sleep });
  const service = new StatementService({ parseOptions: parseOptionsFrom(values), client });

  if (values.parse || values.summary) {
    const { result } = await service.downloadAndParse(token.data, queryId.data);
    io.stdout(toJson(result, values.summary));
  } else {
    const body = await client.download(token.data, queryId.data);
    io.stdout(new TextDecoder('utf-8').decode(body));
  }
  return EXIT_OK;
}

/**
 * Run one command line invocation
 *
 * @returns Process exit code
 */
export async function runCli(argv: readonly string[], io: CliIo = defaultIo()): Promise<number> {
  try {
    const config = loadCliConfig(io.env);
    logger.setLevel(config.logLevel);

    const { values, positionals } = readArgs(argv);
    const [command, ...rest] = positionals;
    if (values.help) {
      io.stdout(USAGE);
      return EXIT_OK;
    }

    switch (command) {
      case 'parse':
        return await runParse(rest, values, io);
      case 'download':
        return await runDownload(rest, values, io);
      case undefined:
        throw new UsageError('No command given');
      default:
        throw new UsageError(`Unknown command "${command}"`);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`error: ${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    if (error instanceof ZodError) {
      io.stderr(`error: invalid environment: ${error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}\n`);
      return EXIT_USAGE;
    }
    if (isFlexParserError(error) || error instanceof FlexClientError) {
      io.stderr(`error: [${error.code}] ${error.message}\n`);
      return EXIT_FAILURE;
    }
    io.stderr(`error: ${error instanceof Error ? error.message : String(error)}\n`);
    return EXIT_FAILURE;
  }
}

function defaultIo(): CliIo {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
  };
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${String(error)}\n`);
      process.exitCode = EXIT_FAILURE;
    }
  );
}
