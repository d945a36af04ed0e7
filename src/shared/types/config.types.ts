/**
 * Configuration Types for the Flex Statement Parser
 *
 * Zod schemas for every option set the parser, the retrieval client and the
 * command line accept, with their defaults.
 *
 * @module shared/types/config.types
 * @security SEC-014: Strict input validation schemas
 */

import { z } from 'zod';

// ============================================================================
// Parse Options
// ============================================================================

/**
 * How slash-separated dates are read
 * - iso: only `yyyy-MM-dd` / `yyyyMMdd`; slash dates fail
 * - legacy: `MM/dd/yyyy`
 * - legacy-dayfirst: `dd/MM/yyyy`
 * - auto: month-first unless a group over 12 decides otherwise
 */
export const DateFormatModeSchema = z.enum(['iso', 'legacy', 'legacy-dayfirst', 'auto']);
export type DateFormatMode = z.infer<typeof DateFormatModeSchema>;

/**
 * Date/time separator
 * SEC-014: Exactly one character that cannot occur inside a date or time
 */
export const DateTimeSeparatorSchema = z
  .string()
  .length(1, 'Date/time separator must be a single character')
  .refine((value) => !/[0-9\-/:]/.test(value), 'Date/time separator cannot be a digit, "-", "/" or ":"');

export const ParseOptionsSchema = z
  .object({
    dateFormat: DateFormatModeSchema.default('auto'),
    /** Fail on slash dates that read both ways under `auto` */
    strictAmbiguity: z.boolean().default(true),
    dateTimeSeparator: DateTimeSeparatorSchema.default(';'),
    trimText: z.boolean().default(true),
    /** `packed`: code lists are runs of one-character codes with no separator */
    codeListLayout: z.enum(['delimited', 'packed']).default('delimited'),
    unmappedElements: z.enum(['skip', 'error']).default('skip'),
    undeclaredAttributes: z.enum(['discard', 'retain', 'error']).default('discard'),
    unrecognizedCodes: z.enum(['accept', 'error']).default('accept'),
  })
  .strict();

export type ParseOptions = z.output<typeof ParseOptionsSchema>;
export type ParseOptionsInput = z.input<typeof ParseOptionsSchema>;

export const DEFAULT_PARSE_OPTIONS: ParseOptions = Object.freeze(ParseOptionsSchema.parse({}));

/** Every drift condition is fatal */
export const STRICT_PARSE_OPTIONS: ParseOptions = Object.freeze({
  ...DEFAULT_PARSE_OPTIONS,
  unmappedElements: 'error',
  undeclaredAttributes: 'error',
  unrecognizedCodes: 'error',
});

/** Undeclared attributes are kept on the record */
export const PERMISSIVE_PARSE_OPTIONS: ParseOptions = Object.freeze({
  ...DEFAULT_PARSE_OPTIONS,
  undeclaredAttributes: 'retain',
});

// ============================================================================
// Retrieval Client
// ============================================================================

/**
 * Flex Web Service base URL
 * SEC-014: HTTPS required (HTTP only allowed for localhost)
 */
export const ServiceUrlSchema = z
  .string()
  .min(1, 'Service URL is required')
  .max(500, 'Service URL too long')
  .url('Invalid URL format')
  .refine((url) => {
    const isLocalhost = url.includes('localhost') || url.includes('127.0.0.1');
    if (isLocalhost) {
      return url.startsWith('http://') || url.startsWith('https://');
    }
    return url.startsWith('https://');
  }, 'Service URL must use HTTPS (HTTP only allowed for localhost)');

/**
 * Flex Web Service token
 * SEC-014: Pattern validation
 */
export const FlexTokenSchema = z
  .string()
  .min(1, 'Token is required')
  .max(200, 'Token too long')
  .regex(/^[a-zA-Z0-9_\-.]+$/, 'Token contains invalid characters');

export const FlexQueryIdSchema = z
  .string()
  .min(1, 'Query ID is required')
  .max(50, 'Query ID too long')
  .regex(/^[0-9]+$/, 'Query ID must be numeric');

export const FlexClientConfigSchema = z.object({
  baseUrl: ServiceUrlSchema.default('https://gdcdyn.interactivebrokers.com/Universal/servlet'),
  /** Statement polls before giving up */
  maxPollAttempts: z.number().int().min(1).max(100).default(20),
  /** Wait after a "statement not ready" answer */
  busyRetryDelayMs: z.number().int().min(0).max(600_000).default(5_000),
  /** Wait after a "too many requests" answer */
  throttledRetryDelayMs: z.number().int().min(0).max(600_000).default(10_000),
  /** Timeout of the first attempt; attempt n waits n times as long */
  requestTimeoutMs: z.number().int().min(100).max(300_000).default(5_000),
  /** Attempts per HTTP call, repeated on timeout only */
  maxRequestAttempts: z.number().int().min(1).max(10).default(3),
  userAgent: z.string().min(1).max(200).default('Java'),
});

export type FlexClientConfig = z.output<typeof FlexClientConfigSchema>;
export type FlexClientConfigInput = z.input<typeof FlexClientConfigSchema>;

export const DEFAULT_FLEX_CLIENT_CONFIG: FlexClientConfig = Object.freeze(
  FlexClientConfigSchema.parse({})
);

// ============================================================================
// Command Line Environment
// ============================================================================

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevelName = z.infer<typeof LogLevelSchema>;

export const CliConfigSchema = z.object({
  token: FlexTokenSchema.optional(),
  queryId: FlexQueryIdSchema.optional(),
  logLevel: LogLevelSchema.default('info'),
});

export type CliConfig = z.output<typeof CliConfigSchema>;

/**
 * Read command line defaults from the environment. Empty variables count as
 * unset.
 *
 * @throws ZodError on invalid values
 */
export function loadCliConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  return CliConfigSchema.parse({
    token: read('FLEX_TOKEN'),
    queryId: read('FLEX_QUERY_ID'),
    logLevel: read('FLEX_LOG_LEVEL')?.toLowerCase(),
  });
}

/**
 * Safe validation of parse options that returns a result object
 */
export function safeValidateParseOptions(data: unknown) {
  return ParseOptionsSchema.safeParse(data);
}
