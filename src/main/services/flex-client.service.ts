/**
 * Flex Web Service Client
 *
 * Retrieves Flex Query statements with the two-step web service protocol:
 * a SendRequest call returns a reference code, then GetStatement is polled
 * until the generated statement is ready. Only complete bodies are returned.
 *
 * @module main/services/flex-client
 * @security The access token is redacted from every log line
 */

import {
  FlexClientConfigSchema,
  type FlexClientConfig,
  type FlexClientConfigInput,
} from '../../shared/types/config.types';
import { FlexParserError } from '../../shared/flex/errors';
import { childText, readXmlTree } from '../../shared/flex/xml-tree';
import { createLogger } from '../utils/logger';

const log = createLogger('flex-client');

// ============================================================================
// Errors
// ============================================================================

export const FLEX_CLIENT_ERROR_CODES = {
  BAD_RESPONSE: 'FLEX_CLIENT_BAD_RESPONSE',
  RESPONSE_CODE: 'FLEX_CLIENT_RESPONSE_CODE',
  TIMEOUT: 'FLEX_CLIENT_TIMEOUT',
  HTTP_ERROR: 'FLEX_CLIENT_HTTP_ERROR',
  RETRIES_EXHAUSTED: 'FLEX_CLIENT_RETRIES_EXHAUSTED',
} as const;

export type FlexClientErrorCode =
  (typeof FLEX_CLIENT_ERROR_CODES)[keyof typeof FLEX_CLIENT_ERROR_CODES];

export class FlexClientError extends Error {
  readonly code: FlexClientErrorCode;
  /** Web service error code (e.g. `1012`) for RESPONSE_CODE errors */
  readonly responseCode?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: FlexClientErrorCode,
    message: string,
    options: { responseCode?: string; details?: Record<string, unknown> } = {}
  ) {
    super(message);
    this.name = 'FlexClientError';
    this.code = code;
    this.responseCode = options.responseCode;
    this.details = options.details;
    Object.setPrototypeOf(this, FlexClientError.prototype);
  }
}

// ============================================================================
// Web Service Codes
// ============================================================================

/** Error codes the web service documents, with its messages */
export const FLEX_SERVICE_ERRORS: ReadonlyMap<string, string> = new Map([
  ['1003', 'Statement is not available.'],
  ['1004', 'Statement is incomplete at this time. Please try again shortly.'],
  ['1005', 'Settlement data is not ready at this time. Please try again shortly.'],
  ['1006', 'FIFO P/L data is not ready at this time. Please try again shortly.'],
  ['1007', 'MTM P/L data is not ready at this time. Please try again shortly.'],
  ['1008', 'MTM and FIFO P/L data is not ready at this time. Please try again shortly.'],
  ['1009', 'The server is under heavy load. Statement could not be generated at this time. Please try again shortly.'],
  ['1010', 'Legacy Flex Queries are no longer supported. Please convert over to Activity Flex.'],
  ['1011', 'Service account is inactive.'],
  ['1012', 'Token has expired.'],
  ['1013', 'IP restriction.'],
  ['1014', 'Query is invalid.'],
  ['1015', 'Token is invalid.'],
  ['1016', 'Account in invalid.'],
  ['1017', 'Reference code is invalid.'],
  ['1018', 'Too many requests have been made from this token. Please try again shortly.'],
  ['1019', 'Statement generation in progress. Please try again shortly.'],
  ['1020', 'Invalid request or unable to validate request.'],
  ['1021', 'Statement could not be retrieved at this time. Please try again shortly.'],
]);

/** Statement not ready yet */
const SERVER_BUSY_CODES: ReadonlySet<string> = new Set(['1009', '1019']);
/** Too many requests from this token */
const CLIENT_THROTTLED_CODES: ReadonlySet<string> = new Set(['1018']);

const SEND_REQUEST_PATH = '/FlexStatementService.SendRequest';
const GET_STATEMENT_PATH = '/FlexStatementService.GetStatement';
const PROTOCOL_VERSION = '3';

// ============================================================================
// Types
// ============================================================================

export interface StatementAccess {
  readonly referenceCode: string;
  /** GetStatement endpoint the service asked us to poll, when it named one */
  readonly url: string | undefined;
}

export type StatementRequestResult =
  | { readonly kind: 'access'; readonly access: StatementAccess }
  | { readonly kind: 'document'; readonly body: Uint8Array };

interface StatementEnvelope {
  readonly status: string | undefined;
  readonly referenceCode: string | undefined;
  readonly url: string | undefined;
  readonly errorCode: string | undefined;
  readonly errorMessage: string | undefined;
}

export interface FlexClientDependencies {
  readonly fetch?: typeof fetch;
  readonly sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// Client
// ============================================================================

export class FlexClient {
  readonly config: FlexClientConfig;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  /**
   * @throws ZodError on invalid configuration
   */
  constructor(config: FlexClientConfigInput = {}, dependencies: FlexClientDependencies = {}) {
    this.config = FlexClientConfigSchema.parse(config);
    this.fetchImpl = dependencies.fetch ?? fetch;
    this.sleep = dependencies.sleep ?? defaultSleep;
  }

  /**
   * First step: ask the service to generate a statement
   *
   * @throws FlexClientError with code RESPONSE_CODE when the service refuses
   */
  async requestStatement(token: string, queryId: string): Promise<StatementRequestResult> {
    const body = await this.submit(`${this.baseUrl()}${SEND_REQUEST_PATH}`, token, queryId);
    const text = decodeBody(body);

    if (text.includes('<FlexQueryResponse')) {
      return { kind: 'document', body };
    }

    const envelope = readEnvelope(text);
    if (envelope.status === 'Success' && envelope.referenceCode) {
      log.info('Statement generation requested', { queryId, referenceCode: envelope.referenceCode });
      return {
        kind: 'access',
        access: { referenceCode: envelope.referenceCode, url: envelope.url || undefined },
      };
    }
    if (envelope.status === 'Fail' || envelope.status === 'Warn') {
      throw responseCodeError(envelope);
    }
    throw new FlexClientError(
      FLEX_CLIENT_ERROR_CODES.BAD_RESPONSE,
      `Unexpected SendRequest status ${envelope.status ?? '(none)'}`,
      { details: { status: envelope.status } }
    );
  }

  /**
   * Both steps: request a statement and poll until it is ready
   *
   * @returns The complete statement body
   * @throws FlexClientError
   */
  async download(token: string, queryId: string): Promise<Uint8Array> {
    const requested = await this.requestStatement(token, queryId);
    if (requested.kind === 'document') {
      return requested.body;
    }

    const { referenceCode, url } = requested.access;
    const statementUrl = url ?? `${this.baseUrl()}${GET_STATEMENT_PATH}`;

    let delayMs = 0;
    for (let attempt = 1; attempt <= this.config.maxPollAttempts; attempt++) {
      if (delayMs > 0) {
        await this.sleep(delayMs);
      }

      const body = await this.submit(statementUrl, token, referenceCode);
      const text = decodeBody(body);
      if (text.includes('<FlexQueryResponse')) {
        log.info('Statement downloaded', { referenceCode, bytes: body.byteLength, attempt });
        return body;
      }

      const envelope = readEnvelope(text);
      if (envelope.errorCode && SERVER_BUSY_CODES.has(envelope.errorCode)) {
        delayMs = this.config.busyRetryDelayMs;
      } else if (envelope.errorCode && CLIENT_THROTTLED_CODES.has(envelope.errorCode)) {
        delayMs = this.config.throttledRetryDelayMs;
      } else if (envelope.errorCode) {
        throw responseCodeError(envelope);
      } else {
        throw new FlexClientError(
          FLEX_CLIENT_ERROR_CODES.BAD_RESPONSE,
          'GetStatement returned neither a statement nor an error code'
        );
      }
      log.debug('Statement not ready, polling again', {
        referenceCode,
        attempt,
        errorCode: envelope.errorCode,
        delayMs,
      });
    }

    throw new FlexClientError(
      FLEX_CLIENT_ERROR_CODES.RETRIES_EXHAUSTED,
      `Statement ${referenceCode} was not ready after ${this.config.maxPollAttempts} polls`,
      { details: { referenceCode, attempts: this.config.maxPollAttempts } }
    );
  }

  private baseUrl(): string {
    return this.config.baseUrl.replace(/\/+$/, '');
  }

  /**
   * One protocol call. Attempt n times out after n x requestTimeoutMs and
   * only timeouts are retried.
   */
  private async submit(endpoint: string, token: string, query: string): Promise<Uint8Array> {
    const params = new URLSearchParams({ v: PROTOCOL_VERSION, t: token, q: query });
    const url = `${endpoint}?${params.toString()}`;
    const { maxRequestAttempts, requestTimeoutMs, userAgent } = this.config;

    for (let attempt = 1; attempt <= maxRequestAttempts; attempt++) {
      const timeout = requestTimeoutMs * attempt;
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        const response = await this.fetchImpl(url, {
          method: 'GET',
          headers: { 'User-Agent': userAgent },
          signal: controller.signal,
        });
        if (!response.ok) {
          throw new FlexClientError(
            FLEX_CLIENT_ERROR_CODES.HTTP_ERROR,
            `Flex Web Service answered HTTP ${response.status}`,
            { details: { status: response.status, endpoint } }
          );
        }
        return new Uint8Array(await response.arrayBuffer());
      } catch (error: unknown) {
        if (error instanceof FlexClientError) throw error;

        if (!controller.signal.aborted) {
          throw new FlexClientError(
            FLEX_CLIENT_ERROR_CODES.HTTP_ERROR,
            `Request to Flex Web Service failed: ${error instanceof Error ? error.message : String(error)}`,
            { details: { endpoint } }
          );
        }
        if (attempt >= maxRequestAttempts) {
          throw new FlexClientError(
            FLEX_CLIENT_ERROR_CODES.TIMEOUT,
            `Flex Web Service did not answer within ${timeout}ms`,
            { details: { endpoint, attempts: attempt } }
          );
        }
        log.warn('Request timed out, re-sending', { endpoint, attempt, timeoutMs: timeout });
      } finally {
        clearTimeout(timeoutId);
      }
    }

    // maxRequestAttempts is at least 1, so the loop always returns or throws
    throw new FlexClientError(FLEX_CLIENT_ERROR_CODES.TIMEOUT, 'No request attempt was made');
  }
}

// ============================================================================
// Helpers
// ============================================================================

function decodeBody(body: Uint8Array): string {
  return new TextDecoder('utf-8').decode(body);
}

function readEnvelope(text: string): StatementEnvelope {
  try {
    const root = readXmlTree(text);
    if (root.name !== 'FlexStatementResponse') {
      throw new FlexClientError(
        FLEX_CLIENT_ERROR_CODES.BAD_RESPONSE,
        `Unexpected response document ${root.name}`
      );
    }
    return {
      status: childText(root, 'Status'),
      referenceCode: childText(root, 'ReferenceCode'),
      url: childText(root, 'Url'),
      errorCode: childText(root, 'ErrorCode'),
      errorMessage: childText(root, 'ErrorMessage'),
    };
  } catch (error) {
    if (error instanceof FlexParserError) {
      throw new FlexClientError(FLEX_CLIENT_ERROR_CODES.BAD_RESPONSE, `Unreadable response: ${error.message}`);
    }
    throw error;
  }
}

function responseCodeError(envelope: StatementEnvelope): FlexClientError {
  const code = envelope.errorCode ?? 'unknown';
  const message = envelope.errorMessage || FLEX_SERVICE_ERRORS.get(code) || 'Unknown error';
  return new FlexClientError(FLEX_CLIENT_ERROR_CODES.RESPONSE_CODE, `Code=${code}: ${message}`, {
    responseCode: code,
    details: { status: envelope.status },
  });
}
