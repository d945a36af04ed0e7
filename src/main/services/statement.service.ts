/**
 * Statement Service
 *
 * Reads Flex statements from disk or from the web service and hands them to
 * the parser, logging each step.
 *
 * @module main/services/statement
 * @security SEC-015: File size validated before reading
 */

import * as path from 'path';
import * as fs from 'fs/promises';
import type { ParseOptionsInput } from '../../shared/types/config.types';
import { FlexParser, type FlexParseResult } from '../../shared/flex/parser';
import type { FlexQueryResponse, FlexStatement } from '../../shared/flex/records';
import type { XmlInput } from '../../shared/flex/xml-tree';
import { createLogger } from '../utils/logger';
import { FlexClient } from './flex-client.service';

// ============================================================================
// Types
// ============================================================================

export interface StatementServiceOptions {
  parseOptions?: ParseOptionsInput;
  client?: FlexClient;
  /** Largest file parseFile will read */
  maxFileSizeBytes?: number;
}

export interface DownloadedStatement {
  body: Uint8Array;
  result: FlexParseResult;
}

export interface StatementSummary {
  queryName: string;
  type: string | null;
  statements: Array<{
    accountId: string;
    fromDate: string;
    toDate: string;
    period: string;
    /** Record count per non-empty section */
    sections: Record<string, number>;
  }>;
  diagnostics: number;
}

// ============================================================================
// Constants
// ============================================================================

/** Maximum file size to parse (200MB) - SEC-015 */
export const MAX_FILE_SIZE_BYTES = 200 * 1024 * 1024;

const log = createLogger('statement-service');

// ============================================================================
// Statement Service
// ============================================================================

export class StatementService {
  private readonly parser: FlexParser;
  private readonly client: FlexClient;
  private readonly maxFileSizeBytes: number;

  /**
   * @throws FlexParserError with code INVALID_OPTIONS
   */
  constructor(options: StatementServiceOptions = {}) {
    this.parser = new FlexParser({
      options: options.parseOptions,
      logger: createLogger('flex-parser'),
    });
    this.client = options.client ?? new FlexClient();
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? MAX_FILE_SIZE_BYTES;
  }

  /**
   * Parse a statement file
   *
   * @throws Error when the file exceeds the size limit
   * @throws FlexParserError on a fatal parse condition
   */
  async parseFile(filePath: string): Promise<FlexParseResult> {
    const fileName = path.basename(filePath);

    // SEC-015: Check file size limit
    const stats = await fs.stat(filePath);
    if (stats.size > this.maxFileSizeBytes) {
      throw new Error(
        `File exceeds maximum size limit of ${Math.floor(this.maxFileSizeBytes / (1024 * 1024))}MB`
      );
    }

    const content = await fs.readFile(filePath);
    return this.parseContent(new Uint8Array(content), fileName);
  }

  /**
   * Parse statement content already in memory
   */
  parseContent(input: XmlInput, source: string): FlexParseResult {
    const startTime = Date.now();
    try {
      const result = this.parser.parse(input);
      log.info('Statement parsed', {
        source,
        queryName: result.response.queryName,
        statements: result.response.FlexStatements.length,
        diagnostics: result.diagnostics.length,
        durationMs: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      log.error('Statement parsing failed', {
        source,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * Retrieve a statement from the web service and parse it
   *
   * @throws FlexClientError when retrieval fails
   * @throws FlexParserError on a fatal parse condition
   */
  async downloadAndParse(token: string, queryId: string): Promise<DownloadedStatement> {
    const body = await this.client.download(token, queryId);
    const result = this.parseContent(body, `query ${queryId}`);
    return { body, result };
  }
}

// ============================================================================
// Summaries
// ============================================================================

function sectionCounts(statement: FlexStatement): Record<string, number> {
  const sections: Record<string, number> = {};
  for (const [name, value] of Object.entries(statement)) {
    if (Array.isArray(value) && value.length > 0) {
      sections[name] = value.length;
    }
  }
  return sections;
}

/**
 * Condensed view of a parsed response for command line output
 */
export function summarizeStatement(
  response: FlexQueryResponse,
  diagnostics: number
): StatementSummary {
  return {
    queryName: response.queryName,
    type: response.type,
    statements: response.FlexStatements.map((statement) => ({
      accountId: statement.accountId,
      fromDate: statement.fromDate.toString(),
      toDate: statement.toDate.toString(),
      period: statement.period,
      sections: sectionCounts(statement),
    })),
    diagnostics,
  };
}
