/**
 * Flex Statement Parser
 *
 * Parses Flex Query XML documents into the typed, immutable
 * {@link FlexQueryResponse} graph.
 *
 * @module shared/flex/parser
 * @security DOCTYPE declarations rejected; attribute values never evaluated
 */

import {
  DEFAULT_PARSE_OPTIONS,
  ParseOptionsSchema,
  type ParseOptions,
  type ParseOptionsInput,
} from '../types/config.types';
import { assemble, type AssembledRecord } from './assembler';
import { countDiagnostics, summarizeDiagnostics, type FlexDiagnostic } from './diagnostics';
import { FLEX_PARSER_ERROR_CODES, FlexParserError } from './errors';
import type { FlexQueryResponse } from './records';
import { flexRegistry, type SchemaRegistry } from './registry';
import { readXmlTree, type XmlInput } from './xml-tree';

// ============================================================================
// Types
// ============================================================================

export interface FlexParseResult {
  readonly response: FlexQueryResponse;
  readonly diagnostics: readonly FlexDiagnostic[];
}

export interface FlexValidationResult {
  readonly isValid: boolean;
  readonly errors: readonly FlexParserError[];
  readonly diagnostics: readonly FlexDiagnostic[];
}

/**
 * Minimal logging surface the parser reports drift to
 */
export interface ParserLogger {
  warn(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

export interface FlexParserConfig {
  readonly options?: ParseOptionsInput;
  readonly registry?: SchemaRegistry;
  readonly logger?: ParserLogger;
}

// ============================================================================
// Options
// ============================================================================

/**
 * Validate and complete caller options
 *
 * @throws FlexParserError with code INVALID_OPTIONS
 */
export function resolveParseOptions(options?: ParseOptionsInput): ParseOptions {
  if (options === undefined) return DEFAULT_PARSE_OPTIONS;

  const result = ParseOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new FlexParserError(
      FLEX_PARSER_ERROR_CODES.INVALID_OPTIONS,
      `Invalid parse options: ${result.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`).join('; ')}`,
      { details: { issues: result.error.issues } }
    );
  }
  return Object.freeze(result.data);
}

function isFlexQueryResponse(record: AssembledRecord): record is FlexQueryResponse {
  return typeof record.queryName === 'string' && Array.isArray(record.FlexStatements);
}

// ============================================================================
// Parser Class
// ============================================================================

export class FlexParser {
  readonly options: ParseOptions;
  private readonly registry: SchemaRegistry;
  private readonly logger?: ParserLogger;

  constructor(config: FlexParserConfig = {}) {
    this.options = resolveParseOptions(config.options);
    this.registry = config.registry ?? flexRegistry;
    this.logger = config.logger;
  }

  /**
   * Parse a Flex Query document
   *
   * @throws FlexParserError on the first fatal condition
   */
  parse(input: XmlInput): FlexParseResult {
    const tree = readXmlTree(input);
    const { record, diagnostics } = assemble(tree, this.registry, this.options);

    if (!isFlexQueryResponse(record)) {
      throw new FlexParserError(
        FLEX_PARSER_ERROR_CODES.UNSUPPORTED_DOCUMENT,
        `Root element ${tree.name} did not produce a FlexQueryResponse`,
        { path: tree.name, element: tree.name }
      );
    }

    this.logDiagnostics(record, diagnostics);
    return { response: record, diagnostics };
  }

  /**
   * Parse without throwing; fatal conditions come back in `errors`
   */
  validate(input: XmlInput): FlexValidationResult {
    try {
      const { diagnostics } = this.parse(input);
      return { isValid: true, errors: [], diagnostics };
    } catch (error) {
      if (error instanceof FlexParserError) {
        return { isValid: false, errors: [error], diagnostics: [] };
      }
      throw error;
    }
  }

  private logDiagnostics(response: FlexQueryResponse, diagnostics: readonly FlexDiagnostic[]): void {
    if (!this.logger) return;

    const context = {
      queryName: response.queryName,
      statements: response.FlexStatements.length,
      schemaVersion: this.registry.version,
    };
    if (diagnostics.length === 0) {
      this.logger.debug('Flex document parsed', context);
      return;
    }
    this.logger.warn('Flex document parsed with schema drift', {
      ...context,
      counts: countDiagnostics(diagnostics),
      drift: summarizeDiagnostics(diagnostics),
    });
  }
}

// ============================================================================
// Exports
// ============================================================================

/**
 * Create a new Flex parser instance
 */
export function createFlexParser(config?: FlexParserConfig): FlexParser {
  return new FlexParser(config);
}

/**
 * Parse a Flex Query document (convenience function)
 */
export function parseFlexQueryResponse(input: XmlInput, options?: ParseOptionsInput): FlexParseResult {
  return createFlexParser({ options }).parse(input);
}

/**
 * Validate a Flex Query document (convenience function)
 */
export function validateFlexQueryResponse(
  input: XmlInput,
  options?: ParseOptionsInput
): FlexValidationResult {
  return createFlexParser({ options }).validate(input);
}
