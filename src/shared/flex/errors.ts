/**
 * Flex Parser Errors
 *
 * Every fatal condition of a parse surfaces as a single {@link FlexParserError}
 * naming where in the document it happened.
 *
 * @module shared/flex/errors
 */

// ============================================================================
// Error Codes
// ============================================================================

export const FLEX_PARSER_ERROR_CODES = {
  MALFORMED_XML: 'FLEX_MALFORMED_XML',
  UNSUPPORTED_DOCUMENT: 'FLEX_UNSUPPORTED_DOCUMENT',
  MISSING_REQUIRED_FIELD: 'FLEX_MISSING_REQUIRED_FIELD',
  AMBIGUOUS_DATE: 'FLEX_AMBIGUOUS_DATE',
  COERCION_FAILED: 'FLEX_COERCION_FAILED',
  // Drift promoted to fatal by strict options
  UNMAPPED_ELEMENT: 'FLEX_UNMAPPED_ELEMENT',
  UNDECLARED_ATTRIBUTE: 'FLEX_UNDECLARED_ATTRIBUTE',
  UNRECOGNIZED_CODE: 'FLEX_UNRECOGNIZED_CODE',
  // Structural
  COUNT_MISMATCH: 'FLEX_COUNT_MISMATCH',
  DUPLICATE_ELEMENT: 'FLEX_DUPLICATE_ELEMENT',
  INVALID_OPTIONS: 'FLEX_INVALID_OPTIONS',
} as const;

export type FlexParserErrorCode =
  (typeof FLEX_PARSER_ERROR_CODES)[keyof typeof FLEX_PARSER_ERROR_CODES];

/**
 * Where in the document an error or diagnostic was raised
 */
export interface FlexLocation {
  /** Slash-separated element path with sibling indices, e.g. `.../Trades/Trade[2]` */
  readonly path: string;
  readonly element: string;
  readonly record?: string;
  readonly field?: string;
}

export interface FlexParserErrorInit extends Partial<FlexLocation> {
  readonly raw?: string;
  readonly targetType?: string;
  readonly details?: Record<string, unknown>;
}

// ============================================================================
// Parser Error Class
// ============================================================================

export class FlexParserError extends Error {
  readonly code: FlexParserErrorCode;
  readonly path?: string;
  readonly element?: string;
  readonly record?: string;
  readonly field?: string;
  readonly raw?: string;
  readonly targetType?: string;
  readonly details?: Record<string, unknown>;

  constructor(code: FlexParserErrorCode, message: string, init: FlexParserErrorInit = {}) {
    super(message);
    this.name = 'FlexParserError';
    this.code = code;
    this.path = init.path;
    this.element = init.element;
    this.record = init.record;
    this.field = init.field;
    this.raw = init.raw;
    this.targetType = init.targetType;
    this.details = init.details;
    Object.setPrototypeOf(this, FlexParserError.prototype);
  }
}

export function isFlexParserError(error: unknown): error is FlexParserError {
  return error instanceof FlexParserError;
}
