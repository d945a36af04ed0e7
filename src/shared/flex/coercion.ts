/**
 * Coercion Engine
 *
 * Converts one raw attribute string into the value its field declares.
 * Coercion is total over each type's grammar and fails with a located
 * {@link FlexParserError} otherwise. Unrecognized codes are reported to the
 * diagnostic sink instead of failing, unless the options say otherwise.
 *
 * @module shared/flex/coercion
 */

import Decimal from 'decimal.js';
import type { ParseOptions } from '../types/config.types';
import { knownCode, unrecognizedCode, type CodeTable, type CodeValue } from './codes';
import type { DiagnosticSink } from './diagnostics';
import { FLEX_PARSER_ERROR_CODES, FlexParserError, type FlexLocation } from './errors';
import { describeField, type FieldSpec } from './schema';
import {
  parseLocalDate,
  parseLocalDateTime,
  parseLocalTime,
  type DateParseSettings,
  type LocalDate,
  type LocalDateTime,
  type LocalTime,
  type TemporalParseResult,
} from './temporal';

export type CoercedValue =
  | string
  | number
  | boolean
  | Decimal
  | LocalDate
  | LocalTime
  | LocalDateTime
  | CodeValue
  | readonly CodeValue[];

export interface CoercionContext {
  readonly options: ParseOptions;
  readonly location: FlexLocation;
  readonly report: DiagnosticSink;
}

// ============================================================================
// Grammars
// ============================================================================

const DECIMAL_PATTERN = /^[+-]?\d+(\.\d+)?([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

const BOOLEAN_TOKENS: ReadonlyMap<string, boolean> = new Map([
  ['Y', true],
  ['N', false],
]);

/**
 * `Trade.quantity at FlexQueryResponse/.../Trade[0]`
 */
export function describeLocation(location: FlexLocation): string {
  const subject = location.field
    ? `${location.record ?? location.element}.${location.field}`
    : location.element;
  return `${subject} at ${location.path}`;
}

function coercionError(raw: string, field: FieldSpec, ctx: CoercionContext, reason: string): FlexParserError {
  const { location } = ctx;
  return new FlexParserError(
    FLEX_PARSER_ERROR_CODES.COERCION_FAILED,
    `${describeLocation(location)}: ${reason}`,
    { ...location, raw, targetType: describeField(field) }
  );
}

export function coerceDecimal(raw: string, field: FieldSpec, ctx: CoercionContext): Decimal {
  const digits = raw.replace(/,/g, '');
  if (!DECIMAL_PATTERN.test(digits)) {
    throw coercionError(raw, field, ctx, `"${raw}" is not a decimal number`);
  }
  return new Decimal(digits);
}

export function coerceInteger(raw: string, field: FieldSpec, ctx: CoercionContext): number {
  const value = Number(raw);
  if (!INTEGER_PATTERN.test(raw) || !Number.isSafeInteger(value)) {
    throw coercionError(raw, field, ctx, `"${raw}" is not an integer`);
  }
  return value;
}

export function coerceBoolean(raw: string, field: FieldSpec, ctx: CoercionContext): boolean {
  const value = BOOLEAN_TOKENS.get(raw);
  if (value === undefined) {
    throw coercionError(raw, field, ctx, `"${raw}" is not a boolean (expected Y or N)`);
  }
  return value;
}

function unwrapTemporal<T>(
  result: TemporalParseResult<T>,
  raw: string,
  field: FieldSpec,
  ctx: CoercionContext
): T {
  if (result.ok) return result.value;
  if (result.ambiguous) {
    const { location } = ctx;
    throw new FlexParserError(
      FLEX_PARSER_ERROR_CODES.AMBIGUOUS_DATE,
      `${describeLocation(location)}: ${result.reason}`,
      { ...location, raw, targetType: describeField(field) }
    );
  }
  throw coercionError(raw, field, ctx, result.reason);
}

function dateSettings(options: ParseOptions): DateParseSettings {
  return { mode: options.dateFormat, strictAmbiguity: options.strictAmbiguity };
}

export function coerceCode<K extends string>(
  raw: string,
  table: CodeTable<K>,
  ctx: CoercionContext
): CodeValue<K> {
  if (table.has(raw)) {
    return knownCode(raw);
  }

  const { location } = ctx;
  const message = `"${raw}" is not a known ${table.name} code`;
  if (ctx.options.unrecognizedCodes === 'error') {
    throw new FlexParserError(
      FLEX_PARSER_ERROR_CODES.UNRECOGNIZED_CODE,
      `${describeLocation(location)}: ${message}`,
      { ...location, raw, targetType: `code<${table.name}>` }
    );
  }
  ctx.report({ kind: 'unrecognized-code', ...location, raw, message });
  return unrecognizedCode(raw);
}

/**
 * Split a code list into tokens. Order and duplicates are kept; empty tokens
 * left by doubled or trailing separators are dropped.
 */
export function splitCodeList(raw: string, separator: string, options: ParseOptions): string[] {
  const tokens = options.codeListLayout === 'packed' ? Array.from(raw) : raw.split(separator);
  return tokens.map((token) => token.trim()).filter((token) => token !== '');
}

// ============================================================================
// Field Coercion
// ============================================================================

/**
 * Whether a present attribute counts as absent. Code lists treat an empty
 * attribute as an empty list, every other kind as absent.
 */
export function isBlank(raw: string, field: FieldSpec, options: ParseOptions): boolean {
  if (field.kind === 'codes') return false;
  const value = field.kind === 'text' && !options.trimText ? raw : raw.trim();
  return value === '';
}

/**
 * Coerce a present attribute to its declared type
 *
 * @throws FlexParserError with code COERCION_FAILED, AMBIGUOUS_DATE or
 * UNRECOGNIZED_CODE
 */
export function coerceField(raw: string, field: FieldSpec, ctx: CoercionContext): CoercedValue {
  const { options } = ctx;
  const value = field.kind === 'text' && !options.trimText ? raw : raw.trim();

  switch (field.kind) {
    case 'text':
      return value;
    case 'integer':
      return coerceInteger(value, field, ctx);
    case 'decimal':
      return coerceDecimal(value, field, ctx);
    case 'boolean':
      return coerceBoolean(value, field, ctx);
    case 'date':
      return unwrapTemporal(parseLocalDate(value, dateSettings(options)), value, field, ctx);
    case 'time':
      return unwrapTemporal(parseLocalTime(value), value, field, ctx);
    case 'datetime':
      return unwrapTemporal(
        parseLocalDateTime(value, options.dateTimeSeparator, dateSettings(options)),
        value,
        field,
        ctx
      );
    case 'code':
      return coerceCode(value, field.table, ctx);
    case 'codes':
      return Object.freeze(
        splitCodeList(value, field.separator, options).map((token) => coerceCode(token, field.table, ctx))
      );
  }
}
