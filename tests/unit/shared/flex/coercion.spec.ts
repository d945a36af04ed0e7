/**
 * Coercion Engine Unit Tests
 *
 * @module tests/unit/shared/flex/coercion.spec
 */

import { describe, it, expect, vi } from 'vitest';
import Decimal from 'decimal.js';
import {
  coerceField,
  describeLocation,
  isBlank,
  splitCodeList,
  type CoercionContext,
} from '../../../../src/shared/flex/coercion';
import { BuySellTable, NoteCodeTable } from '../../../../src/shared/flex/codes';
import type { FlexDiagnostic } from '../../../../src/shared/flex/diagnostics';
import { FLEX_PARSER_ERROR_CODES, FlexParserError } from '../../../../src/shared/flex/errors';
import {
  boolean,
  code,
  codes,
  date,
  dateTime,
  decimal,
  integer,
  text,
  time,
  type FieldSpec,
} from '../../../../src/shared/flex/schema';
import {
  DEFAULT_PARSE_OPTIONS,
  type ParseOptions,
} from '../../../../src/shared/types/config.types';

function context(overrides: Partial<ParseOptions> = {}) {
  const report = vi.fn<(diagnostic: FlexDiagnostic) => void>();
  const ctx: CoercionContext = {
    options: { ...DEFAULT_PARSE_OPTIONS, ...overrides },
    location: { path: 'Doc/Trades/Trade[0]', element: 'Trade', record: 'Trade', field: 'value' },
    report,
  };
  return { ctx, report };
}

function coercionFailure(raw: string, field: FieldSpec, overrides: Partial<ParseOptions> = {}): FlexParserError {
  const { ctx } = context(overrides);
  try {
    coerceField(raw, field, ctx);
  } catch (error) {
    if (error instanceof FlexParserError) return error;
    throw error;
  }
  throw new Error(`"${raw}" coerced without error`);
}

describe('describeLocation', () => {
  it('names record, field and path', () => {
    expect(
      describeLocation({ path: 'A/B[1]', element: 'B', record: 'Trade', field: 'quantity' })
    ).toBe('Trade.quantity at A/B[1]');
  });

  it('falls back to the element name', () => {
    expect(describeLocation({ path: 'A/B', element: 'B' })).toBe('B at A/B');
    expect(describeLocation({ path: 'A/B', element: 'B', field: 'count' })).toBe('B.count at A/B');
  });
});

describe('coerceField', () => {
  describe('decimal', () => {
    it('keeps exact values', () => {
      const { ctx } = context();
      const value = coerceField('368.8', decimal(), ctx);
      expect(value).toBeInstanceOf(Decimal);
      expect(String(value)).toBe('368.8');
      expect(String(coerceField('0.1', decimal(), ctx))).toBe('0.1');
    });

    it('accepts signs, exponents and thousands separators', () => {
      const { ctx } = context();
      expect(String(coerceField('-1,234.50', decimal(), ctx))).toBe('-1234.5');
      expect(String(coerceField('+2.5e3', decimal(), ctx))).toBe('2500');
      expect(String(coerceField(' 7 ', decimal(), ctx))).toBe('7');
    });

    it('rejects non-numeric text', () => {
      const error = coercionFailure('12abc', decimal());
      expect(error.code).toBe(FLEX_PARSER_ERROR_CODES.COERCION_FAILED);
      expect(error.raw).toBe('12abc');
      expect(error.targetType).toBe('decimal');
      expect(error.message).toBe('Trade.value at Doc/Trades/Trade[0]: "12abc" is not a decimal number');
    });

    it('rejects special values', () => {
      expect(coercionFailure('NaN', decimal()).code).toBe(FLEX_PARSER_ERROR_CODES.COERCION_FAILED);
      expect(coercionFailure('.5', decimal()).code).toBe(FLEX_PARSER_ERROR_CODES.COERCION_FAILED);
    });
  });

  describe('integer', () => {
    it('parses safe integers', () => {
      const { ctx } = context();
      expect(coerceField('-42', integer(), ctx)).toBe(-42);
    });

    it('rejects fractions and unsafe magnitudes', () => {
      expect(coercionFailure('1.5', integer()).targetType).toBe('integer');
      expect(coercionFailure('9007199254740993', integer()).code).toBe(
        FLEX_PARSER_ERROR_CODES.COERCION_FAILED
      );
    });
  });

  describe('boolean', () => {
    it('maps Y and N', () => {
      const { ctx } = context();
      expect(coerceField('Y', boolean(), ctx)).toBe(true);
      expect(coerceField('N', boolean(), ctx)).toBe(false);
    });

    it('rejects other spellings', () => {
      expect(coercionFailure('yes', boolean()).message).toBe(
        'Trade.value at Doc/Trades/Trade[0]: "yes" is not a boolean (expected Y or N)'
      );
    });
  });

  describe('text', () => {
    it('trims by default', () => {
      const { ctx } = context();
      expect(coerceField('  VXX ', text(), ctx)).toBe('VXX');
    });

    it('keeps whitespace when trimming is off', () => {
      const { ctx } = context({ trimText: false });
      expect(coerceField('  VXX ', text(), ctx)).toBe('  VXX ');
    });
  });

  describe('temporal', () => {
    it('coerces dates, times and date-times', () => {
      const { ctx } = context();
      expect(String(coerceField('20170606', date(), ctx))).toBe('2017-06-06');
      expect(String(coerceField('093512', time(), ctx))).toBe('09:35:12');
      expect(String(coerceField('20170606;093512', dateTime(), ctx))).toBe('2017-06-06T09:35:12');
    });

    it('raises AMBIGUOUS_DATE for a two-way slash date', () => {
      const error = coercionFailure('05/06/2017', date());
      expect(error.code).toBe(FLEX_PARSER_ERROR_CODES.AMBIGUOUS_DATE);
      expect(error.field).toBe('value');
      expect(error.targetType).toBe('date');
    });

    it('follows the configured date format', () => {
      const { ctx } = context({ dateFormat: 'legacy-dayfirst' });
      expect(String(coerceField('05/06/2017', date(), ctx))).toBe('2017-06-05');
    });

    it('uses the configured separator', () => {
      const { ctx } = context({ dateTimeSeparator: ',' });
      expect(String(coerceField('20170606,093512', dateTime(), ctx))).toBe('2017-06-06T09:35:12');
    });
  });

  describe('codes', () => {
    it('returns known codes', () => {
      const { ctx, report } = context();
      expect(coerceField('BUY', code(BuySellTable), ctx)).toEqual({ kind: 'known', code: 'BUY' });
      expect(report).not.toHaveBeenCalled();
    });

    it('carries unrecognized codes and reports them', () => {
      const { ctx, report } = context();
      expect(coerceField('SELL (Ex.)', code(BuySellTable), ctx)).toEqual({
        kind: 'unrecognized',
        raw: 'SELL (Ex.)',
      });
      expect(report).toHaveBeenCalledTimes(1);
      expect(report).toHaveBeenCalledWith({
        kind: 'unrecognized-code',
        path: 'Doc/Trades/Trade[0]',
        element: 'Trade',
        record: 'Trade',
        field: 'value',
        raw: 'SELL (Ex.)',
        message: '"SELL (Ex.)" is not a known BuySell code',
      });
    });

    it('fails unrecognized codes when configured to', () => {
      const error = coercionFailure('SELL (Ex.)', code(BuySellTable), { unrecognizedCodes: 'error' });
      expect(error.code).toBe(FLEX_PARSER_ERROR_CODES.UNRECOGNIZED_CODE);
      expect(error.targetType).toBe('code<BuySell>');
    });

    it('splits code lists in order, keeping duplicates', () => {
      const { ctx } = context();
      expect(coerceField('P;O;P', codes(NoteCodeTable, ';'), ctx)).toEqual([
        { kind: 'known', code: 'P' },
        { kind: 'known', code: 'O' },
        { kind: 'known', code: 'P' },
      ]);
    });

    it('reports each unknown token in a list', () => {
      const { ctx, report } = context();
      const value = coerceField('O;Zz;Qq', codes(NoteCodeTable, ';'), ctx);
      expect(value).toEqual([
        { kind: 'known', code: 'O' },
        { kind: 'unrecognized', raw: 'Zz' },
        { kind: 'unrecognized', raw: 'Qq' },
      ]);
      expect(report).toHaveBeenCalledTimes(2);
    });

    it('returns frozen lists', () => {
      const { ctx } = context();
      expect(Object.isFrozen(coerceField('O', codes(NoteCodeTable, ';'), ctx))).toBe(true);
    });
  });
});

describe('splitCodeList', () => {
  it('drops empty tokens', () => {
    expect(splitCodeList(';O;;P;', ';', DEFAULT_PARSE_OPTIONS)).toEqual(['O', 'P']);
    expect(splitCodeList('', ';', DEFAULT_PARSE_OPTIONS)).toEqual([]);
  });

  it('trims tokens', () => {
    expect(splitCodeList('Cash, Margin', ',', DEFAULT_PARSE_OPTIONS)).toEqual(['Cash', 'Margin']);
  });

  it('reads packed lists one character per code', () => {
    const packed = { ...DEFAULT_PARSE_OPTIONS, codeListLayout: 'packed' as const };
    expect(splitCodeList('OP', ';', packed)).toEqual(['O', 'P']);
  });
});

describe('isBlank', () => {
  it('treats whitespace-only scalars as blank', () => {
    expect(isBlank('  ', decimal(), DEFAULT_PARSE_OPTIONS)).toBe(true);
    expect(isBlank('', text(), DEFAULT_PARSE_OPTIONS)).toBe(true);
  });

  it('keeps whitespace text when trimming is off', () => {
    expect(isBlank('  ', text(), { ...DEFAULT_PARSE_OPTIONS, trimText: false })).toBe(false);
  });

  it('never treats a code list as blank', () => {
    expect(isBlank('', codes(NoteCodeTable, ';'), DEFAULT_PARSE_OPTIONS)).toBe(false);
  });
});
