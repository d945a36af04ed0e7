/**
 * Schema Registry Unit Tests
 *
 * @module tests/unit/shared/flex/registry.spec
 */

import { describe, it, expect } from 'vitest';
import {
  FlexQueryResponseSchema,
  FlexStatementSchema,
  TradeSchema,
} from '../../../../src/shared/flex/records';
import {
  SCHEMA_VERSION,
  SchemaRegistry,
  UNMAPPED,
  flexRegistry,
} from '../../../../src/shared/flex/registry';
import { container, many, one, record, text } from '../../../../src/shared/flex/schema';

describe('flexRegistry', () => {
  it('carries the schema version', () => {
    expect(flexRegistry.version).toBe(SCHEMA_VERSION);
  });

  it('resolves only the response root', () => {
    expect(flexRegistry.lookupRoot('FlexQueryResponse')).toBe(FlexQueryResponseSchema);
    expect(flexRegistry.lookupRoot('FlexStatement')).toBe(UNMAPPED);
  });

  it('resolves sections by element name', () => {
    const binding = flexRegistry.lookupChild(FlexStatementSchema, 'Trades');
    expect(binding).not.toBe(UNMAPPED);
    if (binding === UNMAPPED || !binding.repeat) throw new Error('Trades should repeat');
    expect(binding.schema.name).toBe('Trades');
    expect(flexRegistry.lookupEntry(binding.schema, 'Trade')).toBe(TradeSchema);
  });

  it('treats unknown and inherited names as unmapped', () => {
    expect(flexRegistry.lookupChild(FlexStatementSchema, 'ComplexPositions')).toBe(UNMAPPED);
    expect(flexRegistry.lookupChild(FlexStatementSchema, 'toString')).toBe(UNMAPPED);
    expect(flexRegistry.lookupChild(FlexStatementSchema, '__proto__')).toBe(UNMAPPED);
    expect(flexRegistry.lookupRecord('hasOwnProperty')).toBe(UNMAPPED);
  });

  it('indexes every record type once', () => {
    const names = flexRegistry.recordNames();
    expect(names).toHaveLength(25);
    expect(new Set(names).size).toBe(names.length);
    expect(names).toContain('FxLot');
    expect(names).toContain('ConversionRate');
    expect(flexRegistry.lookupRecord('Trade')).toBe(TradeSchema);
  });

  it('describes fields with their target types', () => {
    const description = flexRegistry.describe('ConversionRate');
    expect(description).toEqual({
      name: 'ConversionRate',
      fields: [
        { name: 'reportDate', type: 'date', required: true },
        { name: 'fromCurrency', type: 'code<Currency>', required: true },
        { name: 'toCurrency', type: 'code<Currency>', required: true },
        { name: 'rate', type: 'decimal', required: true },
      ],
      children: [],
    });
  });

  it('describes children with the records they collect', () => {
    const description = flexRegistry.describe('FlexStatement');
    const children = description?.children ?? [];
    expect(children.find((child) => child.element === 'AccountInformation')).toEqual({
      element: 'AccountInformation',
      repeat: false,
      records: ['AccountInformation'],
    });
    expect(children.find((child) => child.element === 'FxPositions')).toEqual({
      element: 'FxPositions',
      repeat: true,
      records: ['FxLot'],
    });
  });

  it('describes code list fields', () => {
    const fields = flexRegistry.describe('Trade')?.fields ?? [];
    expect(fields.find((field) => field.name === 'notes')).toEqual({
      name: 'notes',
      type: 'codes<NoteCode>',
      required: false,
    });
    expect(flexRegistry.describe('Unknown')).toBeUndefined();
  });

  it('is frozen', () => {
    expect(Object.isFrozen(FlexQueryResponseSchema)).toBe(true);
    expect(Object.isFrozen(TradeSchema.fields)).toBe(true);
    expect(Object.isFrozen(TradeSchema.fields.quantity)).toBe(true);
  });
});

describe('SchemaRegistry', () => {
  it('rejects two different records under one name', () => {
    const first = record('Leaf', { a: text() });
    const second = record('Leaf', { b: text() });
    const root = record(
      'Root',
      {},
      {
        Left: many(container('Left', { Leaf: first })),
        Right: many(container('Right', { Leaf: second })),
      }
    );
    expect(() => new SchemaRegistry(root, '1')).toThrow('Record type Leaf is declared twice');
  });

  it('accepts one record reached twice', () => {
    const leaf = record('Leaf', { a: text() });
    const root = record(
      'Root',
      {},
      {
        Left: many(container('Left', { Leaf: leaf })),
        Right: many(container('Right', { Leaf: leaf })),
      }
    );
    expect(new SchemaRegistry(root, '1').recordNames()).toEqual(['Root', 'Leaf']);
  });

  it('rejects a child bound under another element name', () => {
    const root = record('Root', {}, { Wrong: one(record('Right', {})) });
    expect(() => new SchemaRegistry(root, '1')).toThrow('Root: child Wrong is bound to element Right');
  });
});
