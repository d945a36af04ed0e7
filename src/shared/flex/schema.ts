/**
 * Flex Schema Declarations
 *
 * A small declaration language for attribute-only XML records. Record and
 * container declarations are plain frozen data; the TypeScript types of the
 * parsed graph are derived from them with {@link RecordOf}, so the two can
 * never drift apart.
 *
 * @module shared/flex/schema
 */

import type Decimal from 'decimal.js';
import type { CodeTable, CodeValue } from './codes';
import type { LocalDate, LocalDateTime, LocalTime } from './temporal';

// ============================================================================
// Field Specs
// ============================================================================

export interface TextField {
  readonly kind: 'text';
  readonly required?: true;
}

export interface IntegerField {
  readonly kind: 'integer';
  readonly required?: true;
}

export interface DecimalField {
  readonly kind: 'decimal';
  readonly required?: true;
}

export interface BooleanField {
  readonly kind: 'boolean';
  readonly required?: true;
}

export interface DateField {
  readonly kind: 'date';
  readonly required?: true;
}

export interface TimeField {
  readonly kind: 'time';
  readonly required?: true;
}

export interface DateTimeField {
  readonly kind: 'datetime';
  readonly required?: true;
}

export interface CodeField<K extends string = string> {
  readonly kind: 'code';
  readonly table: CodeTable<K>;
  readonly required?: true;
}

export interface CodeListField<K extends string = string> {
  readonly kind: 'codes';
  readonly table: CodeTable<K>;
  /** Token separator for the delimited layout */
  readonly separator: string;
  readonly required?: true;
}

export type FieldSpec =
  | TextField
  | IntegerField
  | DecimalField
  | BooleanField
  | DateField
  | TimeField
  | DateTimeField
  | CodeField
  | CodeListField;

export type FieldKind = FieldSpec['kind'];

export const text = (): TextField => ({ kind: 'text' });
export const integer = (): IntegerField => ({ kind: 'integer' });
export const decimal = (): DecimalField => ({ kind: 'decimal' });
export const boolean = (): BooleanField => ({ kind: 'boolean' });
export const date = (): DateField => ({ kind: 'date' });
export const time = (): TimeField => ({ kind: 'time' });
export const dateTime = (): DateTimeField => ({ kind: 'datetime' });

export function code<K extends string>(table: CodeTable<K>): CodeField<K> {
  return { kind: 'code', table };
}

export function codes<K extends string>(table: CodeTable<K>, separator = ','): CodeListField<K> {
  return { kind: 'codes', table, separator };
}

/**
 * Mark a field mandatory: a produced record never holds `null` for it
 */
export function required<F extends FieldSpec>(field: F): F & { readonly required: true } {
  return { ...field, required: true as const };
}

/**
 * Human-readable name of a field's target type, used in errors and `describe`
 */
export function describeField(field: FieldSpec): string {
  switch (field.kind) {
    case 'code':
      return `code<${field.table.name}>`;
    case 'codes':
      return `codes<${field.table.name}>`;
    default:
      return field.kind;
  }
}

// ============================================================================
// Field Groups
// ============================================================================

export type FieldMap = { readonly [attribute: string]: FieldSpec };

/**
 * One decimal field per name
 */
export function decimals<N extends string>(...names: readonly N[]): { readonly [K in N]: DecimalField };
export function decimals(...names: readonly string[]): FieldMap {
  const fields: { [name: string]: DecimalField } = {};
  for (const name of names) {
    fields[name] = decimal();
  }
  return fields;
}

/**
 * A decimal field plus one per suffixed variant, e.g. `dividends`,
 * `dividendsMTD`, `dividendsYTD`
 */
export function decimalVariants<B extends string, S extends string>(
  base: B,
  suffixes: readonly S[]
): { readonly [K in B | `${B}${S}`]: DecimalField };
export function decimalVariants(base: string, suffixes: readonly string[]): FieldMap {
  const fields: { [name: string]: DecimalField } = { [base]: decimal() };
  for (const suffix of suffixes) {
    fields[`${base}${suffix}`] = decimal();
  }
  return fields;
}

// ============================================================================
// Records and Containers
// ============================================================================

/**
 * An element that becomes one typed record
 */
export interface RecordSchema<
  N extends string = string,
  F extends FieldMap = FieldMap,
  C extends ChildMap = ChildMap,
> {
  readonly kind: 'record';
  readonly name: N;
  readonly fields: F;
  readonly children: C;
}

/**
 * A section element whose entries (records or nested containers) are
 * collected into one ordered sequence
 */
export interface ContainerSchema<N extends string = string, E extends EntryMap = EntryMap> {
  readonly kind: 'container';
  readonly name: N;
  readonly entries: E;
  /** Attribute holding the declared number of entries, checked after assembly */
  readonly countAttribute?: string;
}

export type EntryMap = { readonly [element: string]: RecordSchema | ContainerSchema };

/** Child element appearing at most once; stored as the record or `null` */
export interface OneBinding<R extends RecordSchema = RecordSchema> {
  readonly repeat: false;
  readonly schema: R;
}

/** Container child; stored as a readonly array, `[]` when absent */
export interface ManyBinding<C extends ContainerSchema = ContainerSchema> {
  readonly repeat: true;
  readonly schema: C;
}

export type ChildBinding = OneBinding | ManyBinding;

/** Keyed by child element name, which is also the output property name */
export type ChildMap = { readonly [element: string]: ChildBinding };

export function record<N extends string, F extends FieldMap>(name: N, fields: F): RecordSchema<N, F, {}>;
export function record<N extends string, F extends FieldMap, C extends ChildMap>(
  name: N,
  fields: F,
  children: C
): RecordSchema<N, F, C>;
export function record(name: string, fields: FieldMap, children: ChildMap = {}): RecordSchema {
  return { kind: 'record', name, fields, children };
}

export function container<N extends string, E extends EntryMap>(
  name: N,
  entries: E,
  options: { countAttribute?: string } = {}
): ContainerSchema<N, E> {
  return { kind: 'container', name, entries, countAttribute: options.countAttribute };
}

export function one<R extends RecordSchema>(schema: R): OneBinding<R> {
  return { repeat: false, schema };
}

export function many<C extends ContainerSchema>(schema: C): ManyBinding<C> {
  return { repeat: true, schema };
}

// ============================================================================
// Derived Types
// ============================================================================

type Simplify<T> = { [K in keyof T]: T[K] } & {};

export type FieldValue<F> =
  F extends CodeListField<infer K>
    ? readonly CodeValue<K>[]
    : F extends CodeField<infer K>
      ? CodeValue<K>
      : F extends { readonly kind: 'text' }
        ? string
        : F extends { readonly kind: 'integer' }
          ? number
          : F extends { readonly kind: 'decimal' }
            ? Decimal
            : F extends { readonly kind: 'boolean' }
              ? boolean
              : F extends { readonly kind: 'date' }
                ? LocalDate
                : F extends { readonly kind: 'time' }
                  ? LocalTime
                  : F extends { readonly kind: 'datetime' }
                    ? LocalDateTime
                    : never;

export type FieldOutput<F> = F extends { readonly required: true }
  ? FieldValue<F>
  : FieldValue<F> | null;

/** Union of the record types a container collects, at any nesting depth */
export type ContainerElement<C> =
  C extends ContainerSchema<string, infer E>
    ? {
        [K in keyof E]: E[K] extends ContainerSchema
          ? ContainerElement<E[K]>
          : RecordOf<E[K]>;
      }[keyof E]
    : never;

export type ChildOutput<B> =
  B extends OneBinding<infer R>
    ? RecordOf<R> | null
    : B extends ManyBinding<infer C>
      ? readonly ContainerElement<C>[]
      : never;

/**
 * Attributes the schema does not declare, kept only under the `retain`
 * policy
 */
export interface ExtraAttributes {
  readonly extraAttributes?: Readonly<Record<string, string>>;
}

export type RecordOf<S> =
  S extends RecordSchema<string, infer F, infer C>
    ? Simplify<
        { readonly [K in keyof F]: FieldOutput<F[K]> } & {
          readonly [K in keyof C]: ChildOutput<C[K]>;
        } & ExtraAttributes
      >
    : never;
