/**
 * Flex Schema Registry
 *
 * Read-only lookup over the record declarations: which record an element
 * instantiates in the context of its parent, the declared fields, and
 * whether a child repeats. Built and frozen once at module load.
 *
 * @module shared/flex/registry
 */

import { FlexQueryResponseSchema } from './records';
import {
  describeField,
  type ChildBinding,
  type ContainerSchema,
  type EntryMap,
  type RecordSchema,
} from './schema';

/** Version of the declared vocabulary, reported by the CLI and in logs */
export const SCHEMA_VERSION = '2.0.0';

/** Result of any lookup on an element the registry does not declare */
export const UNMAPPED: unique symbol = Symbol('flex.unmapped');
export type Unmapped = typeof UNMAPPED;

export type EntrySchema = EntryMap[string];

export interface FieldDescription {
  readonly name: string;
  readonly type: string;
  readonly required: boolean;
}

export interface ChildDescription {
  readonly element: string;
  readonly repeat: boolean;
  /** Record types collected under this child, at any container depth */
  readonly records: readonly string[];
}

export interface RecordDescription {
  readonly name: string;
  readonly fields: readonly FieldDescription[];
  readonly children: readonly ChildDescription[];
}

// ============================================================================
// Helpers
// ============================================================================

function ownEntry<T>(map: { readonly [key: string]: T }, key: string): T | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }
  if (value instanceof Set || value instanceof Map) {
    return value;
  }
  Object.freeze(value);
  for (const key of Reflect.ownKeys(value)) {
    const child: unknown = Reflect.get(value, key);
    deepFreeze(child);
  }
  return value;
}

function recordsIn(schema: ContainerSchema): string[] {
  const names: string[] = [];
  for (const entry of Object.values(schema.entries)) {
    if (entry.kind === 'record') {
      names.push(entry.name);
    } else {
      names.push(...recordsIn(entry));
    }
  }
  return names;
}

// ============================================================================
// Registry
// ============================================================================

export class SchemaRegistry {
  readonly version: string;
  readonly root: RecordSchema;
  private readonly records = new Map<string, RecordSchema>();

  constructor(root: RecordSchema, version: string) {
    this.version = version;
    this.root = deepFreeze(root);
    this.indexRecord(root);
  }

  /**
   * Record instantiated by a document's root element
   */
  lookupRoot(element: string): RecordSchema | Unmapped {
    return element === this.root.name ? this.root : UNMAPPED;
  }

  /**
   * Binding of a child element directly under a record
   */
  lookupChild(parent: RecordSchema, element: string): ChildBinding | Unmapped {
    return ownEntry(parent.children, element) ?? UNMAPPED;
  }

  /**
   * Record or nested container for an element inside a container
   */
  lookupEntry(parent: ContainerSchema, element: string): EntrySchema | Unmapped {
    return ownEntry(parent.entries, element) ?? UNMAPPED;
  }

  /**
   * Declared record schema by record type name
   */
  lookupRecord(name: string): RecordSchema | Unmapped {
    return this.records.get(name) ?? UNMAPPED;
  }

  recordNames(): readonly string[] {
    return [...this.records.keys()];
  }

  describe(recordName: string): RecordDescription | undefined {
    const schema = this.records.get(recordName);
    if (!schema) return undefined;

    return {
      name: schema.name,
      fields: Object.entries(schema.fields).map(([name, field]) => ({
        name,
        type: describeField(field),
        required: field.required === true,
      })),
      children: Object.entries(schema.children).map(([element, binding]) => ({
        element,
        repeat: binding.repeat,
        records: binding.repeat ? recordsIn(binding.schema) : [binding.schema.name],
      })),
    };
  }

  private indexRecord(schema: RecordSchema): void {
    const existing = this.records.get(schema.name);
    if (existing) {
      if (existing !== schema) {
        throw new Error(`Record type ${schema.name} is declared twice`);
      }
      return;
    }
    this.records.set(schema.name, schema);

    for (const [element, binding] of Object.entries(schema.children)) {
      if (element !== binding.schema.name) {
        throw new Error(
          `${schema.name}: child ${element} is bound to element ${binding.schema.name}`
        );
      }
      if (binding.repeat) {
        this.indexContainer(binding.schema);
      } else {
        this.indexRecord(binding.schema);
      }
    }
  }

  private indexContainer(schema: ContainerSchema): void {
    for (const [element, entry] of Object.entries(schema.entries)) {
      if (element !== entry.name) {
        throw new Error(`${schema.name}: entry ${element} is bound to element ${entry.name}`);
      }
      if (entry.kind === 'record') {
        this.indexRecord(entry);
      } else {
        this.indexContainer(entry);
      }
    }
  }
}

/**
 * The process-wide registry of every declared Flex section
 */
export const flexRegistry = new SchemaRegistry(FlexQueryResponseSchema, SCHEMA_VERSION);
