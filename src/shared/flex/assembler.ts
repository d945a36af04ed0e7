/**
 * Flex Document Assembler
 *
 * Depth-first walk over a parsed XML tree that consults the schema registry
 * per element, coerces every declared attribute and appends records to their
 * parent's sequence in document order. Either the complete frozen graph is
 * returned or the first fatal condition is thrown; there is no partial result.
 *
 * @module shared/flex/assembler
 */

import type { ParseOptions } from '../types/config.types';
import { coerceField, coerceInteger, describeLocation, isBlank, type CoercedValue } from './coercion';
import type { FlexDiagnostic } from './diagnostics';
import { FLEX_PARSER_ERROR_CODES, FlexParserError, type FlexLocation } from './errors';
import { UNMAPPED, type SchemaRegistry } from './registry';
import { integer, type ContainerSchema, type RecordSchema } from './schema';
import { childText, type XmlElement } from './xml-tree';

export interface AssembledRecord {
  readonly [property: string]: AssembledValue;
}

export type AssembledValue =
  | CoercedValue
  | AssembledRecord
  | readonly AssembledRecord[]
  | null
  | undefined;

export interface AssembleResult {
  readonly record: AssembledRecord;
  readonly diagnostics: readonly FlexDiagnostic[];
}

/** Root element of the web service's status/error envelope */
export const STATUS_ENVELOPE_ELEMENT = 'FlexStatementResponse';

const COUNT_FIELD = integer();

// ============================================================================
// Assembler
// ============================================================================

class Assembler {
  private readonly diagnostics: FlexDiagnostic[] = [];
  private readonly report = (diagnostic: FlexDiagnostic): void => {
    this.diagnostics.push(diagnostic);
  };

  constructor(
    private readonly registry: SchemaRegistry,
    private readonly options: ParseOptions
  ) {}

  run(root: XmlElement): AssembleResult {
    const schema = this.registry.lookupRoot(root.name);
    if (schema === UNMAPPED) {
      throw unsupportedRoot(root, this.registry.root.name);
    }
    const record = this.buildRecord(root, schema, root.name);
    return { record, diagnostics: Object.freeze([...this.diagnostics]) };
  }

  private buildRecord(element: XmlElement, schema: RecordSchema, path: string): AssembledRecord {
    const output: { [property: string]: AssembledValue } = {};

    for (const [name, field] of Object.entries(schema.fields)) {
      const location: FlexLocation = { path, element: element.name, record: schema.name, field: name };
      const raw = element.attributes.get(name);

      if (raw === undefined || isBlank(raw, field, this.options)) {
        if (field.required) {
          throw new FlexParserError(
            FLEX_PARSER_ERROR_CODES.MISSING_REQUIRED_FIELD,
            `${describeLocation(location)}: required attribute is missing`,
            { ...location, raw }
          );
        }
        output[name] = null;
        continue;
      }
      output[name] = coerceField(raw, field, { options: this.options, location, report: this.report });
    }

    const extras = this.checkAttributes(element, path, schema.name, (name) =>
      Object.hasOwn(schema.fields, name)
    );
    this.buildChildren(element, schema, path, output);

    if (this.options.undeclaredAttributes === 'retain' && extras.length > 0) {
      output.extraAttributes = Object.freeze(Object.fromEntries(extras));
    }
    return Object.freeze(output);
  }

  private buildChildren(
    element: XmlElement,
    schema: RecordSchema,
    path: string,
    output: { [property: string]: AssembledValue }
  ): void {
    const sequences = new Map<string, AssembledRecord[]>();
    for (const [name, binding] of Object.entries(schema.children)) {
      if (binding.repeat) {
        sequences.set(name, []);
      } else {
        output[name] = null;
      }
    }

    const seen = new Set<string>();
    for (const child of element.children) {
      const childPath = `${path}/${child.name}`;
      const binding = this.registry.lookupChild(schema, child.name);
      if (binding === UNMAPPED) {
        this.unmapped(child, childPath);
        continue;
      }

      if (binding.repeat) {
        const sequence = sequences.get(child.name) ?? [];
        sequences.set(child.name, sequence);
        this.collect(child, binding.schema, childPath, sequence);
        continue;
      }

      if (seen.has(child.name)) {
        throw new FlexParserError(
          FLEX_PARSER_ERROR_CODES.DUPLICATE_ELEMENT,
          `${child.name} appears more than once in ${schema.name} at ${path}`,
          { path: childPath, element: child.name, record: schema.name }
        );
      }
      seen.add(child.name);
      output[child.name] = this.buildRecord(child, binding.schema, childPath);
    }

    for (const [name, sequence] of sequences) {
      output[name] = Object.freeze(sequence);
    }
  }

  /**
   * Append every record under a container, at any depth, to `into`
   */
  private collect(
    element: XmlElement,
    schema: ContainerSchema,
    path: string,
    into: AssembledRecord[]
  ): void {
    const declaredCount = this.readCount(element, schema, path);
    this.checkAttributes(element, path, undefined, (name) => name === schema.countAttribute);

    const start = into.length;
    const indices = new Map<string, number>();
    for (const child of element.children) {
      const entry = this.registry.lookupEntry(schema, child.name);
      if (entry === UNMAPPED) {
        this.unmapped(child, `${path}/${child.name}`);
        continue;
      }
      if (entry.kind === 'container') {
        this.collect(child, entry, `${path}/${child.name}`, into);
        continue;
      }

      const index = indices.get(child.name) ?? 0;
      indices.set(child.name, index + 1);
      into.push(this.buildRecord(child, entry, `${path}/${child.name}[${index}]`));
    }

    const produced = into.length - start;
    if (declaredCount !== undefined && declaredCount !== produced) {
      throw new FlexParserError(
        FLEX_PARSER_ERROR_CODES.COUNT_MISMATCH,
        `${schema.name} at ${path} declares ${declaredCount} entries but holds ${produced}`,
        { path, element: element.name, details: { declared: declaredCount, actual: produced } }
      );
    }
  }

  private readCount(element: XmlElement, schema: ContainerSchema, path: string): number | undefined {
    if (schema.countAttribute === undefined) return undefined;
    const raw = element.attributes.get(schema.countAttribute);
    if (raw === undefined || raw.trim() === '') return undefined;

    const location: FlexLocation = { path, element: element.name, field: schema.countAttribute };
    return coerceInteger(raw.trim(), COUNT_FIELD, { options: this.options, location, report: this.report });
  }

  /**
   * Apply the undeclared-attribute policy and return the undeclared pairs
   */
  private checkAttributes(
    element: XmlElement,
    path: string,
    record: string | undefined,
    isDeclared: (name: string) => boolean
  ): Array<[string, string]> {
    const extras: Array<[string, string]> = [];
    for (const [name, raw] of element.attributes) {
      if (isDeclared(name)) continue;

      const location: FlexLocation = { path, element: element.name, record, field: name };
      const message = `${describeLocation(location)}: attribute is not declared`;
      if (this.options.undeclaredAttributes === 'error') {
        throw new FlexParserError(FLEX_PARSER_ERROR_CODES.UNDECLARED_ATTRIBUTE, message, {
          ...location,
          raw,
        });
      }
      this.report({ kind: 'undeclared-attribute', ...location, raw, message });
      extras.push([name, raw]);
    }
    return extras;
  }

  private unmapped(element: XmlElement, path: string): void {
    const message = `${element.name} at ${path} is not a declared element`;
    if (this.options.unmappedElements === 'error') {
      throw new FlexParserError(FLEX_PARSER_ERROR_CODES.UNMAPPED_ELEMENT, message, {
        path,
        element: element.name,
      });
    }
    this.report({ kind: 'unmapped-element', path, element: element.name, raw: element.name, message });
  }
}

function unsupportedRoot(root: XmlElement, expected: string): FlexParserError {
  if (root.name === STATUS_ENVELOPE_ELEMENT) {
    const status = childText(root, 'Status');
    const errorCode = childText(root, 'ErrorCode');
    const errorMessage = childText(root, 'ErrorMessage');
    return new FlexParserError(
      FLEX_PARSER_ERROR_CODES.UNSUPPORTED_DOCUMENT,
      `Document is a ${STATUS_ENVELOPE_ELEMENT} (status ${status ?? 'unknown'}` +
        `${errorCode ? `, code ${errorCode}: ${errorMessage ?? ''}` : ''}), not a ${expected}`,
      { path: root.name, element: root.name, details: { status, errorCode, errorMessage } }
    );
  }
  return new FlexParserError(
    FLEX_PARSER_ERROR_CODES.UNSUPPORTED_DOCUMENT,
    `Root element ${root.name} is not a ${expected}`,
    { path: root.name, element: root.name }
  );
}

/**
 * Assemble a typed record graph from a parsed tree
 *
 * @throws FlexParserError on the first fatal condition
 */
export function assemble(tree: XmlElement, registry: SchemaRegistry, options: ParseOptions): AssembleResult {
  return new Assembler(registry, options).run(tree);
}
