/**
 * Parse Diagnostics
 *
 * Non-fatal schema drift found while assembling a document, reported in
 * document order next to the parsed graph.
 *
 * @module shared/flex/diagnostics
 */

import type { FlexLocation } from './errors';

export const DIAGNOSTIC_KINDS = ['unmapped-element', 'undeclared-attribute', 'unrecognized-code'] as const;
export type DiagnosticKind = (typeof DIAGNOSTIC_KINDS)[number];

export interface FlexDiagnostic extends FlexLocation {
  readonly kind: DiagnosticKind;
  /** Offending attribute value, or the element name for unmapped elements */
  readonly raw: string;
  readonly message: string;
}

export type DiagnosticSink = (diagnostic: FlexDiagnostic) => void;

export type DiagnosticCounts = Readonly<Record<DiagnosticKind, number>>;

export function countDiagnostics(diagnostics: readonly FlexDiagnostic[]): DiagnosticCounts {
  const counts: Record<DiagnosticKind, number> = {
    'unmapped-element': 0,
    'undeclared-attribute': 0,
    'unrecognized-code': 0,
  };
  for (const diagnostic of diagnostics) {
    counts[diagnostic.kind] += 1;
  }
  return counts;
}

/**
 * One line per distinct kind and name, e.g.
 * `unrecognized-code Trade.buySell "SELL (Ex.)" x3`
 */
export function summarizeDiagnostics(diagnostics: readonly FlexDiagnostic[]): string[] {
  const tally = new Map<string, number>();
  for (const diagnostic of diagnostics) {
    const subject = diagnostic.field
      ? `${diagnostic.record ?? diagnostic.element}.${diagnostic.field}`
      : diagnostic.element;
    const key = `${diagnostic.kind} ${subject} "${diagnostic.raw}"`;
    tally.set(key, (tally.get(key) ?? 0) + 1);
  }
  return [...tally].map(([key, count]) => (count > 1 ? `${key} x${count}` : key));
}
