/**
 * Evaluates a compiled formula over one piece of text, line by line or as a
 * whole document. No I/O: the caller reads the text and decides what a
 * `sourceId` is (usually a file path).
 */

import type { PhraseBindingSet } from './bindings.js';
import type { CompiledFormula } from './compile.js';
import { evaluate } from './evaluator.js';

export type SearchMode = 'line' | 'document';

export const DOCUMENT_PREVIEW_LENGTH = 200;

export interface ScanOptions {
  readonly mode: SearchMode;
  /** Identifies the text in uniqueness keys. */
  readonly sourceId?: string;
  /** Report only the first occurrence of each unit. */
  readonly unique?: boolean;
  /**
   * Keys already reported. Pass the same set across texts to keep
   * uniqueness over a whole scan; it is updated in place.
   */
  readonly seen?: Set<string>;
}

export interface ScanMatch {
  /** 1-based in line mode, 0 for a document match. */
  readonly lineNumber: number;
  readonly text: string;
  readonly isUnique: boolean;
}

export function scanText(
  compiled: CompiledFormula,
  bindings: PhraseBindingSet,
  content: string,
  options: ScanOptions
): ScanMatch[] {
  const seen = options.seen ?? new Set<string>();
  const sourceId = options.sourceId ?? '';
  const unique = options.unique ?? false;
  const matches: ScanMatch[] = [];

  const record = (key: string, match: Omit<ScanMatch, 'isUnique'>): void => {
    const isUnique = !seen.has(key);
    if (isUnique) seen.add(key);
    if (!unique || isUnique) matches.push({ ...match, isUnique });
  };

  if (options.mode === 'document') {
    if (evaluate(compiled, bindings, content)) {
      record(sourceId, { lineNumber: 0, text: `${content.slice(0, DOCUMENT_PREVIEW_LENGTH)}...` });
    }
    return matches;
  }

  for (const [index, line] of splitLines(content).entries()) {
    if (!evaluate(compiled, bindings, line)) continue;
    const text = line.trim();
    record(`${sourceId}:${text}`, { lineNumber: index + 1, text });
  }
  return matches;
}

function splitLines(content: string): string[] {
  if (content === '') return [];
  const lines = content.split(/\r\n|\n|\r/);
  // A trailing newline ends the last line rather than starting an empty one.
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}
