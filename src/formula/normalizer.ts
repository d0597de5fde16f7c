/**
 * Operator normalization.
 *
 * Symbolic operators become canonical word operators before tokenizing.
 * Replacement order matters: two-character symbols go first so `&&` never
 * turns into two `AND`s.
 */

const OPERATOR_REPLACEMENTS: ReadonlyArray<readonly [symbol: string, word: string]> = [
  ['&&', ' AND '],
  ['||', ' OR '],
  ['&', ' AND '],
  ['|', ' OR '],
  ['!', ' NOT '],
  ['~', ' NOT '],
  ['^', ' XOR '],
];

/**
 * Rewrite symbolic operators to words and collapse whitespace.
 *
 * Word operators and unknown characters pass through untouched; case is
 * handled by the tokenizer. Idempotent.
 *
 * @example
 * normalize('A&&!B | C') // 'A AND NOT B OR C'
 */
export function normalize(raw: string): string {
  let normalized = raw;
  for (const [symbol, word] of OPERATOR_REPLACEMENTS) {
    normalized = normalized.split(symbol).join(word);
  }
  return normalized.replace(/\s+/g, ' ').trim();
}
