/**
 * Phrase-formula engine.
 *
 * raw text -> normalize -> tokenize -> parse -> AST
 *   AST -> validate (advisory) and evaluate (per content item)
 *
 * ```typescript
 * const compiled = compile('(A OR B) AND NOT C');
 * if (compiled.isOk()) {
 *   const bindings = createBindingSet({ A: 'def', B: 'class', C: 'error' });
 *   evaluate(compiled.value, bindings, 'def foo(): return 1'); // true
 * }
 * ```
 */

export type { Alphabet, AlphabetError } from './alphabet.js';
export { DEFAULT_ALPHABET, parseAlphabet } from './alphabet.js';

export type { FormulaNode, VarNode, NotNode, BinaryNode } from './ast.js';
export { collectVariables, formatNode } from './ast.js';

export type {
  BracketKind,
  BinaryOperator,
  SourceSpan,
  Token,
} from './tokens.js';

export type {
  Diagnostic,
  DiagnosticKind,
  DiagnosticSeverity,
  ParseError,
  ParseErrorKind,
  ValidationResult,
  WarningKind,
} from './diagnostics.js';
export { isBlocking, parseErrorToDiagnostic } from './diagnostics.js';

export { normalize } from './normalizer.js';
export { tokenize } from './tokenizer.js';
export { parse, PRECEDENCE_TIERS, MAX_NESTING_DEPTH, MAX_OPERATORS } from './parser.js';

export type { CompiledFormula } from './compile.js';
export { compile } from './compile.js';

export type { PhraseTexts } from './validator.js';
export { validate, validateCompiled, semanticWarnings } from './validator.js';

export type { PhraseBinding, PhraseBindingSet, PhraseInput, PhraseInputs } from './bindings.js';
export { createBindingSet, phraseTextsOf, boundLetters, describeVariables, isBlankPhrase } from './bindings.js';

export { evaluate, evaluateNode } from './evaluator.js';

export type { SuggestibleDiagnostic } from './suggestions.js';
export { suggest } from './suggestions.js';

export { autoConstruct, autoConstructFromBindings, enforceOperatorCase } from './editor.js';

export type { FormulaReadiness } from './readiness.js';
export { assessReadiness, canExecute } from './readiness.js';

export type { ScanMatch, ScanOptions, SearchMode } from './scan.js';
export { scanText, DOCUMENT_PREVIEW_LENGTH } from './scan.js';
