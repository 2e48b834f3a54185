// Substitution
export * from './preprocess/index.js';

// Scanner
export { createScanner } from './scanner/scanner.js';
export type { Scanner, ScannerDebugState } from './scanner/scanner.js';
export { SyntaxKind, TokenFlags, tokenFlagsToString, tokenKindName, tokenKindTag } from './scanner/token-types.js';
export { tokenize } from './scanner/tokenize.js';
export type { ExtractedToken, TokenizationResult } from './scanner/tokenize.js';

// Tree builder
export { DEFAULT_MAX_NESTING_DEPTH, createParser, parse } from './core-parser.js';
export { resolveLinkTarget } from './inline-parser.js';
export * from './ast-types.js';
export * from './ast-factory.js';
export * from './parser-interfaces.js';
export * from './ast-traversal.js';
export {
  computeLineStarts,
  createPositionMapper,
  normalizePageName,
  offsetToPosition
} from './parser-utils.js';

export { parseWikitext } from './pipeline.js';
export type { WikitextOptions, WikitextResult } from './pipeline.js';
