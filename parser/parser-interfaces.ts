/**
 * Parser Interfaces and Types
 *
 * Core interfaces for the Wikitext tree builder.
 */

import type { DocumentNode } from './ast-types.js';
import type { TokenizationResult } from './scanner/tokenize.js';

/**
 * Parser configuration options
 */
export interface ParseOptions {
  /** Include parent pointers in nodes (default: false, keeps the tree serializable) */
  enableParentLinking?: boolean;

  /** Open inline spans allowed before further openers are taken as text (default: 100) */
  maxNestingDepth?: number;
}

/**
 * Diagnostic severity levels
 */
export enum DiagnosticSeverity {
  Warning = 'warning'
}

/**
 * Diagnostic categories for structured error reporting
 */
export enum DiagnosticCategory {
  Nesting = 'nesting',
  Structure = 'structure',
  Syntax = 'syntax',
  Deprecation = 'deprecation'
}

/**
 * Parse error codes for machine-readable diagnostics
 */
export enum ParseErrorCode {
  UnmatchedClosingMarker = 'unmatched-closing-marker',
  UnclosedBlockAutoClosed = 'unclosed-block-auto-closed',
  MalformedConstruct = 'malformed-construct-degraded-to-text',
  DeprecatedConstruct = 'deprecated-construct-used'
}

/** Free-form details attached to a diagnostic. */
export type DiagnosticContext = Record<string, string | number | boolean>;

/**
 * Parse diagnostic information
 */
export interface ParseDiagnostic {
  /** Diagnostic severity */
  severity: DiagnosticSeverity;

  /** Diagnostic category */
  category: DiagnosticCategory;

  /** Machine-readable error code */
  code: ParseErrorCode;

  /** Human-readable message */
  message: string;

  /** Subject of the diagnostic (e.g. the marker or block name) */
  subject?: string;

  /** Start position in source */
  pos: number;

  /** End position in source */
  end: number;

  /** Additional context information */
  context?: DiagnosticContext;
}

/**
 * Result of a parse operation
 */
export interface ParseOutcome {
  /** Root document node */
  document: DocumentNode;

  /** Recovered anomalies, in document order */
  diagnostics: ParseDiagnostic[];
}

/**
 * Main parser interface
 */
export interface Parser {
  /**
   * Build a syntax tree from a token stream. Never throws for any token stream
   * produced by tokenize().
   */
  parse(tokens: TokenizationResult, options?: ParseOptions): ParseOutcome;
}

/**
 * Parser creation options
 */
export interface ParserOptions {
  /** Default parse options for all operations */
  defaultParseOptions?: ParseOptions;
}

/** 1-based line and column. */
export interface SourcePosition {
  line: number;
  column: number;
}

/**
 * Position mapping utilities for editor integration
 */
export interface PositionMapper {
  /** Convert offset to line/column position */
  offsetToPosition(offset: number): SourcePosition;

  /** Convert line/column position to offset */
  positionToOffset(line: number, column: number): number;

  /** Get precomputed line starts array */
  getLineStarts(): number[];

  /** Get total number of lines */
  getLineCount(): number;
}
