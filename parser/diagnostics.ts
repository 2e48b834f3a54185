import {
  type DiagnosticContext,
  type ParseDiagnostic,
  DiagnosticCategory,
  DiagnosticSeverity,
  ParseErrorCode
} from './parser-interfaces.js';

const CATEGORY_BY_CODE: Record<ParseErrorCode, DiagnosticCategory> = {
  [ParseErrorCode.UnmatchedClosingMarker]: DiagnosticCategory.Nesting,
  [ParseErrorCode.UnclosedBlockAutoClosed]: DiagnosticCategory.Structure,
  [ParseErrorCode.MalformedConstruct]: DiagnosticCategory.Syntax,
  [ParseErrorCode.DeprecatedConstruct]: DiagnosticCategory.Deprecation,
};

function formatMessage(code: ParseErrorCode, subject: string): string {
  switch (code) {
    case ParseErrorCode.UnmatchedClosingMarker:
      return `Closing marker '${subject}' has no matching opener and was kept as text`;
    case ParseErrorCode.UnclosedBlockAutoClosed:
      return `'${subject}' was never closed; closed automatically`;
    case ParseErrorCode.MalformedConstruct:
      return `Malformed '${subject}' construct was kept as text`;
    case ParseErrorCode.DeprecatedConstruct:
      return `'${subject}' is deprecated`;
  }
}

export function createDiagnostic(
  code: ParseErrorCode,
  pos: number,
  end: number,
  subject: string,
  context?: DiagnosticContext
): ParseDiagnostic {
  const diagnostic: ParseDiagnostic = {
    severity: DiagnosticSeverity.Warning,
    category: CATEGORY_BY_CODE[code],
    code,
    message: formatMessage(code, subject),
    subject,
    pos,
    end
  };
  if (context) diagnostic.context = context;
  return diagnostic;
}

/** Document order: by start offset, then by the order they were reported. */
export function sortDiagnostics(diagnostics: ParseDiagnostic[]): ParseDiagnostic[] {
  return diagnostics
    .map((diagnostic, index) => ({ diagnostic, index }))
    .sort((a, b) => a.diagnostic.pos - b.diagnostic.pos || a.index - b.index)
    .map(entry => entry.diagnostic);
}
