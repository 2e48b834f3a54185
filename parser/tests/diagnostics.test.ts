import { describe, expect, test } from 'vitest';

import { createDiagnostic, sortDiagnostics } from '../diagnostics.js';
import { DiagnosticCategory, DiagnosticSeverity, ParseErrorCode } from '../parser-interfaces.js';

describe('Diagnostics', () => {
  test('carries code, category, message and span', () => {
    expect(createDiagnostic(ParseErrorCode.DeprecatedConstruct, 2, 14, 'deletion', { replacement: 'del' })).toEqual({
      severity: DiagnosticSeverity.Warning,
      category: DiagnosticCategory.Deprecation,
      code: ParseErrorCode.DeprecatedConstruct,
      message: "'deletion' is deprecated",
      subject: 'deletion',
      pos: 2,
      end: 14,
      context: { replacement: 'del' }
    });
  });

  test('messages per code', () => {
    expect(createDiagnostic(ParseErrorCode.UnmatchedClosingMarker, 0, 2, '}}').message)
      .toBe("Closing marker '}}' has no matching opener and was kept as text");
    expect(createDiagnostic(ParseErrorCode.MalformedConstruct, 0, 2, '@@').message)
      .toBe("Malformed '@@' construct was kept as text");
  });

  test('sorting keeps the report order for equal offsets', () => {
    const first = createDiagnostic(ParseErrorCode.MalformedConstruct, 5, 6, 'a');
    const second = createDiagnostic(ParseErrorCode.UnclosedBlockAutoClosed, 0, 2, 'b');
    const third = createDiagnostic(ParseErrorCode.UnmatchedClosingMarker, 5, 7, 'c');
    expect(sortDiagnostics([first, second, third])).toEqual([second, first, third]);
  });
});
