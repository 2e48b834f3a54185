/**
 * Token kinds and flags produced by the Wikitext scanner.
 *
 * SyntaxKind is a regular (non-const) enum so that token kinds have stable,
 * enumerable names for serialization and debugging through tokenKindName().
 */

export enum SyntaxKind {
  Unknown,

  // Brackets and blocks
  LeftBracket,              // [
  LeftBracketAnchor,        // [#
  LeftBracketSpecial,       // [*
  RightBracket,             // ]
  LeftBlock,                // [[
  LeftBlockEnd,             // [[/
  LeftBlockSpecial,         // [[*
  RightBlock,               // ]]
  LeftAnchor,               // [[#

  // Links
  LeftLink,                 // [[[
  LeftLinkSpecial,          // [[[*
  RightLink,                // ]]]

  // Comments
  LeftComment,              // [!--
  RightComment,             // --]

  // Line-start constructs
  Heading,                  // + through ++++++, optionally followed by *
  ListBullet,               // * (followed by a space)
  ListNumbered,             // # (followed by a space)
  Quote,                    // run of >
  HorizontalRule,           // ---- or longer, alone on a line
  ClearFloatNeutral,        // ~~~~
  ClearFloatCenter,         // ~~~~=
  ClearFloatLeft,           // ~~~~<
  ClearFloatRight,          // ~~~~>

  // Alignment blocks
  RightAlignOpen,           // [[>]]
  RightAlignClose,          // [[/>]]
  LeftAlignOpen,            // [[<]]
  LeftAlignClose,           // [[/<]]
  CenterAlignOpen,          // [[=]]
  CenterAlignClose,         // [[/=]]
  JustifyAlignOpen,         // [[==]]
  JustifyAlignClose,        // [[/==]]

  // Formatting (provisional: role is decided by the parser)
  Bold,                     // **
  Italics,                  // //
  Underline,                // __
  Superscript,              // ^^
  Subscript,                // ,,
  DoubleDash,               // -- (strikethrough)
  Color,                    // ##

  // Formatting (unambiguous)
  LeftMonospace,            // {{
  RightMonospace,           // }}
  Raw,                      // @@
  LeftRaw,                  // @<
  RightRaw,                 // >@
  TripleDash,               // ---

  // Tables
  TableColumn,              // ||
  TableColumnTitle,         // ||~

  // Symbols
  Pipe,                     // |
  Equals,                   // =
  Underscore,               // _

  // Whitespace
  Whitespace,               // spaces and tabs
  LineBreak,                // single newline
  ParagraphBreak,           // newline followed by one or more blank lines

  // Text
  Identifier,               // ASCII letters and digits
  Email,                    // local@domain.tld
  Url,                      // scheme://...
  String,                   // other text characters
  Other,                    // single delimiter character that formed no token

  InputEnd,
}

/**
 * Token flags for additional token metadata
 */
export const enum TokenFlags {
  None = 0,

  // Line and position context
  PrecedingLineBreak = 1 << 0,   // Token follows a line break
  IsAtLineStart = 1 << 1,        // Only whitespace precedes the token on its line

  // Delimiter resolution
  Provisional = 1 << 3,          // Delimiter role is decided by the parser
  CanOpen = 1 << 9,              // Delimiter can open a span
  CanClose = 1 << 10,            // Delimiter can close a span
}

/** Stable name of a token kind, e.g. 'LeftLink'. */
export function tokenKindName(kind: SyntaxKind): string {
  return SyntaxKind[kind] ?? 'Unknown';
}

/** Kebab-case tag of a token kind, e.g. 'left-link'. */
export function tokenKindTag(kind: SyntaxKind): string {
  return tokenKindName(kind).replace(/([a-z0-9])([A-Z])/g, '$1-$2').toLowerCase();
}

/** Names of the flags set in `flags`, joined with '|'. */
export function tokenFlagsToString(flags: TokenFlags): string {
  const names: string[] = [];
  if (flags & TokenFlags.PrecedingLineBreak) names.push('PrecedingLineBreak');
  if (flags & TokenFlags.IsAtLineStart) names.push('IsAtLineStart');
  if (flags & TokenFlags.Provisional) names.push('Provisional');
  if (flags & TokenFlags.CanOpen) names.push('CanOpen');
  if (flags & TokenFlags.CanClose) names.push('CanClose');
  return names.length ? names.join('|') : 'None';
}
