/**
 * Opt-in debug tracing, switched on through the WIKITEXT_DEBUG environment variable.
 *
 *   WIKITEXT_DEBUG=1            every scope
 *   WIKITEXT_DEBUG=scan,parse   only the listed scopes
 *
 * Output goes to console.log with a bracketed scope prefix, e.g. `[SCAN] emit {...}`.
 */

export type DebugScope = 'preprocess' | 'include' | 'scan' | 'parse';

function readDebugSetting(): string {
  if (typeof process === 'undefined') return '';
  return process.env.WIKITEXT_DEBUG ?? '';
}

/**
 * True when tracing is enabled for the scope. Read on every call so tests can toggle the
 * variable without reloading modules; callers on hot paths cache the result per run.
 */
export function isDebugEnabled(scope: DebugScope): boolean {
  const setting = readDebugSetting().trim();
  if (!setting || setting === '0' || setting === 'false') return false;
  if (setting === '1' || setting === '*' || setting === 'true') return true;
  return setting.split(',').some(part => part.trim().toLowerCase() === scope);
}

export function debugLog(scope: DebugScope, message: string, details?: Record<string, unknown>): void {
  if (!isDebugEnabled(scope)) return;
  const prefix = '[' + scope.toUpperCase() + ']';
  if (details) console.log(prefix, message, details);
  else console.log(prefix, message);
}
