import { afterEach, describe, expect, test, vi } from 'vitest';

import { debugLog, isDebugEnabled } from '../debug-log.js';

describe('Debug logging', () => {
  afterEach(() => {
    delete process.env.WIKITEXT_DEBUG;
    vi.restoreAllMocks();
  });

  test('off by default', () => {
    delete process.env.WIKITEXT_DEBUG;
    expect(isDebugEnabled('scan')).toBe(false);
  });

  test('1 enables every scope', () => {
    process.env.WIKITEXT_DEBUG = '1';
    expect(isDebugEnabled('scan')).toBe(true);
    expect(isDebugEnabled('include')).toBe(true);
  });

  test('a list enables only the named scopes', () => {
    process.env.WIKITEXT_DEBUG = 'scan, Parse';
    expect(isDebugEnabled('parse')).toBe(true);
    expect(isDebugEnabled('preprocess')).toBe(false);
  });

  test('writes a prefixed line', () => {
    process.env.WIKITEXT_DEBUG = 'parse';
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    debugLog('parse', 'open paragraph', { pos: 3 });
    debugLog('scan', 'ignored');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[PARSE]', 'open paragraph', { pos: 3 });
  });
});
