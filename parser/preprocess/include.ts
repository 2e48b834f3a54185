/**
 * Include expansion: replaces `[[include target args]]` markers with text supplied
 * by a caller-provided resolver, recursively, with cycle and depth protection.
 *
 * Failures never escape. Each one becomes an inert placeholder marker that the
 * parser turns into an include-placeholder node.
 */

import { debugLog } from '../debug-log.js';
import { substituteVariables } from './variables.js';

/** Page reference, optionally on another site (`:site:page`). */
export interface PageRef {
  site?: string;
  page: string;
}

/** Page reference plus the `key=value` arguments given on the include marker. */
export interface IncludeRef extends PageRef {
  variables: Record<string, string>;
}

/**
 * Maps an include target to its text. Returning null or undefined means the
 * page does not exist. A thrown error is recorded as a resolver failure.
 */
export type IncludeResolver = (ref: IncludeRef) => string | null | undefined;

export type IncludeFailureReason = 'not-found' | 'cyclic' | 'depth-exceeded' | 'resolver-failed';

export interface IncludeFailure {
  ref: IncludeRef;
  reason: IncludeFailureReason;
  /** Nesting depth at which the marker was found; 0 is the top-level text */
  depth: number;
  /** Message of the error thrown by the resolver, for resolver-failed */
  message?: string;
}

export interface IncludeExpansion {
  text: string;
  /** Every successfully resolved page, in resolution order */
  pagesIncluded: PageRef[];
  failures: IncludeFailure[];
}

export interface IncludeOptions {
  /** Maximum include nesting (default: 16) */
  maxIncludeDepth?: number;

  /** Page being preprocessed, so a page including itself is caught immediately */
  rootPage?: PageRef;

  /** Text substituted for an include that could not be expanded */
  placeholder?: (ref: IncludeRef, reason: IncludeFailureReason) => string;
}

export const DEFAULT_MAX_INCLUDE_DEPTH = 16;

const INCLUDE_MARKER_SOURCE = String.raw`\[\[\s*include\s+((?:(?!\]\])[\s\S])+?)\]\]`;

/** Fresh regex per use: expansion recurses, and a shared global regex carries lastIndex. */
function includeMarkerPattern(): RegExp {
  return new RegExp(INCLUDE_MARKER_SOURCE, 'gi');
}

/**
 * Parses the body of an include marker (the text after `include`).
 * Returns null when there is no usable target.
 */
export function parseIncludeMarker(body: string): IncludeRef | null {
  const trimmed = body.trim();
  const targetMatch = /^[^\s|]+/.exec(trimmed);
  if (!targetMatch) return null;

  const pageRef = parsePageRef(targetMatch[0]);
  if (!pageRef) return null;

  const variables: Record<string, string> = {};
  const rest = trimmed.slice(targetMatch[0].length);
  for (const item of rest.split('|')) {
    const eq = item.indexOf('=');
    if (eq < 0) continue;
    const key = item.slice(0, eq).trim();
    if (!key) continue;
    variables[key] = item.slice(eq + 1).trim();
  }

  return { ...pageRef, variables };
}

/** Parses `page`, `category:page` or `:site:page`. */
export function parsePageRef(target: string): PageRef | null {
  if (target.startsWith(':')) {
    const second = target.indexOf(':', 1);
    if (second < 0) return null;
    const site = target.slice(1, second);
    const page = target.slice(second + 1);
    if (!site || !page) return null;
    return { site, page };
  }
  return target ? { page: target } : null;
}

export function formatPageRef(ref: PageRef): string {
  return ref.site ? ':' + ref.site + ':' + ref.page : ref.page;
}

/** Identity of a page for cycle detection. */
export function pageKey(ref: PageRef): string {
  return (ref.site ?? '').toLowerCase() + ':' + ref.page.trim().toLowerCase();
}

/**
 * `[[include-failed page="..." reason="..."]]`. Argument values cannot hold
 * a double quote, so one in the page name is written as a single quote.
 */
export function defaultPlaceholder(ref: IncludeRef, reason: IncludeFailureReason): string {
  const page = formatPageRef(ref).replace(/"/g, "'");
  return '[[include-failed page="' + page + '" reason="' + reason + '"]]';
}

export function expandIncludes(text: string, resolver: IncludeResolver, options?: IncludeOptions): IncludeExpansion {
  const maxDepth = options?.maxIncludeDepth ?? DEFAULT_MAX_INCLUDE_DEPTH;
  const placeholder = options?.placeholder ?? defaultPlaceholder;
  const pagesIncluded: PageRef[] = [];
  const failures: IncludeFailure[] = [];

  function fail(ref: IncludeRef, reason: IncludeFailureReason, depth: number, message?: string): string {
    debugLog('include', 'include failed', { page: formatPageRef(ref), reason, depth, message });
    failures.push(message === undefined ? { ref, reason, depth } : { ref, reason, depth, message });
    return placeholder(ref, reason);
  }

  function expand(source: string, chain: readonly string[], depth: number): string {
    return source.replace(includeMarkerPattern(), (marker, body: string) => {
      const ref = parseIncludeMarker(body);
      if (!ref) return marker;

      const key = pageKey(ref);
      if (chain.includes(key)) return fail(ref, 'cyclic', depth);
      if (depth >= maxDepth) return fail(ref, 'depth-exceeded', depth);

      let resolved: string | null | undefined;
      try {
        resolved = resolver(ref);
      } catch (error) {
        return fail(ref, 'resolver-failed', depth, error instanceof Error ? error.message : String(error));
      }
      if (resolved === null || resolved === undefined) return fail(ref, 'not-found', depth);

      debugLog('include', 'resolved include', { page: formatPageRef(ref), depth, length: resolved.length });
      pagesIncluded.push(ref.site ? { site: ref.site, page: ref.page } : { page: ref.page });

      const substituted = substituteVariables(resolved, ref.variables);
      return expand(substituted, [...chain, key], depth + 1);
    });
  }

  const rootChain = options?.rootPage ? [pageKey(options.rootPage)] : [];
  return { text: expand(text, rootChain, 0), pagesIncluded, failures };
}
