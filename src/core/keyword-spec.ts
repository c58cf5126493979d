/**
 * Keyword spec parser.
 *
 * A Q&A pair's keywords are stored as one comma-separated string
 * that mixes plain phrases and regular expressions:
 *
 *   'hours,open,free wifi'   — phrases (matched lowercased)
 *   're:^hours?$'            — regex, case-insensitive
 *   '/wi-?fi/i'              — regex, flags after the last slash
 *
 * Regex tokens that fail to compile are dropped and listed in `rejected`.
 */

import type { KeywordMatcher, KeywordTerm } from '../types/index.js';

const REGEX_PREFIX = 're:';

export function parseKeywordSpec(spec: string | null | undefined): KeywordMatcher {
  const terms: KeywordTerm[] = [];
  const rejected: string[] = [];
  if (!spec) return { terms, rejected };

  for (const raw of spec.split(',')) {
    const token = raw.trim();
    if (!token) continue;

    if (token.startsWith(REGEX_PREFIX)) {
      const source = token.slice(REGEX_PREFIX.length).trim();
      pushRegex(terms, rejected, token, source, 'i');
      continue;
    }

    if (isSlashDelimited(token)) {
      const last = token.lastIndexOf('/');
      const source = token.slice(1, last);
      const flags = token.slice(last + 1).toLowerCase().includes('i') ? 'i' : '';
      pushRegex(terms, rejected, token, source, flags);
      continue;
    }

    terms.push({ kind: 'phrase', phrase: token.toLowerCase() });
  }

  return { terms, rejected };
}

function isSlashDelimited(token: string): boolean {
  return token.startsWith('/') && token.indexOf('/', 1) !== -1;
}

function pushRegex(
  terms: KeywordTerm[],
  rejected: string[],
  token: string,
  source: string,
  flags: string
): void {
  try {
    terms.push({ kind: 'regex', pattern: new RegExp(source, flags), source });
  } catch {
    rejected.push(token);
  }
}

export interface KeywordSpecCache {
  get(spec: string | null | undefined): KeywordMatcher;
  readonly size: number;
  clear(): void;
}

export interface KeywordSpecCacheOptions {
  /** Most specs kept; the least recently used is evicted past this. Default 1000. */
  limit?: number;
  /** Fires when a spec with uncompilable regex tokens is parsed */
  onRejected?: (spec: string, rejected: string[]) => void;
}

export const DEFAULT_CACHE_LIMIT = 1000;

/**
 * Memoizes parse results by spec string. An edited spec is a new key,
 * so a stale entry is never returned for it; old keys age out through
 * the size limit.
 */
export function createKeywordSpecCache(options: KeywordSpecCacheOptions = {}): KeywordSpecCache {
  const limit = Math.max(1, options.limit ?? DEFAULT_CACHE_LIMIT);
  const entries = new Map<string, KeywordMatcher>();

  return {
    get(spec) {
      const key = spec ?? '';
      const cached = entries.get(key);
      if (cached) {
        // Map keeps insertion order: re-insert to mark as most recent
        entries.delete(key);
        entries.set(key, cached);
        return cached;
      }

      const matcher = parseKeywordSpec(key);
      entries.set(key, matcher);
      if (entries.size > limit) {
        const oldest = entries.keys().next();
        if (!oldest.done) entries.delete(oldest.value);
      }
      if (matcher.rejected.length > 0) options.onRejected?.(key, matcher.rejected);
      return matcher;
    },

    get size() {
      return entries.size;
    },

    clear() {
      entries.clear();
    },
  };
}
