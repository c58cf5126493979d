/**
 * Scorer — rates one Q&A pair against a normalized user message.
 *
 *   exact match      +40
 *   each phrase      +12
 *   each regex       +14
 *   similarity       + round(30 × ratio)
 *   priority         + priority × 2
 */

import type { Candidate, KeywordMatcher, ScoredCandidate, ScoreDetail, ScoringWeights } from '../types/index.js';
import { normalize } from './normalize.js';
import { parseKeywordSpec } from './keyword-spec.js';
import { similarityRatio } from './similarity.js';

export const DEFAULT_WEIGHTS: ScoringWeights = Object.freeze({
  exactMatchBonus: 40,
  keywordPoints: 12,
  regexPoints: 14,
  similarityWeight: 30,
  priorityWeight: 2,
  similarityThreshold: 0.55,
});

export const DEFAULT_PRIORITY = 1;

/** Anything that can turn a keyword spec into a matcher (e.g. a cache) */
export interface KeywordSpecSource {
  get(spec: string | null | undefined): KeywordMatcher;
}

const uncached: KeywordSpecSource = { get: parseKeywordSpec };

export function scoreCandidate(
  userNormalized: string,
  candidate: Candidate,
  weights: ScoringWeights = DEFAULT_WEIGHTS,
  specs: KeywordSpecSource = uncached
): ScoredCandidate {
  const priority = candidate.priority ?? DEFAULT_PRIORITY;
  const detail: ScoreDetail = {
    matchedKeywords: [],
    matchedRegex: [],
    exact: false,
    similarityRatio: 0,
    similarityPoints: 0,
    priority,
  };
  let score = 0;

  const questionNormalized = normalize(candidate.question);
  if (userNormalized === questionNormalized) {
    score += weights.exactMatchBonus;
    detail.exact = true;
  }

  for (const term of specs.get(candidate.keywordSpec).terms) {
    if (term.kind === 'phrase') {
      if (phraseInText(userNormalized, term.phrase)) {
        score += weights.keywordPoints;
        detail.matchedKeywords.push(term.phrase);
      }
    } else if (term.pattern.test(userNormalized)) {
      score += weights.regexPoints;
      detail.matchedRegex.push(term.source);
    }
  }

  detail.similarityRatio = similarityRatio(userNormalized, questionNormalized);
  detail.similarityPoints = roundHalfEven(weights.similarityWeight * detail.similarityRatio);
  score += detail.similarityPoints;

  score += priority * weights.priorityWeight;

  return { score, detail };
}

/**
 * Single-word phrases match whole words only ('cat' is not in 'category').
 * Multi-word phrases match as a substring.
 */
export function phraseInText(text: string, phrase: string): boolean {
  if (!phrase) return false;
  if (phrase.split(/\s+/).filter(Boolean).length > 1) {
    return text.includes(phrase);
  }
  return new RegExp(`\\b${escapeRegExp(phrase)}\\b`).test(text);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

/**
 * Round to the nearest integer, halves to even (2.5 → 2, 3.5 → 4).
 * Keeps scores identical to those produced by banker's-rounding tooling.
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff < 0.5) return floor;
  if (diff > 0.5) return floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
}
