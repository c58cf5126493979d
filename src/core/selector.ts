/**
 * Match selector — scores every candidate for a bot and decides
 * whether the best one is a real match.
 *
 * Precondition: `candidates` arrive sorted priority DESC, id ASC.
 * The running best is only replaced on a strictly higher score, so
 * on a tie the earlier candidate wins. Break the ordering and the
 * winner of a tie changes.
 */

import type { Bot, Candidate, MatchResult, ScoredCandidate, ScoringWeights } from '../types/index.js';
import { normalize } from './normalize.js';
import { DEFAULT_WEIGHTS, scoreCandidate, type KeywordSpecSource } from './scorer.js';

export interface SelectOptions {
  weights?: ScoringWeights;
  /** Attach the winner's ScoreDetail to the result */
  debug?: boolean;
  /** Parsed keyword specs, shared across calls */
  specs?: KeywordSpecSource;
  /** Observer for each scored candidate. Does not affect the outcome. */
  onScore?: (candidate: Candidate, scored: ScoredCandidate) => void;
}

export function selectBest(
  bot: Pick<Bot, 'fallbackMessage'>,
  userMessage: string,
  candidates: readonly Candidate[],
  options: SelectOptions = {}
): MatchResult {
  const weights = options.weights ?? DEFAULT_WEIGHTS;

  if (candidates.length === 0) {
    return { matched: false, answer: bot.fallbackMessage, confidence: 0 };
  }

  const userNormalized = normalize(userMessage);

  let best: { candidate: Candidate; scored: ScoredCandidate } | null = null;
  for (const candidate of candidates) {
    const scored = scoreCandidate(userNormalized, candidate, weights, options.specs);
    options.onScore?.(candidate, scored);
    if (!best || scored.score > best.scored.score) {
      best = { candidate, scored };
    }
  }

  if (!best) {
    return { matched: false, answer: bot.fallbackMessage, confidence: 0 };
  }

  const { candidate, scored } = best;
  const { detail } = scored;
  const hits = detail.matchedKeywords.length + detail.matchedRegex.length;
  const matched = detail.exact || hits > 0 || detail.similarityRatio >= weights.similarityThreshold;
  const confidence = Math.max(0, scored.score);

  const result: MatchResult = matched
    ? {
        matched: true,
        answer: candidate.answer,
        question: candidate.question,
        candidateId: candidate.id,
        confidence,
      }
    : { matched: false, answer: bot.fallbackMessage, confidence };

  if (options.debug) {
    result.debug = detail;
  }

  return result;
}
