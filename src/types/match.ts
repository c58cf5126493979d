/**
 * Matching types — what the rules engine produces.
 */

/** A parsed keyword spec token */
export type KeywordTerm =
  | { kind: 'phrase'; phrase: string }
  | { kind: 'regex'; pattern: RegExp; source: string };

export interface KeywordMatcher {
  terms: KeywordTerm[];
  /** Regex tokens that failed to compile and were dropped */
  rejected: string[];
}

/**
 * Fixed scoring weights. Passed into the scorer rather than
 * read from module state, so alternate profiles can be tested.
 */
export interface ScoringWeights {
  /** Normalized message equals normalized question */
  readonly exactMatchBonus: number;
  /** Per matched plain phrase */
  readonly keywordPoints: number;
  /** Per matched regex */
  readonly regexPoints: number;
  /** Multiplied by the similarity ratio, then rounded */
  readonly similarityWeight: number;
  /** Multiplied by the candidate's priority */
  readonly priorityWeight: number;
  /** Below this, similarity alone is not a match */
  readonly similarityThreshold: number;
}

export interface ScoreDetail {
  matchedKeywords: string[];
  /** Source text of each matched regex */
  matchedRegex: string[];
  exact: boolean;
  /** Block-matching ratio in [0, 1] */
  similarityRatio: number;
  /** Points contributed by similarity */
  similarityPoints: number;
  priority: number;
}

export interface ScoredCandidate {
  score: number;
  detail: ScoreDetail;
}

export interface MatchResult {
  matched: boolean;
  answer: string;
  /** Question of the winning pair (matched only) */
  question?: string;
  /** Id of the winning pair (matched only) */
  candidateId?: number;
  /** Non-negative score of the best candidate — a ranking signal, not a probability */
  confidence: number;
  /** Winning candidate's breakdown, only when debug was requested */
  debug?: ScoreDetail;
}
