export type {
  Bot,
  BotVisibility,
  BotStats,
  Candidate,
} from './bot.js';

export type {
  KeywordTerm,
  KeywordMatcher,
  ScoringWeights,
  ScoreDetail,
  ScoredCandidate,
  MatchResult,
} from './match.js';

export type {
  FaqbotConfig,
  SeedBot,
  SeedPair,
  SeedData,
} from './data.js';
