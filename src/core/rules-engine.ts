/**
 * Rules engine — answers a visitor's message for a bot by picking
 * the best stored Q&A pair, or the bot's fallback.
 *
 * Storage is injected (see BotStore), so the engine itself does no I/O
 * beyond the two lookups and never throws on bad input.
 */

import type { Bot, Candidate, MatchResult, ScoringWeights } from '../types/index.js';
import { createKeywordSpecCache } from './keyword-spec.js';
import { DEFAULT_WEIGHTS } from './scorer.js';
import { selectBest } from './selector.js';

export const BOT_NOT_FOUND = 'Bot not found.';

/** What the engine needs from storage */
export interface BotStore {
  fetchBotBySlug(slug: string): Bot | null;
  /** Sorted priority DESC, id ASC */
  fetchCandidates(botId: number): Candidate[];
}

export interface EngineLogger {
  debug(message: string): void;
  warn(message: string): void;
}

export interface RulesEngineConfig {
  store: BotStore;
  weights?: ScoringWeights;
  /** Attach score details and log per-candidate scores */
  debug?: boolean;
  logger?: EngineLogger;
  /** Parsed keyword specs kept in memory (default 1000) */
  cacheLimit?: number;
}

export interface MatchOptions {
  /** Overrides the engine-level debug flag for this call */
  debug?: boolean;
}

const consoleLogger: EngineLogger = {
  debug: (message) => console.log(message),
  warn: (message) => console.warn(message),
};

export function createRulesEngine(config: RulesEngineConfig) {
  const { store } = config;
  const weights = config.weights ?? DEFAULT_WEIGHTS;
  const logger = config.logger ?? consoleLogger;

  const specs = createKeywordSpecCache({
    limit: config.cacheLimit,
    onRejected: (spec, rejected) => {
      logger.warn(`[rules] ignoring invalid regex ${rejected.map(r => `'${r}'`).join(', ')} in keywords '${spec}'`);
    },
  });

  function matchRule(botSlug: string, userMessage: string, options: MatchOptions = {}): MatchResult {
    const debug = options.debug ?? config.debug ?? false;

    const bot = store.fetchBotBySlug(botSlug);
    if (!bot) {
      return { matched: false, answer: BOT_NOT_FOUND, confidence: 0 };
    }

    return selectBest(bot, userMessage, store.fetchCandidates(bot.id), {
      weights,
      debug,
      specs,
      onScore: debug
        ? (candidate, { score, detail }) => {
            logger.debug(
              `[debug] qna ${candidate.id} score=${score} :: ${JSON.stringify(detail)} :: Q='${candidate.question.slice(0, 70)}'`
            );
          }
        : undefined,
    });
  }

  return {
    matchRule,

    /** Just the answer text (fallback included) */
    chatOnce(botSlug: string, userMessage: string): string {
      return matchRule(botSlug, userMessage).answer;
    },

    get weights() {
      return weights;
    },

    /** The storage the engine reads bots and pairs from */
    get store() {
      return store;
    },
  };
}

export type RulesEngine = ReturnType<typeof createRulesEngine>;
