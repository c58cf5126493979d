/**
 * Config and seed file types.
 *
 * The data directory has a flat structure:
 *   data/
 *     config.yaml   ← server, admin token, scoring overrides
 *     seed.yaml     ← bots and their Q&A pairs (optional)
 */

import type { BotVisibility } from './bot.js';
import type { ScoringWeights } from './match.js';

/**
 * Top-level faqbot configuration (data/config.yaml).
 */
export interface FaqbotConfig {
  /** Server settings */
  server: {
    port: number;
    host: string;
  };

  /** Admin routes settings */
  admin: {
    /** Bearer token for /api/bots/:slug/pairs and /stats */
    token: string;
  };

  /** Scoring weights, defaults merged with any overrides */
  scoring: ScoringWeights;

  /**
   * Attach score breakdowns to results and log each candidate's score.
   * FAQBOT_DEBUG=1 in the environment turns this on too.
   */
  debug: boolean;
}

export interface SeedPair {
  question: string;
  answer: string;
  keywords?: string;
  priority?: number;
}

export interface SeedBot {
  slug: string;
  name: string;
  theme?: string;
  visibility?: BotVisibility;
  fallbackMessage?: string;
  pairs?: SeedPair[];
}

/** data/seed.yaml */
export interface SeedData {
  bots: SeedBot[];
}
