/**
 * Bot and Q&A record types.
 *
 * A bot is a named collection of question/answer pairs with a
 * canned fallback reply. Both live in SQLite (see db/) and are
 * handed to the rules engine as read-only snapshots.
 */

export type BotVisibility = 'public' | 'unlisted';

export interface Bot {
  id: number;
  /** URL-safe identifier, unique across bots */
  slug: string;
  /** Display name */
  name: string;
  /** Frontend theme name */
  theme: string;
  visibility: BotVisibility;
  /** Reply used when no Q&A pair matches */
  fallbackMessage: string;
  createdAt: string;
  updatedAt: string;
}

/**
 * One stored Q&A pair — a candidate answer for the rules engine.
 */
export interface Candidate {
  id: number;
  question: string;
  answer: string;

  /**
   * Raw keyword spec, comma-separated.
   * - plain words/phrases:  'hours,open,free wifi'
   * - regex with prefix:    're:^hours?$'
   * - regex with slashes:   '/wi-?fi/i'
   */
  keywordSpec: string | null;

  /** Author-assigned weight. Defaults to 1. */
  priority?: number;
}

/** Per-day usage counters for a bot */
export interface BotStats {
  botId: number;
  /** ISO date, e.g. 2024-05-01 */
  date: string;
  dailySessions: number;
  messageCount: number;
}
