/**
 * SQLite schema for faqbot.
 *
 * bots → qna (one-to-many), plus per-day usage counters.
 */

export const DEFAULT_FALLBACK_MESSAGE =
  "Sorry, I didn't understand that. Can you rephrase your question?";

export const SCHEMA = `
  CREATE TABLE IF NOT EXISTS bots (
    id               INTEGER PRIMARY KEY AUTOINCREMENT,
    slug             TEXT UNIQUE NOT NULL,
    name             TEXT NOT NULL,
    theme            TEXT NOT NULL DEFAULT 'light',
    visibility       TEXT NOT NULL DEFAULT 'unlisted' CHECK (visibility IN ('public', 'unlisted')),
    fallback_message TEXT NOT NULL,
    created_at       TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at       TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS qna (
    id         INTEGER PRIMARY KEY AUTOINCREMENT,
    bot_id     INTEGER NOT NULL REFERENCES bots(id) ON DELETE CASCADE,
    question   TEXT NOT NULL,
    answer     TEXT NOT NULL,
    keywords   TEXT,               -- raw keyword spec, e.g. 'hours,open,re:^time'
    priority   INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  -- Candidate order for the rules engine: priority DESC, id ASC
  CREATE INDEX IF NOT EXISTS idx_qna_bot_priority
    ON qna(bot_id, priority DESC, id ASC);

  CREATE TABLE IF NOT EXISTS bot_stats (
    id             INTEGER PRIMARY KEY AUTOINCREMENT,
    bot_id         INTEGER NOT NULL REFERENCES bots(id) ON DELETE CASCADE,
    date           TEXT NOT NULL,
    daily_sessions INTEGER NOT NULL DEFAULT 0,
    message_count  INTEGER NOT NULL DEFAULT 0,
    UNIQUE (bot_id, date)
  );
`;
