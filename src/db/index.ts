import Database from 'better-sqlite3';
import { SCHEMA, DEFAULT_FALLBACK_MESSAGE } from './schema.js';
import type { Bot, BotStats, BotVisibility, Candidate } from '../types/index.js';
import type { BotStore } from '../core/rules-engine.js';

let db: Database.Database | undefined;

export function initDatabase(path: string = 'faqbot.db'): Database.Database {
  db?.close();
  db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA);
  return db;
}

export function getDatabase(): Database.Database {
  if (!db) throw new Error('Database not initialized. Call initDatabase() first.');
  return db;
}

export function closeDatabase(): void {
  db?.close();
  db = undefined;
}

// ── Rows ───────────────────────────────────────────────────

interface BotRow {
  id: number;
  slug: string;
  name: string;
  theme: string;
  visibility: BotVisibility;
  fallback_message: string;
  created_at: string;
  updated_at: string;
}

interface QnaRow {
  id: number;
  question: string;
  answer: string;
  keywords: string | null;
  priority: number | null;
}

interface StatsRow {
  bot_id: number;
  date: string;
  daily_sessions: number;
  message_count: number;
}

// ── Bots ───────────────────────────────────────────────────

export interface NewBot {
  slug: string;
  name: string;
  theme?: string;
  visibility?: BotVisibility;
  fallbackMessage?: string;
}

/**
 * Insert a bot. Returns its id, or null when the slug is taken.
 */
export function addBot(bot: NewBot): number | null {
  const now = new Date().toISOString();
  try {
    const info = getDatabase().prepare(`
      INSERT INTO bots (slug, name, theme, visibility, fallback_message, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      bot.slug,
      bot.name,
      bot.theme ?? 'light',
      bot.visibility ?? 'unlisted',
      bot.fallbackMessage ?? DEFAULT_FALLBACK_MESSAGE,
      now,
      now
    );
    return Number(info.lastInsertRowid);
  } catch (error) {
    if (error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
      return null;
    }
    throw error;
  }
}

export function fetchBotBySlug(slug: string): Bot | null {
  const row = getDatabase().prepare<[string], BotRow>(
    'SELECT * FROM bots WHERE slug = ?'
  ).get(slug);

  return row ? rowToBot(row) : null;
}

export function fetchBotById(id: number): Bot | null {
  const row = getDatabase().prepare<[number], BotRow>(
    'SELECT * FROM bots WHERE id = ?'
  ).get(id);

  return row ? rowToBot(row) : null;
}

export function listBots(opts: { publicOnly?: boolean } = {}): Bot[] {
  const where = opts.publicOnly ? "WHERE visibility = 'public'" : '';
  const rows = getDatabase().prepare<[], BotRow>(
    `SELECT * FROM bots ${where} ORDER BY id ASC`
  ).all();

  return rows.map(rowToBot);
}

/**
 * Update bot fields. Returns false when the bot doesn't exist
 * or there's nothing to change.
 */
export function updateBot(
  id: number,
  updates: Partial<Pick<Bot, 'name' | 'theme' | 'visibility' | 'fallbackMessage'>>
): boolean {
  const sets: string[] = [];
  const params: Array<string | number> = [];

  if (updates.name !== undefined) { sets.push('name = ?'); params.push(updates.name); }
  if (updates.theme !== undefined) { sets.push('theme = ?'); params.push(updates.theme); }
  if (updates.visibility !== undefined) { sets.push('visibility = ?'); params.push(updates.visibility); }
  if (updates.fallbackMessage !== undefined) { sets.push('fallback_message = ?'); params.push(updates.fallbackMessage); }

  if (sets.length === 0) return false;

  sets.push('updated_at = ?');
  params.push(new Date().toISOString());
  params.push(id);

  const info = getDatabase().prepare(
    `UPDATE bots SET ${sets.join(', ')} WHERE id = ?`
  ).run(...params);

  return info.changes > 0;
}

// ── Q&A ────────────────────────────────────────────────────

export interface NewQna {
  question: string;
  answer: string;
  keywords?: string | null;
  priority?: number;
}

export function addQna(botId: number, qna: NewQna): number {
  const info = getDatabase().prepare(`
    INSERT INTO qna (bot_id, question, answer, keywords, priority, created_at)
    VALUES (?, ?, ?, ?, ?, ?)
  `).run(
    botId,
    qna.question,
    qna.answer,
    qna.keywords ?? null,
    qna.priority ?? 1,
    new Date().toISOString()
  );

  return Number(info.lastInsertRowid);
}

/**
 * All Q&A pairs of a bot, priority DESC then id ASC.
 * The rules engine depends on this order for tie-breaking.
 */
export function fetchQna(botId: number): Candidate[] {
  const rows = getDatabase().prepare<[number], QnaRow>(`
    SELECT id, question, answer, keywords, priority
    FROM qna
    WHERE bot_id = ?
    ORDER BY priority DESC, id ASC
  `).all(botId);

  return rows.map(rowToCandidate);
}

export function deleteQna(botId: number, qnaId: number): boolean {
  const info = getDatabase().prepare(
    'DELETE FROM qna WHERE id = ? AND bot_id = ?'
  ).run(qnaId, botId);

  return info.changes > 0;
}

// ── Stats ──────────────────────────────────────────────────

export function incrementBotStats(
  botId: number,
  counts: { sessions?: number; messages?: number },
  date: string = new Date().toISOString().slice(0, 10)
): void {
  const sessions = counts.sessions ?? 0;
  const messages = counts.messages ?? 0;

  getDatabase().prepare(`
    INSERT INTO bot_stats (bot_id, date, daily_sessions, message_count)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(bot_id, date) DO UPDATE SET
      daily_sessions = daily_sessions + excluded.daily_sessions,
      message_count = message_count + excluded.message_count
  `).run(botId, date, sessions, messages);
}

export function getBotStats(botId: number, limit = 30): BotStats[] {
  const rows = getDatabase().prepare<[number, number], StatsRow>(`
    SELECT bot_id, date, daily_sessions, message_count
    FROM bot_stats
    WHERE bot_id = ?
    ORDER BY date DESC
    LIMIT ?
  `).all(botId, limit);

  return rows.map(row => ({
    botId: row.bot_id,
    date: row.date,
    dailySessions: row.daily_sessions,
    messageCount: row.message_count,
  }));
}

// ── Store ──────────────────────────────────────────────────

/** The rules engine's view of this database */
export function createSqliteStore(): BotStore {
  return {
    fetchBotBySlug,
    fetchCandidates: fetchQna,
  };
}

// ── Row Mappers ────────────────────────────────────────────

function rowToBot(row: BotRow): Bot {
  return {
    id: row.id,
    slug: row.slug,
    name: row.name,
    theme: row.theme,
    visibility: row.visibility,
    fallbackMessage: row.fallback_message,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToCandidate(row: QnaRow): Candidate {
  return {
    id: row.id,
    question: row.question,
    answer: row.answer,
    keywordSpec: row.keywords,
    priority: row.priority ?? undefined,
  };
}
