/**
 * API routes for faqbot.
 *
 *   /health, /chat        — public
 *   /api/bots, /api/bots/:slug  — public bot creation and lookup
 *   /api/bots/:slug/pairs, /stats — owner-facing (token-protected)
 */

import { Hono, type MiddlewareHandler } from 'hono';
import * as db from '../db/index.js';
import type { RulesEngine } from '../core/rules-engine.js';

export function createAPI(engine: RulesEngine, adminToken: string) {
  const api = new Hono();

  /** Health check */
  api.get('/health', (c) => {
    return c.json({ status: 'ok', message: 'faqbot API is running' });
  });

  /** Answer one message for a bot */
  api.post('/chat', async (c) => {
    const body = await readBody(c.req);
    const { bot, message } = body;

    if (typeof bot !== 'string' || typeof message !== 'string') {
      return c.json({ error: "Missing 'bot' or 'message' in request body" }, 400);
    }

    const result = engine.matchRule(bot, message);

    const found = engine.store.fetchBotBySlug(bot);
    if (found) {
      db.incrementBotStats(found.id, { messages: 1 });
    }

    return c.json({
      bot,
      message,
      matched: result.matched,
      answer: result.answer,
      confidence: result.confidence,
      ...(result.debug ? { debug: result.debug } : {}),
    });
  });

  /** Create a bot with its Q&A pairs */
  api.post('/api/bots', async (c) => {
    const body = await readBody(c.req);
    const { slug, name, theme, fallbackMessage, pairs } = body;

    if (typeof slug !== 'string' || typeof name !== 'string' || !slug || !name) {
      return c.json({ error: 'Missing bot name or slug' }, 400);
    }

    const parsed = (Array.isArray(pairs) ? pairs : []).map(parsePair);
    for (const pair of parsed) {
      if (pair.kind === 'invalid') return c.json({ error: pair.error }, 400);
    }

    const botId = db.addBot({
      slug,
      name,
      theme: typeof theme === 'string' ? theme : 'arctic',
      fallbackMessage: typeof fallbackMessage === 'string' ? fallbackMessage : undefined,
    });

    if (botId === null) {
      return c.json({ error: 'Bot with this slug already exists' }, 409);
    }

    // Pairs without a question or answer are skipped
    for (const pair of parsed) {
      if (pair.kind === 'ok') db.addQna(botId, pair.qna);
    }

    return c.json({ success: true, link: `/chat/${slug}` });
  });

  /** Bot details for the chat page */
  api.get('/api/bots/:slug', (c) => {
    const bot = db.fetchBotBySlug(c.req.param('slug'));
    if (!bot) return c.json({ error: 'Bot not found' }, 404);

    const pairs = db.fetchQna(bot.id);
    return c.json({
      name: bot.name,
      slug: bot.slug,
      theme: bot.theme,
      pairs: pairs.map(p => ({ question: p.question, answer: p.answer })),
    });
  });

  // ── Owner routes ───────────────────────────────────────

  /** Middleware: check admin token */
  const adminAuth: MiddlewareHandler = async (c, next) => {
    const token = c.req.header('Authorization')?.replace('Bearer ', '');
    if (!adminToken || token !== adminToken) {
      return c.json({ error: 'Unauthorized' }, 401);
    }
    await next();
  };

  /** Add one Q&A pair */
  api.post('/api/bots/:slug/pairs', adminAuth, async (c) => {
    const bot = db.fetchBotBySlug(c.req.param('slug'));
    if (!bot) return c.json({ error: 'Bot not found' }, 404);

    const pair = parsePair(await readBody(c.req));
    if (pair.kind === 'incomplete') return c.json({ error: 'Missing question or answer' }, 400);
    if (pair.kind === 'invalid') return c.json({ error: pair.error }, 400);

    const id = db.addQna(bot.id, pair.qna);
    return c.json({ ok: true, id }, 201);
  });

  /** Remove a Q&A pair */
  api.delete('/api/bots/:slug/pairs/:id', adminAuth, (c) => {
    const bot = db.fetchBotBySlug(c.req.param('slug'));
    if (!bot) return c.json({ error: 'Bot not found' }, 404);

    const deleted = db.deleteQna(bot.id, Number(c.req.param('id')));
    if (!deleted) return c.json({ error: 'Not found' }, 404);

    return c.json({ ok: true });
  });

  /** Daily usage counters */
  api.get('/api/bots/:slug/stats', adminAuth, (c) => {
    const bot = db.fetchBotBySlug(c.req.param('slug'));
    if (!bot) return c.json({ error: 'Bot not found' }, 404);

    return c.json({ stats: db.getBotStats(bot.id) });
  });

  return api;
}

/** Parse a JSON object body; anything else reads as empty */
async function readBody(req: { json(): Promise<unknown> }): Promise<Record<string, unknown>> {
  const body: unknown = await req.json().catch(() => ({}));
  return toRecord(body) ?? {};
}

function toRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

type ParsedPair =
  | { kind: 'ok'; qna: db.NewQna }
  | { kind: 'incomplete' }
  | { kind: 'invalid'; error: string };

function parsePair(input: unknown): ParsedPair {
  const pair = toRecord(input);
  if (!pair) return { kind: 'incomplete' };
  const { question, answer, keywords, priority } = pair;

  if (priority !== undefined && priority !== null
    && (typeof priority !== 'number' || !Number.isInteger(priority))) {
    return { kind: 'invalid', error: 'priority must be an integer' };
  }

  if (typeof question !== 'string' || typeof answer !== 'string' || !question || !answer) {
    return { kind: 'incomplete' };
  }

  return {
    kind: 'ok',
    qna: {
      question,
      answer,
      keywords: typeof keywords === 'string' ? keywords : null,
      priority: typeof priority === 'number' ? priority : 1,
    },
  };
}
