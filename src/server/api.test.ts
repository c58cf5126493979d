import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createAPI } from './api.js';
import { createRulesEngine } from '../core/rules-engine.js';
import { initDatabase, closeDatabase, createSqliteStore, addBot, addQna, fetchBotBySlug, fetchQna, getBotStats } from '../db/index.js';

const TOKEN = 'test-secret';

function postJson(body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

describe('api', () => {
  let app: ReturnType<typeof createAPI>;
  let botId: number;

  beforeEach(() => {
    initDatabase(':memory:');
    botId = addBot({ slug: 'cozy-cafe', name: 'Cozy Cafe', theme: 'warm', fallbackMessage: 'Ask at the counter!' }) ?? -1;
    addQna(botId, {
      question: 'What are your hours?',
      answer: 'Weekdays 7am-8pm.',
      keywords: 'hours,open,closed,time,schedule',
      priority: 10,
    });
    addQna(botId, {
      question: 'Do you have WiFi?',
      answer: 'Yes, free WiFi.',
      keywords: 'wifi,internet,password,work,laptop',
      priority: 9,
    });

    const engine = createRulesEngine({ store: createSqliteStore() });
    app = createAPI(engine, TOKEN);
  });

  afterEach(() => {
    closeDatabase();
  });

  it('GET /health', async () => {
    const res = await app.request('/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', message: 'faqbot API is running' });
  });

  describe('POST /chat', () => {
    it('answers a matching message', async () => {
      const res = await app.request('/chat', postJson({ bot: 'cozy-cafe', message: 'What time do you open?' }));
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        bot: 'cozy-cafe',
        message: 'What time do you open?',
        matched: true,
        answer: 'Weekdays 7am-8pm.',
        confidence: 62,
      });
    });

    it('falls back for an unmatched message', async () => {
      const res = await app.request('/chat', postJson({ bot: 'cozy-cafe', message: 'tell me a joke' }));
      expect(await res.json()).toMatchObject({ matched: false, answer: 'Ask at the counter!' });
    });

    it('reports an unknown bot', async () => {
      const res = await app.request('/chat', postJson({ bot: 'nope', message: 'hi' }));
      expect(await res.json()).toEqual({
        bot: 'nope',
        message: 'hi',
        matched: false,
        answer: 'Bot not found.',
        confidence: 0,
      });
    });

    it('counts messages for the bot', async () => {
      await app.request('/chat', postJson({ bot: 'cozy-cafe', message: 'hours' }));
      await app.request('/chat', postJson({ bot: 'cozy-cafe', message: 'wifi' }));
      const [today] = getBotStats(botId);
      expect(today.messageCount).toBe(2);
    });

    it('treats an empty bot slug as an unknown bot', async () => {
      const res = await app.request('/chat', postJson({ bot: '', message: 'hi' }));
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        bot: '',
        message: 'hi',
        matched: false,
        answer: 'Bot not found.',
        confidence: 0,
      });
    });

    it('looks the bot up through the engine store', async () => {
      const store = createSqliteStore();
      const fetchBotBySlug = vi.fn(store.fetchBotBySlug);
      const counted = createAPI(createRulesEngine({ store: { ...store, fetchBotBySlug } }), TOKEN);

      await counted.request('/chat', postJson({ bot: 'cozy-cafe', message: 'hours' }));
      expect(fetchBotBySlug).toHaveBeenCalledTimes(2);
      expect(getBotStats(botId)[0].messageCount).toBe(1);
    });

    it('rejects a missing bot or message', async () => {
      const res = await app.request('/chat', postJson({ bot: 'cozy-cafe' }));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Missing 'bot' or 'message' in request body" });
    });

    it('rejects a body that is not JSON', async () => {
      const res = await app.request('/chat', { method: 'POST', body: 'not json' });
      expect(res.status).toBe(400);
    });
  });

  describe('POST /api/bots', () => {
    it('creates a bot with its valid pairs', async () => {
      const res = await app.request('/api/bots', postJson({
        slug: 'book-club',
        name: 'Book Club',
        pairs: [
          { question: 'When do you meet?', answer: 'Thursdays.', keywords: 'meet,when', priority: 4 },
          { question: 'No answer here' },
        ],
      }));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ success: true, link: '/chat/book-club' });

      const bot = fetchBotBySlug('book-club');
      expect(bot?.theme).toBe('arctic');
      expect(fetchQna(bot?.id ?? -1)).toEqual([
        { id: 3, question: 'When do you meet?', answer: 'Thursdays.', keywordSpec: 'meet,when', priority: 4 },
      ]);
    });

    it('rejects a pair with a non-integer priority without creating the bot', async () => {
      for (const priority of [2.5, '5']) {
        const res = await app.request('/api/bots', postJson({
          slug: 'book-club',
          name: 'Book Club',
          pairs: [{ question: 'When?', answer: 'Thursdays.', priority }],
        }));
        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: 'priority must be an integer' });
      }
      expect(fetchBotBySlug('book-club')).toBeNull();
    });

    it('rejects a missing name or slug', async () => {
      const res = await app.request('/api/bots', postJson({ slug: 'x' }));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Missing bot name or slug' });
    });

    it('rejects a taken slug', async () => {
      const res = await app.request('/api/bots', postJson({ slug: 'cozy-cafe', name: 'Again' }));
      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({ error: 'Bot with this slug already exists' });
    });
  });

  describe('GET /api/bots/:slug', () => {
    it('returns the bot with its pairs in match order', async () => {
      const res = await app.request('/api/bots/cozy-cafe');
      expect(await res.json()).toEqual({
        name: 'Cozy Cafe',
        slug: 'cozy-cafe',
        theme: 'warm',
        pairs: [
          { question: 'What are your hours?', answer: 'Weekdays 7am-8pm.' },
          { question: 'Do you have WiFi?', answer: 'Yes, free WiFi.' },
        ],
      });
    });

    it('404s for an unknown bot', async () => {
      const res = await app.request('/api/bots/nope');
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Bot not found' });
    });
  });

  describe('owner routes', () => {
    const auth = { Authorization: `Bearer ${TOKEN}` };

    it('requires the admin token', async () => {
      const res = await app.request('/api/bots/cozy-cafe/stats');
      expect(res.status).toBe(401);

      const wrong = await app.request('/api/bots/cozy-cafe/stats', { headers: { Authorization: 'Bearer nope' } });
      expect(wrong.status).toBe(401);
    });

    it('rejects everything when no token is configured', async () => {
      const open = createAPI(createRulesEngine({ store: createSqliteStore() }), '');
      const res = await open.request('/api/bots/cozy-cafe/stats', { headers: { Authorization: 'Bearer ' } });
      expect(res.status).toBe(401);
    });

    it('adds a pair that the engine then matches', async () => {
      const res = await app.request('/api/bots/cozy-cafe/pairs', postJson({
        question: 'Do you allow dogs?',
        answer: 'On the patio.',
        keywords: 'dog,dogs,pet',
        priority: 8,
      }, auth));
      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({ ok: true, id: 3 });

      const chat = await app.request('/chat', postJson({ bot: 'cozy-cafe', message: 'Can I bring my dog?' }));
      expect(await chat.json()).toMatchObject({ matched: true, answer: 'On the patio.', confidence: 37 });
    });

    it('rejects a pair without an answer', async () => {
      const res = await app.request('/api/bots/cozy-cafe/pairs', postJson({ question: 'Q?' }, auth));
      expect(res.status).toBe(400);
    });

    it('rejects a pair with a non-integer priority', async () => {
      const res = await app.request('/api/bots/cozy-cafe/pairs', postJson({ question: 'Q?', answer: 'A', priority: '5' }, auth));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'priority must be an integer' });
      expect(fetchQna(botId)).toHaveLength(2);
    });

    it('deletes a pair', async () => {
      const res = await app.request('/api/bots/cozy-cafe/pairs/2', { method: 'DELETE', headers: auth });
      expect(await res.json()).toEqual({ ok: true });
      expect(fetchQna(botId).map(p => p.id)).toEqual([1]);

      const again = await app.request('/api/bots/cozy-cafe/pairs/2', { method: 'DELETE', headers: auth });
      expect(again.status).toBe(404);
    });

    it('returns stats', async () => {
      await app.request('/chat', postJson({ bot: 'cozy-cafe', message: 'hours' }));
      const res = await app.request('/api/bots/cozy-cafe/stats', { headers: auth });
      expect(await res.json()).toEqual({
        stats: [expect.objectContaining({ botId, dailySessions: 0, messageCount: 1 })],
      });
    });
  });
});
