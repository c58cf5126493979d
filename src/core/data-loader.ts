/**
 * Data loader — reads config.yaml and seed.yaml from the data
 * directory, and seeds the database from the latter.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import YAML from 'yaml';
import type { BotVisibility, FaqbotConfig, ScoringWeights, SeedBot, SeedData, SeedPair } from '../types/index.js';
import { addBot, addQna, fetchBotBySlug } from '../db/index.js';
import { DEFAULT_WEIGHTS } from './scorer.js';

export interface LoadedData {
  config: FaqbotConfig;
  seed: SeedData;
}

type YamlObject = Record<string, unknown>;

/**
 * Load config and seed data from the data directory.
 * A missing config.yaml means defaults; a missing seed.yaml means no bots.
 */
export function loadData(dataDir: string, env: NodeJS.ProcessEnv = process.env): LoadedData {
  const configPath = join(dataDir, 'config.yaml');
  const seedPath = join(dataDir, 'seed.yaml');

  const config = parseConfig(
    existsSync(configPath) ? YAML.parse(readFileSync(configPath, 'utf-8')) : {},
    env
  );
  const seed = existsSync(seedPath)
    ? parseSeed(YAML.parse(readFileSync(seedPath, 'utf-8')))
    : { bots: [] };

  return { config, seed };
}

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): FaqbotConfig {
  const root = asObject(raw ?? {}, 'config');
  const server = asObject(root.server ?? {}, 'server');
  const admin = asObject(root.admin ?? {}, 'admin');

  const port = env.PORT ? Number(env.PORT) : optionalNumber(server.port, 'server.port') ?? 5000;
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid port: ${env.PORT ?? String(server.port)}`);
  }

  return {
    server: {
      port,
      host: optionalString(server.host, 'server.host') ?? '0.0.0.0',
    },
    admin: {
      token: env.FAQBOT_ADMIN_TOKEN ?? optionalString(admin.token, 'admin.token') ?? '',
    },
    scoring: parseWeights(root.scoring ?? {}),
    debug: env.FAQBOT_DEBUG === '1' || root.debug === true,
  };
}

/**
 * Merge weight overrides over the defaults. Unknown keys are an error,
 * so a typo doesn't silently leave a default in place.
 */
export function parseWeights(raw: unknown): ScoringWeights {
  const overrides = asObject(raw, 'scoring');
  const weights: Record<keyof ScoringWeights, number> = { ...DEFAULT_WEIGHTS };

  for (const [key, value] of Object.entries(overrides)) {
    if (!isWeightKey(key)) {
      throw new Error(`Unknown scoring weight: ${key}`);
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new Error(`Scoring weight ${key} must be a number`);
    }
    weights[key] = value;
  }

  return Object.freeze(weights);
}

function isWeightKey(key: string): key is keyof ScoringWeights {
  return Object.prototype.hasOwnProperty.call(DEFAULT_WEIGHTS, key);
}

export function parseSeed(raw: unknown): SeedData {
  const root = asObject(raw ?? {}, 'seed');
  const bots = root.bots ?? [];
  if (!Array.isArray(bots)) throw new Error('seed.bots must be a list');

  return {
    bots: bots.map((entry, i): SeedBot => {
      const bot = asObject(entry, `bots[${i}]`);
      const pairs = bot.pairs ?? [];
      if (!Array.isArray(pairs)) throw new Error(`bots[${i}].pairs must be a list`);

      return {
        slug: requiredString(bot.slug, `bots[${i}].slug`),
        name: requiredString(bot.name, `bots[${i}].name`),
        theme: optionalString(bot.theme, `bots[${i}].theme`),
        visibility: optionalVisibility(bot.visibility, `bots[${i}].visibility`),
        fallbackMessage: optionalString(bot.fallbackMessage, `bots[${i}].fallbackMessage`),
        pairs: pairs.map((p, j): SeedPair => {
          const pair = asObject(p, `bots[${i}].pairs[${j}]`);
          return {
            question: requiredString(pair.question, `bots[${i}].pairs[${j}].question`),
            answer: requiredString(pair.answer, `bots[${i}].pairs[${j}].answer`),
            keywords: optionalString(pair.keywords, `bots[${i}].pairs[${j}].keywords`),
            priority: optionalInteger(pair.priority, `bots[${i}].pairs[${j}].priority`),
          };
        }),
      };
    }),
  };
}

/**
 * Insert seed bots and their pairs. Bots whose slug already exists
 * are left untouched. Returns the slugs that were created.
 */
export function seedDatabase(seed: SeedData): string[] {
  const created: string[] = [];

  for (const bot of seed.bots) {
    if (fetchBotBySlug(bot.slug)) continue;

    const botId = addBot(bot);
    if (botId === null) continue;

    for (const pair of bot.pairs ?? []) {
      addQna(botId, pair);
    }
    created.push(bot.slug);
  }

  return created;
}

// ── Narrowing helpers ──────────────────────────────────────

function asObject(value: unknown, path: string): YamlObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`${path} must be a mapping`);
  }
  return Object.fromEntries(Object.entries(value));
}

function requiredString(value: unknown, path: string): string {
  if (typeof value !== 'string' || !value) throw new Error(`${path} is required`);
  return value;
}

function optionalString(value: unknown, path: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new Error(`${path} must be a string`);
  return value;
}

function optionalNumber(value: unknown, path: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number') throw new Error(`${path} must be a number`);
  return value;
}

function optionalInteger(value: unknown, path: string): number | undefined {
  const number = optionalNumber(value, path);
  if (number !== undefined && !Number.isInteger(number)) throw new Error(`${path} must be an integer`);
  return number;
}

function optionalVisibility(value: unknown, path: string): BotVisibility | undefined {
  if (value === undefined || value === null) return undefined;
  if (value !== 'public' && value !== 'unlisted') {
    throw new Error(`${path} must be 'public' or 'unlisted'`);
  }
  return value;
}
