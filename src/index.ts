/**
 * faqbot — rule-based Q&A chatbot.
 *
 * Entry point. Loads config, opens the database, seeds it,
 * starts the server. One process, one port.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import { resolve } from 'node:path';

import { initDatabase, createSqliteStore, listBots } from './db/index.js';
import { loadData, seedDatabase } from './core/data-loader.js';
import { createRulesEngine } from './core/rules-engine.js';
import { createAPI } from './server/api.js';

const DATA_DIR = process.env.FAQBOT_DATA_DIR ?? resolve(process.cwd(), 'data');
const DB_PATH = process.env.FAQBOT_DB_PATH ?? resolve(process.cwd(), 'faqbot.db');

async function main() {
  console.log('');
  console.log('  ┌─────────────────────────┐');
  console.log('  │      f a q b o t        │');
  console.log('  │   rule-based answers    │');
  console.log('  └─────────────────────────┘');
  console.log('');

  // 1. Load config + seed data
  console.log(`  data:  ${DATA_DIR}`);
  const { config, seed } = loadData(DATA_DIR);

  // 2. Initialize database
  console.log(`  db:    ${DB_PATH}`);
  initDatabase(DB_PATH);

  const created = seedDatabase(seed);
  if (created.length > 0) {
    console.log(`  seed:  ${created.join(', ')}`);
  }

  // 3. Create rules engine
  const engine = createRulesEngine({
    store: createSqliteStore(),
    weights: config.scoring,
    debug: config.debug,
  });
  if (config.debug) {
    console.log('  debug: ON — scoring details attached to results');
  }
  if (!config.admin.token) {
    console.warn('  ⚠  No admin token set. Owner routes will reject every request.');
  }

  // 4. Create server
  const app = new Hono();
  app.route('/', createAPI(engine, config.admin.token));

  // 5. Start
  const { port, host } = config.server;

  serve({
    fetch: app.fetch,
    port,
    hostname: host,
  }, () => {
    console.log('');
    console.log(`  ✓ listening on http://${host}:${port}`);
    console.log(`  ✓ bots: ${listBots().length}`);
    console.log('');
  });
}

main().catch((error) => {
  console.error('Failed to start faqbot:', error);
  process.exit(1);
});
