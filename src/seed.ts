/**
 * Seed the database from data/seed.yaml without starting the server.
 *
 *   npm run seed
 */

import 'dotenv/config';
import { resolve } from 'node:path';

import { initDatabase, closeDatabase, fetchBotBySlug, fetchQna } from './db/index.js';
import { loadData, seedDatabase } from './core/data-loader.js';

const DATA_DIR = process.env.FAQBOT_DATA_DIR ?? resolve(process.cwd(), 'data');
const DB_PATH = process.env.FAQBOT_DB_PATH ?? resolve(process.cwd(), 'faqbot.db');

function main() {
  const { seed } = loadData(DATA_DIR);
  initDatabase(DB_PATH);

  const created = seedDatabase(seed);
  for (const bot of seed.bots) {
    const stored = fetchBotBySlug(bot.slug);
    const pairs = stored ? fetchQna(stored.id).length : 0;
    const state = created.includes(bot.slug) ? 'created' : 'exists ';
    console.log(`  ${state}  ${bot.slug}  (${pairs} pairs)`);
  }

  closeDatabase();
}

try {
  main();
} catch (error) {
  console.error('Seeding failed:', error);
  process.exit(1);
}
