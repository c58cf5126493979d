/**
 * Terminal chat against one bot — handy for tuning keywords.
 *
 *   npm run chat -- cozy-cafe
 *   FAQBOT_DEBUG=1 npm run chat -- cozy-cafe   (show score breakdowns)
 */

import 'dotenv/config';
import { createInterface } from 'node:readline';
import { stdin, stdout } from 'node:process';
import { resolve } from 'node:path';

import { initDatabase, createSqliteStore, closeDatabase } from './db/index.js';
import { loadData } from './core/data-loader.js';
import { createRulesEngine } from './core/rules-engine.js';

const DATA_DIR = process.env.FAQBOT_DATA_DIR ?? resolve(process.cwd(), 'data');
const DB_PATH = process.env.FAQBOT_DB_PATH ?? resolve(process.cwd(), 'faqbot.db');

async function main() {
  const slug = process.argv[2] ?? 'cozy-cafe';
  const { config } = loadData(DATA_DIR);
  initDatabase(DB_PATH);

  const engine = createRulesEngine({
    store: createSqliteStore(),
    weights: config.scoring,
    debug: config.debug,
  });

  console.log(`faqbot — chatting with '${slug}'. Type 'exit' to quit.`);
  if (config.debug) console.log('debug is ON — showing scoring details.\n');

  const rl = createInterface({ input: stdin, output: stdout, prompt: '> ' });
  rl.prompt();

  for await (const raw of rl) {
    const line = raw.trim();
    if (line.toLowerCase() === 'exit' || line.toLowerCase() === 'quit') break;

    const result = engine.matchRule(slug, line);
    console.log(result.answer);
    if (result.debug) {
      console.log(`   [via] ${JSON.stringify(result.debug)}`);
    }
    rl.prompt();
  }

  rl.close();
  closeDatabase();
  console.log('Bye!');
}

main().catch((error) => {
  console.error('Chat failed:', error);
  process.exit(1);
});
