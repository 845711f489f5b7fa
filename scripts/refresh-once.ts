/**
 * Run one refresh cycle in-process, without Redis.
 * Usage: npx tsx scripts/refresh-once.ts [league ...]
 * Default: every configured league
 */
import { config } from '../src/config.js';
import { sql } from '../src/db/pool.js';
import { createRefreshDeps } from '../src/pipeline/deps.js';
import { refreshAll } from '../src/pipeline/refresh.js';

const leagues = process.argv.length > 2 ? process.argv.slice(2) : config.LEAGUES;

const results = await refreshAll(leagues, createRefreshDeps());
for (const r of results) {
  console.log(`  ${r.league}: ${r.fixtures} fixtures, ${r.built} picks built, ${r.settled} settled`);
}

await sql.end();
