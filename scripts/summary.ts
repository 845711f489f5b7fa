/**
 * Print pick performance per league.
 */
import { config } from '../src/config.js';
import { sql } from '../src/db/pool.js';
import { getSummaryRows } from '../src/db/queries.js';
import { summarizePicks } from '../src/results/summary.js';

console.log('=== Pick performance ===');
for (const league of config.LEAGUES) {
  const s = summarizePicks(await getSummaryRows(league));
  console.log(
    `  ${league}: ${s.totalPicks} picks | W ${s.wins} L ${s.losses} P ${s.push} pending ${s.pending}` +
      ` | winrate ${s.winrate}% | net ${s.netUnits}u | ROI ${s.roi}% | yield ${s.yield}%`,
  );
}

const byMarket = await sql<{ best_market: string | null; count: number }[]>`
  SELECT best_market, count(*)::int as count
  FROM picks GROUP BY best_market ORDER BY count DESC
`;
console.log('\n=== Picks by market ===');
for (const r of byMarket) console.log(`  ${r.best_market ?? '(none)'}: ${r.count}`);

await sql.end();
