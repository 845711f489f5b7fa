import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { config } from '../../config.js';
import { getPicks, getSummaryRows } from '../../db/queries.js';
import { summarizePicks } from '../../results/summary.js';

const DEFAULT_LEAGUE = config.LEAGUES[0] ?? 'PL';

const querySchema = z.object({
  league: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(200),
});

/** Unknown league codes fall back to the default league. */
function resolveLeague(league: string | undefined): string {
  return league && config.LEAGUES.includes(league) ? league : DEFAULT_LEAGUE;
}

export const picksRoutes: FastifyPluginAsync = async (app) => {
  // GET /picks?league=PL — picks for a league, newest kickoff first
  app.get('/', async (request, reply) => {
    const parsed = querySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Invalid query', issues: parsed.error.issues });
    }
    const league = resolveLeague(parsed.data.league);
    const picks = await getPicks(league, parsed.data.limit);
    return { league, data: picks, count: picks.length };
  });

  // GET /picks/stats?league=PL — win rate, ROI and yield of settled picks
  app.get('/stats', async (request, reply) => {
    const parsed = querySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Invalid query', issues: parsed.error.issues });
    }
    const league = resolveLeague(parsed.data.league);
    return { league, ...summarizePicks(await getSummaryRows(league)) };
  });
};
