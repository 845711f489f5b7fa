import type { EngineConfig } from '../model/engine-config.js';
import type { Candidate, MarketKey } from '../types/market.js';
import { MARKET_PRIORITY } from './markets.js';

export type SelectorOptions = Pick<EngineConfig, 'similarThreshold' | 'drawEdgeThreshold'>;

const DEFAULT_OPTIONS: SelectorOptions = { similarThreshold: 0.03, drawEdgeThreshold: 0.04 };

// Absorbs binary rounding at threshold edges, e.g. 0.82 - 0.80 vs 0.03
const EPSILON = 1e-9;

export function marketPriority(market: MarketKey): number {
  return MARKET_PRIORITY[market];
}

/**
 * Reduce the candidate list to one recommended market.
 *
 * A draw is only chosen when it beats the best non-draw candidate by at
 * least drawEdgeThreshold. Otherwise candidates within similarThreshold
 * of the top probability are ranked by market priority, then probability.
 */
export function selectBestCandidate(
  candidates: readonly Candidate[],
  options: Partial<SelectorOptions> = {},
): Candidate | null {
  if (!candidates.length) return null;
  const { similarThreshold, drawEdgeThreshold } = { ...DEFAULT_OPTIONS, ...options };

  const maxProb = Math.max(...candidates.map((c) => c.prob));
  const nonDraw = candidates.filter((c) => c.market !== 'draw');
  const maxNonDraw = nonDraw.length ? Math.max(...nonDraw.map((c) => c.prob)) : 0;

  const draw = candidates.find((c) => c.market === 'draw');
  if (draw && draw.prob >= maxNonDraw + drawEdgeThreshold - EPSILON) return draw;

  const similar = candidates
    .filter((c) => c.prob >= maxProb - similarThreshold - EPSILON)
    .sort((a, b) => marketPriority(a.market) - marketPriority(b.market) || b.prob - a.prob);

  return similar[0] ?? candidates[0] ?? null;
}
