import type { EngineConfig } from '../model/engine-config.js';
import type { Candidate, MarketKey, MarketProbabilities } from '../types/market.js';
import { MARKET_KEYS, MARKET_LABELS } from './markets.js';

export type CandidateThresholds = Pick<EngineConfig, 'minProb' | 'minProbOverrides'>;

const DEFAULT_THRESHOLDS: CandidateThresholds = { minProb: 0.5, minProbOverrides: {} };

function round(x: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(x * f) / f;
}

/** Zero-margin price; undefined when the probability is 0. */
export function fairOdds(prob: number): number | undefined {
  return prob > 0 ? round(1 / prob, 2) : undefined;
}

export function thresholdFor(market: MarketKey, thresholds: CandidateThresholds): number {
  return thresholds.minProbOverrides[market] ?? thresholds.minProb;
}

/**
 * Every catalogue market at or above its threshold, most likely first.
 * Equal probabilities keep catalogue order. An empty list means the
 * fixture has no confident market.
 */
export function buildCandidates(
  probs: MarketProbabilities,
  thresholds: CandidateThresholds = DEFAULT_THRESHOLDS,
): Candidate[] {
  const out: Candidate[] = [];

  for (const market of MARKET_KEYS) {
    const p = probs[market];
    if (p < thresholdFor(market, thresholds)) continue;

    const candidate: Candidate = { market, label: MARKET_LABELS[market], prob: round(p, 4) };
    const fair = fairOdds(p);
    if (fair !== undefined) candidate.fair = fair;
    out.push(candidate);
  }

  return out.sort((a, b) => b.prob - a.prob);
}
