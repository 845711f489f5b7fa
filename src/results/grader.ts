import { parseMarket } from '../picks/markets.js';
import type { FinalScore } from '../types/fixture.js';
import type { MarketKey } from '../types/market.js';
import type { Evaluation } from '../types/pick.js';

/**
 * Pure grading functions — no side effects, no DB.
 */

const win = (reason: string): Evaluation => ({ result: 'WIN', reason });
const loss = (reason: string): Evaluation => ({ result: 'LOSS', reason });

function scoreline({ home, away }: FinalScore): string {
  return `${home}-${away}`;
}

export function gradeResult(market: 'home' | 'draw' | 'away', score: FinalScore): Evaluation {
  const { home, away } = score;
  const reason = scoreline(score);
  if (market === 'home') return home > away ? win(reason) : loss(reason);
  if (market === 'away') return away > home ? win(reason) : loss(reason);
  return home === away ? win(reason) : loss(reason);
}

export function gradeDoubleChance(market: '1x' | 'x2' | '12', score: FinalScore): Evaluation {
  const { home, away } = score;
  const reason = scoreline(score);
  if (market === '1x') return home >= away ? win(reason) : loss(reason);
  if (market === 'x2') return away >= home ? win(reason) : loss(reason);
  return home !== away ? win(reason) : loss(`${reason} (draw)`);
}

export function gradeTotals(market: 'over_15' | 'over_25' | 'under_25', score: FinalScore): Evaluation {
  const total = score.home + score.away;
  if (market === 'over_15') {
    return total >= 2 ? win(`Total ${total} (>=2)`) : loss(`Total ${total} (<=1)`);
  }
  const over = total >= 3;
  const reason = over ? `Total ${total} (>=3)` : `Total ${total} (<=2)`;
  if (market === 'over_25') return over ? win(reason) : loss(reason);
  return over ? loss(reason) : win(reason);
}

export function gradeBtts(market: 'btts_yes' | 'btts_no', score: FinalScore): Evaluation {
  const bothScored = score.home >= 1 && score.away >= 1;
  const reason = `HG ${score.home} / AG ${score.away}`;
  if (market === 'btts_yes') return bothScored ? win(reason) : loss(reason);
  return bothScored ? loss(reason) : win(reason);
}

export function gradeMarket(market: MarketKey, score: FinalScore): Evaluation {
  switch (market) {
    case 'home':
    case 'draw':
    case 'away':
      return gradeResult(market, score);
    case '1x':
    case 'x2':
    case '12':
      return gradeDoubleChance(market, score);
    case 'over_15':
    case 'over_25':
    case 'under_25':
      return gradeTotals(market, score);
    case 'btts_yes':
    case 'btts_no':
      return gradeBtts(market, score);
  }
}

/**
 * Grade a free-text market label against a final score.
 * Labels outside the catalogue are a PUSH, never an error.
 */
export function evaluateMarket(label: string | null | undefined, score: FinalScore): Evaluation {
  const market = parseMarket(label);
  if (market === 'unsupported') return { result: 'PUSH', reason: 'Market not supported' };
  return gradeMarket(market, score);
}
