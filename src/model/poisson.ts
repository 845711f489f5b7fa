import type { MarketProbabilities } from '../types/market.js';

/**
 * P(k; λ) = e^-λ · λ^k / k!
 * λ = 0 puts the whole mass on k = 0.
 */
export function poissonPmf(k: number, lambda: number): number {
  if (k < 0 || !Number.isInteger(k)) return 0;
  if (lambda <= 0) return k === 0 ? 1 : 0;

  // λ^k / k! as a running product keeps large k finite
  let term = 1;
  for (let i = 1; i <= k; i++) term *= lambda / i;
  return Math.exp(-lambda) * term;
}

/** Truncated joint table: table[h][a] = P(home = h) · P(away = a) for h, a in [0, maxGoals]. */
export function buildScoreline(lambdaHome: number, lambdaAway: number, maxGoals: number): number[][] {
  const ph: number[] = [];
  const pa: number[] = [];
  for (let g = 0; g <= maxGoals; g++) {
    ph.push(poissonPmf(g, lambdaHome));
    pa.push(poissonPmf(g, lambdaAway));
  }
  return ph.map((h) => pa.map((a) => h * a));
}

function normalizePair(a: number, b: number): [number, number] {
  const s = a + b;
  return s > 0 ? [a / s, b / s] : [a, b];
}

/**
 * Aggregate the scoreline table into market probabilities.
 *
 * Mass beyond the goal ceiling is discarded, so each market group
 * (1X2, under/over 2.5, BTTS) is renormalised by its own subtotal.
 * Over 1.5 shares the totals subtotal. Double chance is summed from the
 * renormalised 1X2 values.
 */
export function marketProbabilities(
  lambdaHome: number,
  lambdaAway: number,
  maxGoals: number,
): MarketProbabilities {
  const table = buildScoreline(lambdaHome, lambdaAway, maxGoals);

  let home = 0;
  let draw = 0;
  let away = 0;
  let under25 = 0;
  let over25 = 0;
  let over15 = 0;
  let bttsYes = 0;
  let bttsNo = 0;

  table.forEach((row, h) => {
    row.forEach((p, a) => {
      if (h > a) home += p;
      else if (h === a) draw += p;
      else away += p;

      const total = h + a;
      if (total <= 2) under25 += p;
      else over25 += p;
      if (total >= 2) over15 += p;

      if (h >= 1 && a >= 1) bttsYes += p;
      else bttsNo += p;
    });
  });

  const resultTotal = home + draw + away;
  if (resultTotal > 0) {
    home /= resultTotal;
    draw /= resultTotal;
    away /= resultTotal;
  }

  const goalsTotal = under25 + over25;
  if (goalsTotal > 0) over15 /= goalsTotal;
  [under25, over25] = normalizePair(under25, over25);
  [bttsYes, bttsNo] = normalizePair(bttsYes, bttsNo);

  return {
    home,
    draw,
    away,
    '1x': home + draw,
    x2: away + draw,
    '12': home + away,
    over_15: over15,
    over_25: over25,
    under_25: under25,
    btts_yes: bttsYes,
    btts_no: bttsNo,
  };
}
