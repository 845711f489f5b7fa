import type { PickStatus } from '../types/pick.js';

export interface SummaryRow {
  status: PickStatus;
  /** Fair odds of the selected market */
  fair: number | null;
  /** Model probability of the selected market */
  prob: number | null;
}

export interface PickSummary {
  totalPicks: number;
  wins: number;
  losses: number;
  push: number;
  pending: number;
  /** Percentage of decided picks (WIN + LOSS) that won */
  winrate: number;
  /** Profit in one-unit stakes at fair odds */
  netUnits: number;
  /** Net units over staked picks (WIN + LOSS), percent */
  roi: number;
  /** Net units over all settled picks including PUSH, percent */
  yield: number;
}

const round2 = (x: number) => Math.round(x * 100) / 100;

/** Fair odds when stored, otherwise implied from the probability. */
function oddsOf(row: SummaryRow): number | null {
  if (row.fair != null && row.fair > 0) return row.fair;
  if (row.prob != null && row.prob > 0) return 1 / row.prob;
  return null;
}

export function summarizePicks(rows: readonly SummaryRow[]): PickSummary {
  let wins = 0;
  let losses = 0;
  let push = 0;
  let pending = 0;
  let net = 0;

  for (const row of rows) {
    switch (row.status) {
      case 'WIN': {
        wins++;
        const odds = oddsOf(row);
        if (odds !== null) net += odds - 1;
        break;
      }
      case 'LOSS':
        losses++;
        net -= 1;
        break;
      case 'PUSH':
        push++;
        break;
      case 'PENDING':
        pending++;
        break;
    }
  }

  const decided = wins + losses;
  const settled = decided + push;

  return {
    totalPicks: rows.length,
    wins,
    losses,
    push,
    pending,
    winrate: decided ? round2((wins / decided) * 100) : 0,
    netUnits: round2(net),
    roi: decided ? round2((net / decided) * 100) : 0,
    yield: settled ? round2((net / settled) * 100) : 0,
  };
}
