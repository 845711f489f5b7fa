import type { MarketKey, ParsedMarket } from '../types/market.js';

/** Fixed catalogue, in the order candidates are built. */
export const MARKET_KEYS = [
  'home',
  'draw',
  'away',
  '1x',
  'x2',
  '12',
  'over_15',
  'over_25',
  'under_25',
  'btts_yes',
  'btts_no',
] as const satisfies readonly MarketKey[];

export const MARKET_LABELS: Record<MarketKey, string> = {
  home: 'Home Win',
  draw: 'Draw',
  away: 'Away Win',
  '1x': '1X',
  x2: 'X2',
  '12': '12',
  over_15: 'Over 1.5',
  over_25: 'Over 2.5',
  under_25: 'Under 2.5',
  btts_yes: 'BTTS Yes',
  btts_no: 'BTTS No',
};

/**
 * Lower = preferred when candidates are practically tied.
 * Draw sits last: it is only recommended on a clear edge.
 */
export const MARKET_PRIORITY: Record<MarketKey, number> = {
  '1x': 0,
  x2: 0,
  home: 1,
  away: 1,
  '12': 1,
  over_15: 2,
  over_25: 2,
  under_25: 2,
  btts_yes: 3,
  btts_no: 3,
  draw: 4,
};

const ALIASES: Record<MarketKey, string[]> = {
  home: ['home', '1', 'home team', 'local'],
  draw: ['x', 'tie', 'empate'],
  away: ['away', '2', 'away team', 'visitante'],
  '1x': ['home or draw', 'double chance 1x'],
  x2: ['2x', 'draw or away', 'double chance x2'],
  '12': ['home or away', 'no draw', 'double chance 12'],
  over_15: ['o1.5', 'over 1.5 goals'],
  over_25: ['o2.5', 'over 2.5 goals'],
  under_25: ['u2.5', 'under 2.5 goals'],
  btts_yes: ['both teams to score', 'gg', 'ambos marcan'],
  btts_no: ['both teams not to score', 'ng', 'ambos no marcan'],
};

const CANONICAL = new Map<string, MarketKey>();
for (const key of MARKET_KEYS) {
  CANONICAL.set(key, key);
  CANONICAL.set(normalizeLabel(MARKET_LABELS[key]), key);
  for (const alias of ALIASES[key]) CANONICAL.set(alias, key);
}

// Markets outside the catalogue whose labels would otherwise hit a rule below.
const UNSUPPORTED_PATTERNS: readonly RegExp[] = [/\bdraw no bet\b/, /\bdnb\b/, /\bhandicap\b/, /\bcorrect score\b/];

// Checked in order when no canonical name matches. Double chance comes
// before the 1X2 rules since its labels mention "draw"; "no" variants
// come before the bare BTTS ones.
const SUBSTRING_RULES: ReadonlyArray<readonly [RegExp, MarketKey]> = [
  [/\b1x\b|\bhome or draw\b|\bdraw or home\b/, '1x'],
  [/\bx2\b|\b2x\b|\baway or draw\b|\bdraw or away\b/, 'x2'],
  [/\b12\b|\bhome or away\b|\bno draw\b/, '12'],
  [/\bhome win\b|\blocal\b/, 'home'],
  [/\baway win\b|\bvisitante\b/, 'away'],
  [/\bdraw\b|\bempate\b/, 'draw'],
  [/\bunder 2\.5\b/, 'under_25'],
  [/\bover 2\.5\b/, 'over_25'],
  [/\bover 1\.5\b/, 'over_15'],
  [/\bbtts no\b|\bboth teams to score no\b|\bambos no marcan\b|\bambos marcan no\b/, 'btts_no'],
  [/\bbtts yes\b|\bboth teams to score( yes)?\b|\bambos marcan\b/, 'btts_yes'],
];

/** Lowercase, punctuation such as ":", "-" and "()" to spaces, whitespace collapsed. */
function normalizeLabel(label: string): string {
  return label
    .toLowerCase()
    .replace(/[:;,()[\]|/-]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Map a free-text market label onto the catalogue.
 * Labels that match nothing come back as 'unsupported'.
 */
export function parseMarket(label: string | null | undefined): ParsedMarket {
  const normalized = normalizeLabel(label ?? '');
  if (!normalized) return 'unsupported';

  const exact = CANONICAL.get(normalized);
  if (exact) return exact;

  if (UNSUPPORTED_PATTERNS.some((re) => re.test(normalized))) return 'unsupported';
  for (const [pattern, key] of SUBSTRING_RULES) {
    if (pattern.test(normalized)) return key;
  }
  return 'unsupported';
}

export function marketLabel(key: MarketKey): string {
  return MARKET_LABELS[key];
}
