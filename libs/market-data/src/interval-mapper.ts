export type CanonicalInterval = '1m' | '5m' | '15m' | '30m' | '1h' | '4h' | '1d';

const CANONICAL_INTERVALS = new Set<string>(['1m', '5m', '15m', '30m', '1h', '4h', '1d']);

export const isCanonicalInterval = (v: string): v is CanonicalInterval =>
  CANONICAL_INTERVALS.has(v);

const ALIASES: Record<string, CanonicalInterval> = {
  M1: '1m',
  M5: '5m',
  M15: '15m',
  M30: '30m',
  H1: '1h',
  H4: '4h',
  D1: '1d',
  '1min': '1m',
  '5min': '5m',
  '15min': '15m',
  '30min': '30m',
  '1H': '1h',
  '4H': '4h',
  '1D': '1d',
};

export const normalizeInterval = (v: string): CanonicalInterval | null => {
  const s = String(v ?? '').trim();
  if (!s) return null;
  if (isCanonicalInterval(s)) return s;
  return ALIASES[s] ?? ALIASES[s.toUpperCase()] ?? null;
};

export const parseTimeframeToMs = (timeframe: string): number | null => {
  const canonical = normalizeInterval(timeframe);
  if (!canonical) return null;

  const match = canonical.match(/^(\d+)([mhd])$/);
  if (!match) return null;

  const value = Number(match[1]);
  switch (match[2]) {
    case 'm':
      return value * 60 * 1000;
    case 'h':
      return value * 60 * 60 * 1000;
    case 'd':
      return value * 24 * 60 * 60 * 1000;
    default:
      return null;
  }
};

/** canonical -> provider interval for REST params. */
export const toProviderInterval = (provider: 'twelvedata' | 'binance', interval: string): string => {
  const c = normalizeInterval(interval);
  if (!c) return interval;

  switch (provider) {
    case 'twelvedata':
      return {
        '1m': '1min',
        '5m': '5min',
        '15m': '15min',
        '30m': '30min',
        '1h': '1h',
        '4h': '4h',
        '1d': '1day',
      }[c];
    case 'binance':
      return c;
    default:
      return c;
  }
};
