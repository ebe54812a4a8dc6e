import type { CrossoverCategory, CrossoverRule } from '@models/crossover.types';

/** Category order drives every table ordering and the category numbers. */
export const CROSSOVER_CATEGORIES = ['BULLISH_20_50', 'BEARISH_20_50', 'GOLDEN_50_200', 'DEATH_50_200'] as const;

export const CATEGORY_NUMBERS: Record<CrossoverCategory, number> = {
  BULLISH_20_50: 1,
  BEARISH_20_50: 2,
  GOLDEN_50_200: 3,
  DEATH_50_200: 4,
};

export const CATEGORY_LABELS: Record<CrossoverCategory, string> = {
  BULLISH_20_50: 'BULLISH CROSS (20/50)',
  BEARISH_20_50: 'BEARISH CROSS (20/50)',
  GOLDEN_50_200: 'GOLDEN CROSS (50/200)',
  DEATH_50_200: 'DEATH CROSS (50/200)',
};

export const CROSSOVER_RULES: readonly CrossoverRule[] = [
  { pair: '20/50', short: 'ema20', long: 'ema50', up: 'BULLISH_20_50', down: 'BEARISH_20_50' },
  { pair: '50/200', short: 'ema50', long: 'ema200', up: 'GOLDEN_50_200', down: 'DEATH_50_200' },
];
