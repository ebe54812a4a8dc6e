export const EMA_PERIODS = {
  ema20: 20,
  ema50: 50,
  ema200: 200,
} as const;
