/** 50-day wide bins from 0 to 999, then a single `1000+` bin. */
export const DEFAULT_BIN_EDGES: readonly number[] = Array.from({ length: 21 }, (_, i) => i * 50);
