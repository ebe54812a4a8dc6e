import type { EMA_PERIODS } from '@constants/ema.const';
import type { EpochTimeStamp } from './utility.types';

export type EmaKey = keyof typeof EMA_PERIODS;

export type EmaPoint = {
  date: EpochTimeStamp;
  value: number;
};

export type EmaLine = readonly EmaPoint[];

export type EmaSeries = Readonly<Record<EmaKey, EmaLine>>;
