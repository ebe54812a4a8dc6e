import type { AnalysisInput, AnalysisResult } from '@models/analysis.types';
import { debug } from '@services/logger';
import { pluralize } from '@utils/string/string.utils';
import { detectAllCrossovers } from './crossover/crossoverDetector';
import { computeEmaSeries } from './ema/emaEngine';
import { computeIntervals, distributeIntervals, summarizeIntervals } from './interval/intervalAnalyzer';
import { validateBars } from './validation/barValidator';

/**
 * Runs every stage on the full history: validation, EMAs, crossovers, then
 * interval statistics. Pure apart from debug logs; any ValidationError
 * aborts before a result exists.
 */
export const analyzeCrossovers = ({ bars, binEdges }: AnalysisInput): AnalysisResult => {
  const validBars = validateBars(bars);
  const emas = computeEmaSeries(validBars);
  const events = detectAllCrossovers(validBars, emas);
  const intervals = computeIntervals(events);
  const summaries = summarizeIntervals(intervals);
  const distributions = distributeIntervals(intervals, binEdges);

  debug(
    'analysis',
    `${validBars.length} ${pluralize('bar', validBars.length)} analyzed, ${events.length} ${pluralize('crossover', events.length)} and ${intervals.length} ${pluralize('interval', intervals.length)} found`,
  );

  return Object.freeze({ bars: validBars, emas, events, intervals, summaries, distributions });
};
