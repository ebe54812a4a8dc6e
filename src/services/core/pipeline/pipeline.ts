import { TABLE_NAMES } from '@constants/table.const';
import { analyzeCrossovers } from '@services/analysis/analysis';
import { config } from '@services/configuration/configuration';
import { toTables } from '@services/export/tableExporter';
import { inject } from '@services/injecter/injecter';
import { debug, info } from '@services/logger';
import { formatCrossoverReport, formatIntervalReport } from '@services/report/report';
import { pluralize } from '@utils/string/string.utils';
import { each } from 'lodash-es';
import type { AnalyzedContext, ExportedContext, FetchedContext, PipelineOptions } from './pipeline.types';

export const fetchBars = async (context: PipelineOptions): Promise<FetchedContext> => {
  const bars = await context.source.fetchDailyBars();
  debug('pipeline', `${bars.length} daily ${pluralize('bar', bars.length)} received`);
  return { ...context, bars };
};

export const analyze = (context: FetchedContext): AnalyzedContext => ({
  ...context,
  result: analyzeCrossovers({ bars: context.bars, binEdges: context.binEdges }),
});

export const report = (context: AnalyzedContext): AnalyzedContext => {
  if (!context.showReport) return context;
  const { events, summaries } = context.result;
  each([...formatCrossoverReport(events), ...formatIntervalReport(summaries)], line => info('report', line));
  return context;
};

export const exportTables = (context: AnalyzedContext): ExportedContext => ({
  ...context,
  tables: toTables(context.result, { includeRawTable: context.includeRawTable }),
  obsoleteTables: context.includeRawTable ? [] : [TABLE_NAMES.raw],
});

export const replaceTables = (context: ExportedContext): ExportedContext => {
  context.storage.replaceTables(context.tables, context.obsoleteTables);
  info(
    'pipeline',
    `${context.tables.length} ${pluralize('table', context.tables.length)} replaced: ${context.tables.map(({ name }) => name).join(', ')}`,
  );
  return context;
};

/** Fetches, analyzes, reports and stores. Storage stays open for the caller. */
export const runAnalysisPipeline = async (options: PipelineOptions) => {
  const fetched = await fetchBars(options);
  const { result } = replaceTables(exportTables(report(analyze(fetched))));
  return result;
};

export const crossoverPipeline = async () => {
  const storage = inject.storage();
  try {
    return await runAnalysisPipeline({
      source: inject.priceSource(),
      storage,
      binEdges: config.getDistribution().binEdges,
      includeRawTable: config.getStorage().includeRawTable,
      showReport: config.showReport(),
    });
  } finally {
    storage.close();
  }
};
