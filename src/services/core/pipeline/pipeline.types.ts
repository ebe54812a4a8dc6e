import type { AnalysisResult } from '@models/analysis.types';
import type { PriceBar } from '@models/priceBar.types';
import type { Table } from '@models/table.types';
import type { PriceSource } from '@services/exchange/priceSource.types';
import type { Storage } from '@services/storage/storage';

export type PipelineOptions = {
  source: PriceSource;
  storage: Storage;
  binEdges: readonly number[];
  includeRawTable: boolean;
  showReport?: boolean;
};

export type FetchedContext = PipelineOptions & { bars: PriceBar[] };
export type AnalyzedContext = FetchedContext & { result: AnalysisResult };
/** `obsoleteTables` are dropped from storage alongside the replacement, e.g. the raw table once disabled. */
export type ExportedContext = AnalyzedContext & { tables: Table[]; obsoleteTables: string[] };
