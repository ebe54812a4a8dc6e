export type ExportOptions = {
  /** Adds the raw_ohlcv_emas table joining bars and EMAs */
  includeRawTable?: boolean;
};
