import { AnalyzerError } from '@errors/analyzer.error';

export class PriceSourceError extends AnalyzerError {
  constructor(message: string) {
    super('exchange', message);
    this.name = 'PriceSourceError';
  }
}
