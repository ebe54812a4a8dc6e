import { AnalyzerError } from '@errors/analyzer.error';

export class StorageError extends AnalyzerError {
  constructor(message: string) {
    super('storage', message);
    this.name = 'StorageError';
  }
}
