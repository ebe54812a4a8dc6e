import { AnalyzerError } from '@errors/analyzer.error';

export class ValidationError extends AnalyzerError {
  constructor(message: string) {
    super('validation', message);
    this.name = 'ValidationError';
  }
}
