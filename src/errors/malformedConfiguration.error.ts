import { AnalyzerError } from '@errors/analyzer.error';

export class MalformedConfigurationError extends AnalyzerError {
  constructor(message: string) {
    super('configuration', `Malformed configuration file: ${message}`);
    this.name = 'MalformedConfigurationError';
  }
}
