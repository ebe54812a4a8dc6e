import { AnalyzerError } from '@errors/analyzer.error';
import { MalformedConfigurationError } from '@errors/malformedConfiguration.error';
import type { Configuration as ConfigurationModel } from '@models/configuration.types';
import { readFileSync } from 'fs';
import { load } from 'js-yaml';
import JSON5 from 'json5';
import { z } from 'zod';
import { configurationSchema } from './configuration.schema';

const parseFile = (configFilePath: string): unknown => {
  const isJson = configFilePath.endsWith('json') || configFilePath.endsWith('json5');
  const isYaml = configFilePath.endsWith('yml') || configFilePath.endsWith('yaml');
  if (!isJson && !isYaml) throw new MalformedConfigurationError(`Unsupported file extension (${configFilePath})`);

  try {
    const data = readFileSync(configFilePath, 'utf8');
    return isJson ? JSON5.parse(data) : load(data);
  } catch (err) {
    throw new MalformedConfigurationError(`Cannot read ${configFilePath} (${err instanceof Error ? err.message : err})`);
  }
};

class Configuration {
  private configuration: ConfigurationModel;

  constructor() {
    const configFilePath = process.env['CROSSOVER_CONFIG_FILE_PATH'];
    if (!configFilePath)
      throw new AnalyzerError('configuration', 'Missing CROSSOVER_CONFIG_FILE_PATH environment variable');

    const result = configurationSchema.safeParse(parseFile(configFilePath));
    if (!result.success) throw new MalformedConfigurationError(z.prettifyError(result.error));
    this.configuration = result.data;
  }

  public showReport() {
    return this.configuration.showReport;
  }

  public getSource() {
    return this.configuration.source;
  }

  public getStorage() {
    return this.configuration.storage;
  }

  public getDistribution() {
    return this.configuration.distribution;
  }
}

export const config = new Configuration();
