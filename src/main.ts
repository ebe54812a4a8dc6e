import { crossoverPipeline } from '@services/core/pipeline/pipeline';
import { error, info } from '@services/logger';
import { logVersion } from '@utils/process/process.utils';

export const main = async () => {
  try {
    info('init', logVersion());
    await crossoverPipeline();
  } catch (e) {
    error('init', e instanceof Error ? e.message : e);
    process.exitCode = 1;
  }
};

await main();
