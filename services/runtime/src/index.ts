import { closeLogger } from '@ledge/logger';

import { loadConfig } from './config';
import { logger } from './logger';
import { runRuntime } from './runner';

async function main(): Promise<void> {
  const cfg = loadConfig();
  logger.info({ env: cfg.env, catalog: cfg.levelCatalog, ticks: cfg.runTicks }, 'Runtime starting');
  await runRuntime(cfg);
}

main()
  .then(() => closeLogger('runtime'))
  .catch((error: unknown) => {
    logger.error({ err: error }, 'Runtime failed');
    process.exitCode = 1;
    closeLogger('runtime');
  });
