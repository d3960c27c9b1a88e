/**
 * Collector entry point
 */

import {
  ConfigError,
  createLogger,
  errorMessage,
  loadCollectorConfig,
  setLogLevel,
  type CollectorConfig,
} from '@validator-watch/shared';
import { Collector } from './collector.js';

const logger = createLogger('main');

function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) resolve();
    else signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

function loadConfigOrExit(): CollectorConfig {
  try {
    return loadCollectorConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const config = loadConfigOrExit();
  setLogLevel(config.LOG_LEVEL);

  const controller = new AbortController();
  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.once(sig, () => {
      logger.info(`🛑 ${sig} received`);
      controller.abort();
    });
  }

  const collector = new Collector(config);
  const final = await collector.run(controller.signal);
  if (final.kind === 'failed') {
    logger.error('Stream supervision failed; health endpoint reports 503 until the process is restarted');
    await untilAborted(controller.signal);
  }

  await collector.shutdown();
}

main().catch((err) => {
  logger.error(`Collector crashed: ${errorMessage(err)}`);
  process.exit(1);
});
