/**
 * State exporter entry point
 */

import {
  ConfigError,
  createLogger,
  errorMessage,
  loadExporterConfig,
  setLogLevel,
  type ExporterConfig,
} from '@validator-watch/shared';
import { StateExporter } from './exporter.js';

const logger = createLogger('main');

function loadConfigOrExit(): ExporterConfig {
  try {
    return loadExporterConfig();
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
  const exporter = new StateExporter(config);

  const shutdown = async (sig: string): Promise<void> => {
    logger.info(`🛑 ${sig} received`);
    controller.abort();
    await exporter.stop();
    process.exit(0);
  };
  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.once(sig, () => {
      shutdown(sig).catch((err) => {
        logger.error(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
    });
  }

  await exporter.start(controller.signal);
}

main().catch((err) => {
  logger.error(`State exporter crashed: ${errorMessage(err)}`);
  process.exit(1);
});
