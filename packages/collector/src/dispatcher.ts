import { createLogger, errorMessage, type Logger } from '@validator-watch/shared';
import type { ConnectionHealth } from './connection-health.js';
import { dispatch, parseStreamMessage, type StreamHandlers } from './events.js';

export type ListenExit = 'unhealthy' | 'ended';

const defaultLogger = createLogger('dispatcher');

/**
 * Consume stream messages in delivery order until the connection is marked
 * unhealthy or the stream ends. Either way the connection is left marked
 * disconnected when this returns.
 */
export async function listen(
  messages: AsyncIterable<unknown>,
  health: ConnectionHealth,
  handlers: StreamHandlers,
  logger: Logger = defaultLogger
): Promise<ListenExit> {
  for await (const raw of messages) {
    if (!health.connected) {
      logger.info('Connection marked unhealthy, leaving listen loop');
      return 'unhealthy';
    }
    health.recordMessage();

    const parsed = parseStreamMessage(raw);
    if (!parsed.ok) {
      if (parsed.reason === 'malformed') {
        logger.warn(`Dropping malformed ${parsed.type} event: ${parsed.error}`);
      } else if (parsed.reason === 'unknown-kind') {
        logger.debug(`Ignoring unhandled event kind "${parsed.type}"`);
      }
      continue;
    }

    try {
      await dispatch(parsed.event, handlers);
    } catch (err) {
      logger.error(`${parsed.event.kind} handler failed: ${errorMessage(err)}`);
    }
  }

  if (!health.connected) return 'unhealthy';
  health.markDisconnected('stream ended');
  logger.warn('Stream ended');
  return 'ended';
}
