import { errorMessage } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';

/** Receives human-readable milestone messages during a run. */
export type ProgressSink = (message: string) => void;

/**
 * Wraps a caller-supplied sink: every message is also logged, and a sink that
 * throws is reported once per message without interrupting the run.
 */
export function createProgressNotifier(sink: ProgressSink | undefined, log: Logger): ProgressSink {
  return (message) => {
    log.info({ progress: message }, message);
    if (!sink) return;
    try {
      sink(message);
    } catch (err) {
      log.warn({ error: errorMessage(err) }, 'Progress sink threw; continuing');
    }
  };
}
