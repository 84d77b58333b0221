import type { Logger } from '../utils/logger.js';

const STOP_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

export interface StopListener {
  /** Aborted by the first SIGINT or SIGTERM. Runs hand it to plugins through the execution context. */
  signal: AbortSignal;
  /** Removes the process listeners. A signal arriving afterwards gets Node's default handling. */
  dispose(): void;
}

/**
 * Asks the running plugin to stop on the first SIGINT or SIGTERM instead of
 * letting Node exit mid-run. A second signal terminates the process.
 */
export function listenForStop(logger: Logger): StopListener {
  const controller = new AbortController();

  const dispose = (): void => {
    for (const name of STOP_SIGNALS) process.off(name, onSignal);
  };

  function onSignal(received: NodeJS.Signals): void {
    dispose();
    logger.warn('Received stop signal, asking the running plugin to stop', { signal: received });
    controller.abort(received);
  }

  for (const name of STOP_SIGNALS) process.on(name, onSignal);

  return { signal: controller.signal, dispose };
}
