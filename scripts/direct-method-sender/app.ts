import { logger } from './logger';
import { openModuleConnection, type OpenConnection } from './client';
import { dumpModuleClientConfiguration } from './environment';
import { runInvocationLoop, type InvocationErrorPolicy } from './runner';
import { armShutdown, type SignalSource } from './shutdown';
import type { SenderConfig } from './config';

export const DEFAULT_GRACE_PERIOD_MS = 5000;

export type SenderDependencies = {
  config: SenderConfig;
  openConnection?: OpenConnection;
  signalSource?: SignalSource;
  gracePeriodMs?: number;
  onForceExit: () => void;
  onError?: InvocationErrorPolicy;
  env?: NodeJS.ProcessEnv;
};

/**
 * Opens the connection, runs the invocation loop until a termination signal arrives, then tears
 * down in order: close the connection, release the completion latch, detach signal listeners.
 * Resolves with the process exit code. Rejects only when the connection cannot be opened.
 */
export async function runDirectMethodSender(deps: SenderDependencies): Promise<number> {
  const { config } = deps;
  const openConnection = deps.openConnection ?? openModuleConnection;
  logger.info('Main()');
  dumpModuleClientConfiguration(deps.env);
  logger.info(`Using transport ${config.transportType}`);

  const connection = await openConnection(config.transportType);

  const shutdown = armShutdown({
    gracePeriodMs: deps.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS,
    onForceExit: deps.onForceExit,
    source: deps.signalSource,
  });

  logger.info(
    `Call direct method to target device [${config.target.deviceId}] and module [${config.target.moduleId}].`,
    { intervalMs: config.intervalMs },
  );
  try {
    await runInvocationLoop({
      connection,
      target: config.target,
      intervalMs: config.intervalMs,
      signal: shutdown.signal,
      onError: deps.onError,
    });
  } finally {
    await connection.close();
    shutdown.completed.set();
    shutdown.dispose();
  }
  logger.info('Direct method sender stopped');
  return 0;
}
