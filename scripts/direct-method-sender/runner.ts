import { logger } from './logger';
import { sleep as cancellableSleep } from './shutdown';
import type { ConnectionHandle } from './client';
import {
  SUCCESS_EVENT,
  SUCCESS_STATUS,
  buildMethodCall,
  type AttemptOutcome,
  type TargetIdentity,
} from './types';

export type AttemptStage = 'invoke' | 'publish';

export type InvocationErrorPolicy = (error: unknown, stage: AttemptStage) => void;

export function formatError(err: unknown) {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

export const logAndContinue: InvocationErrorPolicy = (error, stage) => {
  logger.error(stage === 'invoke' ? 'Direct method call failed' : 'Failed to send success event', {
    error: formatError(error),
  });
};

export type AttemptOptions = {
  connection: ConnectionHandle;
  target: TargetIdentity;
  onError?: InvocationErrorPolicy;
};

export async function runAttempt({ connection, target, onError = logAndContinue }: AttemptOptions): Promise<AttemptOutcome> {
  logger.info('Calling direct method on module', { deviceId: target.deviceId, moduleId: target.moduleId });
  const call = buildMethodCall();
  let status: number;
  try {
    const response = await connection.invoke(target, call);
    status = response.status;
  } catch (err) {
    onError(err, 'invoke');
    return 'failed';
  }
  if (status !== SUCCESS_STATUS) {
    logger.warn('Direct method returned non-success status', { methodName: call.methodName, status });
    return 'skipped';
  }
  logger.info('Direct method call succeeded', { methodName: call.methodName, status });
  try {
    await connection.publish(SUCCESS_EVENT);
  } catch (err) {
    onError(err, 'publish');
    return 'failed';
  }
  logger.debug('Success event sent', { outputName: SUCCESS_EVENT.outputName });
  return 'published';
}

export type InvocationLoopOptions = AttemptOptions & {
  intervalMs: number;
  signal: AbortSignal;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
};

/**
 * Calls the direct method every `intervalMs` until `signal` aborts. Per-attempt failures go to
 * `onError` and never end the loop; the wait between attempts ends early on abort.
 */
export async function runInvocationLoop(options: InvocationLoopOptions): Promise<void> {
  const { signal, intervalMs } = options;
  const wait = options.sleep ?? cancellableSleep;
  while (!signal.aborted) {
    await runAttempt(options);
    await wait(intervalMs, signal);
  }
  logger.info('Invocation loop stopped');
}
