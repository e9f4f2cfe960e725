import { logger } from './logger';

export type SignalSource = {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
};

/** Set once, after teardown finished. Later `set()` calls report `false` and change nothing. */
export class CompletionLatch {
  private resolved = false;
  private release: () => void = () => {};
  private readonly done: Promise<void>;

  constructor() {
    this.done = new Promise<void>((resolve) => {
      this.release = resolve;
    });
  }

  get isSet() {
    return this.resolved;
  }

  set() {
    if (this.resolved) return false;
    this.resolved = true;
    this.release();
    return true;
  }

  wait() {
    return this.done;
  }
}

export type ShutdownOptions = {
  gracePeriodMs: number;
  onForceExit: () => void;
  signals?: NodeJS.Signals[];
  source?: SignalSource;
};

export type ShutdownCoordinator = {
  signal: AbortSignal;
  completed: CompletionLatch;
  requestShutdown(reason: string): void;
  dispose(): void;
};

export function armShutdown(options: ShutdownOptions): ShutdownCoordinator {
  const signals = options.signals ?? ['SIGINT', 'SIGTERM'];
  const source: SignalSource = options.source ?? process;
  const controller = new AbortController();
  const completed = new CompletionLatch();
  let graceTimer: NodeJS.Timeout | null = null;

  function clearGraceTimer() {
    if (graceTimer) {
      clearTimeout(graceTimer);
      graceTimer = null;
    }
  }

  function requestShutdown(reason: string) {
    if (controller.signal.aborted) {
      logger.info(`Received ${reason}, shutdown already in progress`);
      return;
    }
    logger.info(`Received ${reason}, shutting down...`, { gracePeriodMs: options.gracePeriodMs });
    controller.abort(reason);
    if (completed.isSet) return;
    graceTimer = setTimeout(() => {
      graceTimer = null;
      if (completed.isSet) return;
      logger.error('Shutdown grace period elapsed before teardown completed', {
        gracePeriodMs: options.gracePeriodMs,
      });
      options.onForceExit();
    }, options.gracePeriodMs);
  }

  const listeners = signals.map((signal) => {
    const listener = () => requestShutdown(signal);
    source.on(signal, listener);
    return { signal, listener };
  });

  void completed.wait().then(clearGraceTimer);

  return {
    signal: controller.signal,
    completed,
    requestShutdown,
    dispose() {
      for (const { signal, listener } of listeners) {
        source.off(signal, listener);
      }
      clearGraceTimer();
    },
  };
}

/** Waits `ms`, or less if `signal` aborts first. Never rejects. */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
