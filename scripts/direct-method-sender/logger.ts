type Level = 'debug' | 'info' | 'warn' | 'error';

const RANK: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const SINK: Record<Level, (line: string) => void> = {
  // eslint-disable-next-line no-console
  debug: (line) => console.debug(line),
  // eslint-disable-next-line no-console
  info: (line) => console.log(line),
  // eslint-disable-next-line no-console
  warn: (line) => console.warn(line),
  // eslint-disable-next-line no-console
  error: (line) => console.error(line),
};

function isLevel(value: string): value is Level {
  return value in RANK;
}

// Errors always print; DIRECT_METHOD_SENDER_LOG_LEVEL picks the floor for everything else.
const threshold: number = (() => {
  const requested = process.env.DIRECT_METHOD_SENDER_LOG_LEVEL?.trim().toLowerCase();
  if (requested && isLevel(requested)) return RANK[requested];
  return process.env.NODE_ENV === 'test' ? RANK.error : RANK.info;
})();

function write(level: Level, message: string, meta?: Record<string, unknown>) {
  if (RANK[level] < threshold) return;
  const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta, null, 2)}` : '';
  SINK[level](`[${new Date().toISOString()}] ${level.toUpperCase().padEnd(5)} ${message}${suffix}`);
}

export const logger = {
  debug: (message: string, meta?: Record<string, unknown>) => write('debug', message, meta),
  info: (message: string, meta?: Record<string, unknown>) => write('info', message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => write('warn', message, meta),
  error: (message: string, meta?: Record<string, unknown>) => write('error', message, meta),
};
