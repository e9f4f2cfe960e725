#!/usr/bin/env node
import { loadSenderConfig, type SenderConfig } from './config';
import { logger } from './logger';
import { runDirectMethodSender } from './app';
import { formatError } from './runner';
import { isConnectionOpenError } from './errors';

let cfg: SenderConfig;
try {
  cfg = loadSenderConfig();
} catch (err) {
  logger.error('Failed to load direct method sender configuration', { error: formatError(err) });
  process.exit(1);
}

runDirectMethodSender({
  config: cfg,
  onForceExit: () => process.exit(1),
})
  .then((code) => process.exit(code))
  .catch((err) => {
    logger.error('Direct method sender crashed', {
      error: formatError(err),
      ...(isConnectionOpenError(err) ? { code: err.code, transport: err.transport, cause: formatError(err.cause) } : {}),
    });
    process.exit(1);
  });
