import type { TransportType } from './transport';

export type ConnectionErrorCode = 'connection_open_failed';

export class ConnectionOpenError extends Error {
  readonly code: ConnectionErrorCode = 'connection_open_failed';
  readonly transport: TransportType;

  constructor(message: string, options: { transport: TransportType; cause?: unknown }) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ConnectionOpenError';
    this.transport = options.transport;
  }
}

export function isConnectionOpenError(err: unknown): err is ConnectionOpenError {
  return err instanceof ConnectionOpenError;
}
