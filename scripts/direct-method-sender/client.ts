import { Message, ModuleClient } from 'azure-iot-device';
import { logger } from './logger';
import { ConnectionOpenError } from './errors';
import { resolveTransport, type TransportType } from './transport';
import type { MethodCall, MethodResponse, TargetIdentity, TelemetryEvent } from './types';

/**
 * Long-lived link to the edge hub. Opened once, shared by every loop iteration and closed once
 * after the loop has returned. Errors from `invoke` and `publish` reach the caller unchanged.
 */
export interface ConnectionHandle {
  invoke(target: TargetIdentity, call: MethodCall): Promise<MethodResponse>;
  publish(event: TelemetryEvent): Promise<void>;
  close(): Promise<void>;
}

export type OpenConnection = (transportType: TransportType) => Promise<ConnectionHandle>;

async function closeQuietly(client: ModuleClient, transportType: TransportType) {
  try {
    await client.close();
  } catch (err) {
    logger.warn('Failed to close module client after open failure', {
      transport: transportType,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

export class ModuleConnection implements ConnectionHandle {
  private closed = false;

  private constructor(private readonly client: ModuleClient) {}

  static async open(transportType: TransportType): Promise<ModuleConnection> {
    let client: ModuleClient;
    try {
      client = await ModuleClient.fromEnvironment(resolveTransport(transportType));
    } catch (err) {
      throw new ConnectionOpenError(`Failed to create module client over ${transportType}`, {
        transport: transportType,
        cause: err,
      });
    }
    try {
      await client.open();
    } catch (err) {
      await closeQuietly(client, transportType);
      throw new ConnectionOpenError(`Failed to open module client over ${transportType}`, {
        transport: transportType,
        cause: err,
      });
    }
    logger.info('Successfully initialized module client.', { transport: transportType });
    return new ModuleConnection(client);
  }

  async invoke(target: TargetIdentity, call: MethodCall): Promise<MethodResponse> {
    const result = await this.client.invokeMethod(target.deviceId, target.moduleId, {
      methodName: call.methodName,
      payload: call.payload,
      connectTimeoutInSeconds: call.connectTimeoutInSeconds,
      responseTimeoutInSeconds: call.responseTimeoutInSeconds,
    });
    return { status: result.status, payload: result.payload };
  }

  async publish(event: TelemetryEvent): Promise<void> {
    await this.client.sendOutputEvent(event.outputName, new Message(event.body));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.client.close();
    } catch (err) {
      logger.warn('Failed to close module client', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

export const openModuleConnection: OpenConnection = (transportType) => ModuleConnection.open(transportType);
