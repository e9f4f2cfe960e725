export type TargetIdentity = Readonly<{
  deviceId: string;
  moduleId: string;
}>;

export type MethodCall = {
  methodName: string;
  payload: Record<string, unknown>;
  connectTimeoutInSeconds: number;
  responseTimeoutInSeconds: number;
};

export type MethodResponse = {
  status: number;
  payload: unknown;
};

export type TelemetryEvent = {
  outputName: string;
  body: string;
};

export type AttemptOutcome = 'published' | 'skipped' | 'failed';

export const SUCCESS_STATUS = 200;

export const METHOD_NAME = 'HelloWorldMethod';

// Hub defaults: no wait for an offline target, 30 s for the method to answer.
export const CONNECT_TIMEOUT_SECONDS = 0;
export const RESPONSE_TIMEOUT_SECONDS = 30;

export const SUCCESS_EVENT: Readonly<TelemetryEvent> = {
  outputName: 'AnyOutput',
  body: 'Method Call succeeded.',
};

export function buildMethodCall(): MethodCall {
  return {
    methodName: METHOD_NAME,
    payload: { Message: 'Hello' },
    connectTimeoutInSeconds: CONNECT_TIMEOUT_SECONDS,
    responseTimeoutInSeconds: RESPONSE_TIMEOUT_SECONDS,
  };
}
