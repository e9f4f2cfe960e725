import { logger } from './logger';

export const MODULE_CLIENT_VARIABLES = [
  'EdgeHubConnectionString',
  'IOTEDGE_WORKLOADURI',
  'IOTEDGE_DEVICEID',
  'IOTEDGE_MODULEID',
  'IOTEDGE_IOTHUBHOSTNAME',
  'IOTEDGE_AUTHSCHEME',
  'IOTEDGE_MODULEGENERATIONID',
  'IOTEDGE_GATEWAYHOSTNAME',
] as const;

export type EnvironmentEntry = { key: (typeof MODULE_CLIENT_VARIABLES)[number]; value: string | null };

const SHARED_ACCESS_KEY = /(SharedAccessKey=)[^;]*/gi;

export function redactConnectionString(value: string) {
  return value.replace(SHARED_ACCESS_KEY, '$1[redacted]');
}

export function dumpModuleClientConfiguration(env: NodeJS.ProcessEnv = process.env): EnvironmentEntry[] {
  const entries = MODULE_CLIENT_VARIABLES.map((key) => {
    const value = env[key];
    if (value === undefined) return { key, value: null };
    return { key, value: key === 'EdgeHubConnectionString' ? redactConnectionString(value) : value };
  });
  logger.info('[Configuration for module client]', {
    configuration: Object.fromEntries(entries.map(({ key, value }) => [key, value])),
  });
  return entries;
}
