import { config as loadEnv } from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_TRANSPORT, TRANSPORT_TYPES, parseTransportType, type TransportType } from './transport';
import type { TargetIdentity } from './types';

export type SenderConfig = {
  intervalMs: number;
  target: TargetIdentity;
  transportType: TransportType;
};

const SETTINGS_FILE = path.join('config', 'appsettings.json');

const SettingValue = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));

const SettingsFileSchema = z.record(SettingValue.nullable());

const RawSchema = z.object({
  DMDelay: z.string().default('00:00:05'),
  TargetModuleId: z.string().min(1, 'TargetModuleId must not be empty').default('DirectMethodReceiver'),
  IOTEDGE_DEVICEID: z.string({ required_error: 'IOTEDGE_DEVICEID is required for the direct method sender' }).min(1),
  ClientTransportType: z.string().optional(),
});

let envLoaded = false;

function ensureEnvLoaded(cwd: string) {
  if (envLoaded) return;
  const explicit = process.env.DIRECT_METHOD_SENDER_ENV_FILE;
  const candidate = path.resolve(cwd, explicit ?? '.env');
  if (fs.existsSync(candidate)) {
    loadEnv({ path: candidate, override: false });
  }
  envLoaded = true;
}

function readSettingsFile(cwd: string): Record<string, string> {
  const file = path.resolve(cwd, SETTINGS_FILE);
  if (!fs.existsSync(file)) return {};
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    throw new Error(`Invalid ${SETTINGS_FILE}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = SettingsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Invalid ${SETTINGS_FILE}: expected a flat object of scalar values`);
  }
  const settings: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    if (value !== null) settings[key] = value;
  }
  return settings;
}

function definedEntries(env: NodeJS.ProcessEnv): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) entries[key] = value;
  }
  return entries;
}

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DAY_COUNT = /^\d+$/;
const TIME_SPAN = /^(?:(\d+)\.)?(\d{1,2}):(\d{1,2})(?::(\d{1,2})(?:\.(\d{1,7}))?)?$/;

/**
 * Parses `d` or `[d.]hh:mm[:ss[.fffffff]]` into milliseconds; a bare number counts days.
 * Returns `null` when the text is not a time span.
 */
export function parseTimeSpan(value: string): number | null {
  const text = value.trim();
  if (DAY_COUNT.test(text)) return Number(text) * MS_PER_DAY;
  const match = TIME_SPAN.exec(text);
  if (!match) return null;
  const [, days = '0', hours, minutes, seconds = '0', fraction = ''] = match;
  const h = Number(hours);
  const m = Number(minutes);
  const s = Number(seconds);
  if (h > 23 || m > 59 || s > 59) return null;
  const ms = fraction ? Math.floor(Number(`0.${fraction}`) * 1000) : 0;
  return (((Number(days) * 24 + h) * 60 + m) * 60 + s) * 1000 + ms;
}

export function loadSenderConfig(options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}): SenderConfig {
  const cwd = options.cwd ?? process.cwd();
  if (!options.env) ensureEnvLoaded(cwd);
  const env = options.env ?? process.env;
  const merged = { ...readSettingsFile(cwd), ...definedEntries(env) };
  const parsed = RawSchema.safeParse(merged);
  if (!parsed.success) {
    const flat = parsed.error.flatten();
    throw new Error(`Invalid direct method sender configuration: ${JSON.stringify(flat.fieldErrors)}`);
  }
  const raw = parsed.data;

  const intervalMs = parseTimeSpan(raw.DMDelay);
  if (intervalMs === null || intervalMs <= 0) {
    throw new Error(`DMDelay must be a positive time span such as 00:00:05, got "${raw.DMDelay}"`);
  }

  let transportType = DEFAULT_TRANSPORT;
  if (raw.ClientTransportType) {
    const resolved = parseTransportType(raw.ClientTransportType);
    if (!resolved) {
      throw new Error(
        `ClientTransportType must be one of ${TRANSPORT_TYPES.join(', ')}, got "${raw.ClientTransportType}"`,
      );
    }
    transportType = resolved;
  }

  return {
    intervalMs,
    target: { deviceId: raw.IOTEDGE_DEVICEID, moduleId: raw.TargetModuleId },
    transportType,
  };
}

export function __resetSenderConfigForTests() {
  envLoaded = false;
}
