import { db } from '../db';
import { InvalidSettingError } from '../errors';
import { SettingRow } from '../types';

export const SETTING_KEYS = {
  requestTimeout: 'default_timeout',
  maxResponseLength: 'max_response_length',
  verifyTls: 'verify_tls',
  exportFormat: 'export_format',
  improverEnabled: 'prompt_improver_enabled',
  improverModel: 'prompt_improver_model'
} as const;

export const DEFAULT_SETTINGS: Readonly<Record<string, string>> = {
  [SETTING_KEYS.requestTimeout]: '30',
  [SETTING_KEYS.maxResponseLength]: '10000',
  [SETTING_KEYS.verifyTls]: 'true',
  [SETTING_KEYS.exportFormat]: 'markdown',
  [SETTING_KEYS.improverEnabled]: 'true',
  // Empty until a model is picked.
  [SETTING_KEYS.improverModel]: '',
  auto_save: 'false',
  theme: 'light',
  font_size: '10'
};

export interface DispatchPolicy {
  timeoutMs: number;
  maxResponseLength: number;
  tlsVerify: boolean;
}

export interface DispatchPolicyReading {
  policy: DispatchPolicy;
  issues: InvalidSettingError[];
}

export function defaultSetting(key: string): string | null {
  return Object.prototype.hasOwnProperty.call(DEFAULT_SETTINGS, key) ? DEFAULT_SETTINGS[key] : null;
}

export async function getSetting(key: string): Promise<string | null> {
  const row = await db<SettingRow>('settings').where({ key }).first();
  return row ? row.value : defaultSetting(key);
}

export async function setSetting(key: string, value: string): Promise<void> {
  await db<SettingRow>('settings').insert({ key, value }).onConflict('key').merge();
}

export async function listSettings(): Promise<Record<string, string>> {
  const rows = await db<SettingRow>('settings').select('key', 'value').orderBy('key', 'asc');
  const settings: Record<string, string> = { ...DEFAULT_SETTINGS };
  for (const row of rows) {
    settings[row.key] = row.value;
  }
  return settings;
}

export async function ensureDefaultSettings(): Promise<void> {
  const rows = Object.entries(DEFAULT_SETTINGS).map(([key, value]) => ({ key, value }));
  await db<SettingRow>('settings').insert(rows).onConflict('key').ignore();
}

// Node clamps any timer delay above a signed 32-bit millisecond count to 1ms.
const MAX_TIMER_MS = 2_147_483_647;

export function timeoutSecondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

export function parseTimeoutSeconds(value: string): number {
  const seconds = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidSettingError(SETTING_KEYS.requestTimeout, value, 'expected a positive number of seconds');
  }
  const ms = timeoutSecondsToMs(seconds);
  if (ms < 1 || ms > MAX_TIMER_MS) {
    throw new InvalidSettingError(
      SETTING_KEYS.requestTimeout,
      value,
      `expected between 0.001 and ${MAX_TIMER_MS / 1000} seconds`
    );
  }
  return seconds;
}

export function parseMaxResponseLength(value: string): number {
  const length = Number(value.trim());
  if (value.trim() === '' || !Number.isInteger(length) || length <= 0) {
    throw new InvalidSettingError(SETTING_KEYS.maxResponseLength, value, 'expected a positive whole number');
  }
  return length;
}

/** `null` means no model has been picked. */
export function parseImproverModelId(value: string): number | null {
  const trimmed = value.trim();
  if (trimmed === '') {
    return null;
  }
  const id = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(id) || id <= 0) {
    throw new InvalidSettingError(SETTING_KEYS.improverModel, value, 'expected a model id or an empty value');
  }
  return id;
}

const TRUTHY = new Set(['true', '1', 'yes', 'on']);
const FALSY = new Set(['false', '0', 'no', 'off']);

export function parseBooleanSetting(key: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUTHY.has(normalized)) {
    return true;
  }
  if (FALSY.has(normalized)) {
    return false;
  }
  throw new InvalidSettingError(key, value, 'expected true or false');
}

const RECOGNIZED_PARSERS: Record<string, (value: string) => unknown> = {
  [SETTING_KEYS.requestTimeout]: parseTimeoutSeconds,
  [SETTING_KEYS.maxResponseLength]: parseMaxResponseLength,
  [SETTING_KEYS.verifyTls]: (value) => parseBooleanSetting(SETTING_KEYS.verifyTls, value),
  [SETTING_KEYS.improverEnabled]: (value) => parseBooleanSetting(SETTING_KEYS.improverEnabled, value),
  [SETTING_KEYS.improverModel]: parseImproverModelId,
  [SETTING_KEYS.exportFormat]: (value) => {
    if (value !== 'markdown' && value !== 'json') {
      throw new InvalidSettingError(SETTING_KEYS.exportFormat, value, 'expected markdown or json');
    }
    return value;
  }
};

/** Throws InvalidSettingError when a recognized key carries a value its consumer cannot parse. */
export function validateSetting(key: string, value: string): void {
  const parser = RECOGNIZED_PARSERS[key];
  if (parser) {
    parser(value);
  }
}

function readWithFallback<T>(
  raw: string | null,
  key: string,
  parse: (value: string) => T,
  issues: InvalidSettingError[]
): T {
  const fallback = parse(DEFAULT_SETTINGS[key]);
  if (raw === null) {
    return fallback;
  }
  try {
    return parse(raw);
  } catch (error) {
    if (error instanceof InvalidSettingError) {
      issues.push(error);
      return fallback;
    }
    throw error;
  }
}

/**
 * Reads the per-call policy once. Unparsable values fall back to their
 * defaults and are returned as issues instead of thrown.
 */
export async function readDispatchPolicy(): Promise<DispatchPolicyReading> {
  const rows = await db<SettingRow>('settings').whereIn('key', [
    SETTING_KEYS.requestTimeout,
    SETTING_KEYS.maxResponseLength,
    SETTING_KEYS.verifyTls
  ]);
  const stored = new Map(rows.map((row) => [row.key, row.value]));
  const issues: InvalidSettingError[] = [];

  const timeoutSeconds = readWithFallback(
    stored.get(SETTING_KEYS.requestTimeout) ?? null,
    SETTING_KEYS.requestTimeout,
    parseTimeoutSeconds,
    issues
  );
  const maxResponseLength = readWithFallback(
    stored.get(SETTING_KEYS.maxResponseLength) ?? null,
    SETTING_KEYS.maxResponseLength,
    parseMaxResponseLength,
    issues
  );
  const tlsVerify = readWithFallback(
    stored.get(SETTING_KEYS.verifyTls) ?? null,
    SETTING_KEYS.verifyTls,
    (value) => parseBooleanSetting(SETTING_KEYS.verifyTls, value),
    issues
  );

  return {
    policy: {
      timeoutMs: timeoutSecondsToMs(timeoutSeconds),
      maxResponseLength,
      tlsVerify
    },
    issues
  };
}
