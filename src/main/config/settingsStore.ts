import Conf from 'conf';
import type { HandoverSettings, LogLevel } from '../../shared/types/handover';
import { DEFAULT_TCP_HANDOVER_PORT } from '../handover/initiators/TcpPushHandover';
import { DEFAULT_SERVICE_NAME } from '../handover/pairing/BluetoothConnector';
import {
  ensureBoolean,
  ensureNumber,
  ensureString,
  isPlainObject,
  parsePort,
} from '../utils/validation';

export const DEFAULT_SETTINGS: HandoverSettings = {
  tcpPort: DEFAULT_TCP_HANDOVER_PORT,
  handoverEnabled: true,
  // 0 leaves dispatch unbounded
  dispatchConcurrency: 0,
  bluetoothServiceName: DEFAULT_SERVICE_NAME,
  logLevel: 'info',
};

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const SETTINGS_FIELDS = new Set<string>(Object.keys(DEFAULT_SETTINGS));

export interface SettingsStoreOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function ensureLogLevel(value: unknown, field: string): LogLevel {
  const level = ensureString(value, field);
  const match = LOG_LEVELS.find((candidate) => candidate === level);
  if (!match) {
    throw new Error(`Field "${field}" must be one of: ${LOG_LEVELS.join(', ')}`);
  }
  return match;
}

/**
 * Validates a partial settings object. Unknown fields are rejected.
 */
export function validateSettings(input: unknown): Partial<HandoverSettings> {
  if (!isPlainObject(input)) {
    throw new Error('Settings must be an object.');
  }

  for (const key of Object.keys(input)) {
    if (!SETTINGS_FIELDS.has(key)) {
      throw new Error(`Unknown settings field "${key}".`);
    }
  }

  const result: Partial<HandoverSettings> = {};
  if (input.tcpPort !== undefined) {
    result.tcpPort = ensureNumber(input.tcpPort, 'tcpPort', { integer: true, min: 0, max: 65535 });
  }
  if (input.handoverEnabled !== undefined) {
    result.handoverEnabled = ensureBoolean(input.handoverEnabled, 'handoverEnabled');
  }
  if (input.dispatchConcurrency !== undefined) {
    result.dispatchConcurrency = ensureNumber(input.dispatchConcurrency, 'dispatchConcurrency', {
      integer: true,
      min: 0,
    });
  }
  if (input.bluetoothServiceName !== undefined) {
    result.bluetoothServiceName = ensureString(
      input.bluetoothServiceName,
      'bluetoothServiceName',
      { maxLength: 64 }
    );
  }
  if (input.logLevel !== undefined) {
    result.logLevel = ensureLogLevel(input.logLevel, 'logLevel');
  }
  return result;
}

export function openSettingsStore(options: SettingsStoreOptions = {}): Conf<HandoverSettings> {
  return new Conf<HandoverSettings>({
    projectName: 'ndef-handover',
    configName: 'settings',
    cwd: options.cwd,
    defaults: DEFAULT_SETTINGS,
  });
}

function applyEnvironment(settings: HandoverSettings, env: NodeJS.ProcessEnv): HandoverSettings {
  const next = { ...settings };
  if (env.NDEF_HANDOVER_TCP_PORT) {
    next.tcpPort = parsePort(env.NDEF_HANDOVER_TCP_PORT, 'NDEF_HANDOVER_TCP_PORT');
  }
  if (env.NDEF_HANDOVER_DISABLED === '1') {
    next.handoverEnabled = false;
  }
  return next;
}

export function loadSettings(options: SettingsStoreOptions = {}): HandoverSettings {
  const store = openSettingsStore(options);
  const stored = validateSettings(store.store);
  return applyEnvironment({ ...DEFAULT_SETTINGS, ...stored }, options.env ?? process.env);
}

export function saveSettings(
  patch: unknown,
  options: SettingsStoreOptions = {}
): HandoverSettings {
  const valid = validateSettings(patch);
  openSettingsStore(options).set(valid);
  return loadSettings(options);
}
