/**
 * CLI configuration -- ~/.shellgate/config.json
 *
 * The user file is deep-merged over built-in defaults (arrays replace,
 * objects merge), `${VAR}` references in string values are resolved from
 * the environment, and the result is validated. Loading happens once per
 * hook process; the engine receives a frozen PolicyConfig built from it.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

import { ConfigError } from '@shellgate/core';
import type { LogLevel, ShellgateConfig } from '@shellgate/core';
import {
  DEFAULT_ALLOWED_COMMANDS,
  DEFAULT_DEV_PROCESSES,
  DEFAULT_INIT_SCRIPT,
  DEFAULT_SHELL_TOOLS,
} from '@shellgate/security';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ConfigLoadError extends ConfigError {
  constructor(message: string, field?: string) {
    super(message, field);
    this.name = 'ConfigLoadError';
  }
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function getShellgateDir(): string {
  return resolve(homedir(), '.shellgate');
}

export function getConfigPath(): string {
  return join(getShellgateDir(), 'config.json');
}

export function getLogsDir(): string {
  return join(getShellgateDir(), 'logs');
}

export function ensureConfigDir(): void {
  mkdirSync(getLogsDir(), { recursive: true });
}

export function configExists(): boolean {
  return existsSync(getConfigPath());
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export function getDefaultConfig(): ShellgateConfig {
  return {
    policy: {
      allowedCommands: [...DEFAULT_ALLOWED_COMMANDS],
      devProcesses: [...DEFAULT_DEV_PROCESSES],
      initScript: DEFAULT_INIT_SCRIPT,
      shellTools: [...DEFAULT_SHELL_TOOLS],
    },
    observability: {
      observers: ['console'],
      logLevel: 'warn',
      logPath: join(getLogsDir(), 'audit.jsonl'),
    },
  };
}

// ---------------------------------------------------------------------------
// Merge & env resolution
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Objects merge key by key; arrays and scalars from `override` replace. */
function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    result[key] = isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return result;
}

/** Replace `${VAR}` in every string; unset variables become ''. */
function resolveEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => process.env[name] ?? '');
  }
  if (Array.isArray(value)) {
    return value.map(resolveEnvVars);
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, resolveEnvVars(v)]));
  }
  return value;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const OBSERVERS: readonly string[] = ['console', 'file', 'noop'];

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function stringList(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string' && item.length > 0)) {
    throw new ConfigLoadError(`${field} must be a list of non-empty strings`, field);
  }
  return [...value];
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (!isPlainObject(value)) {
    throw new ConfigLoadError(`${name} must be an object`, name);
  }
  return value;
}

function validate(raw: Record<string, unknown>): ShellgateConfig {
  const policy = section(raw, 'policy');
  const observability = section(raw, 'observability');

  const initScript = policy['initScript'];
  if (typeof initScript !== 'string' || initScript.length === 0 || initScript.includes('/')) {
    throw new ConfigLoadError('policy.initScript must be a file name without a directory', 'policy.initScript');
  }

  const logLevel = observability['logLevel'];
  if (!isLogLevel(logLevel)) {
    throw new ConfigLoadError(
      `observability.logLevel must be one of ${LOG_LEVELS.join(', ')}`,
      'observability.logLevel',
    );
  }

  const observers = stringList(observability['observers'], 'observability.observers');
  const unknown = observers.find((name) => !OBSERVERS.includes(name));
  if (unknown !== undefined) {
    throw new ConfigLoadError(`observability.observers: unknown observer "${unknown}"`, 'observability.observers');
  }

  const logPath = observability['logPath'];
  if (logPath !== undefined && typeof logPath !== 'string') {
    throw new ConfigLoadError('observability.logPath must be a string', 'observability.logPath');
  }

  const maxLogSize = observability['maxLogSize'];
  if (maxLogSize !== undefined && (typeof maxLogSize !== 'number' || !Number.isInteger(maxLogSize) || maxLogSize <= 0)) {
    throw new ConfigLoadError('observability.maxLogSize must be a positive integer', 'observability.maxLogSize');
  }

  return {
    policy: {
      allowedCommands: stringList(policy['allowedCommands'], 'policy.allowedCommands'),
      devProcesses: stringList(policy['devProcesses'], 'policy.devProcesses'),
      initScript,
      shellTools: stringList(policy['shellTools'], 'policy.shellTools'),
    },
    observability: {
      observers,
      logLevel,
      logPath: logPath || undefined,
      maxLogSize,
    },
  };
}

// ---------------------------------------------------------------------------
// Load & save
// ---------------------------------------------------------------------------

export function loadConfig(): ShellgateConfig {
  const defaults = getDefaultConfig();
  let merged: Record<string, unknown> = { ...defaults };

  if (configExists()) {
    let user: unknown;
    try {
      user = JSON.parse(readFileSync(getConfigPath(), 'utf8'));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigLoadError(`Failed to parse ${getConfigPath()}: ${message}`);
    }
    if (!isPlainObject(user)) {
      throw new ConfigLoadError(`${getConfigPath()} must contain a JSON object`);
    }
    merged = deepMerge(merged, user);
  }

  const resolved = resolveEnvVars(merged);
  if (!isPlainObject(resolved)) {
    throw new ConfigLoadError('configuration must be an object');
  }
  return validate(resolved);
}

export function saveConfig(config: ShellgateConfig): void {
  ensureConfigDir();
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2) + '\n', 'utf8');
}
