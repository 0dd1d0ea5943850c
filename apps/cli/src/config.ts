/**
 * CLI configuration: location, defaults, loading, validation, saving.
 *
 * The config lives at ~/.hostwarden/config.json unless overridden by
 * `--config <path>` or the HOSTWARDEN_CONFIG environment variable. User JSON
 * is deep-merged over the defaults (arrays replace), `${VAR}` references in
 * strings are resolved from the environment, and every server entry is
 * filled with the ServerConfig defaults before validation.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import {
  ConfigError,
  RESTART_POLICIES,
  SERVER_CONFIG_DEFAULTS,
  toError,
  type RestartPolicyName,
  type ServerConfig,
} from '@hostwarden/core';
import { LOG_LEVELS, type LogLevel } from '@hostwarden/observability';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GatewayConfig {
  bind: string;
  port: number;
  /** Required in the x-hostwarden-secret header of injected events when set. */
  sharedSecret?: string;
}

export interface RelayConfig {
  enabled: boolean;
  url?: string;
  token?: string;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
}

export interface HostwardenConfig {
  clientId: string;
  maxServers: number;
  tickIntervalMs: number;
  gateway: GatewayConfig;
  relay: RelayConfig;
  observability: {
    observers: string[];
    logLevel: LogLevel;
  };
  servers: ServerConfig[];
}

export class ConfigLoadError extends ConfigError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = 'ConfigLoadError';
  }
}

export const CONFIG_ENV_VAR = 'HOSTWARDEN_CONFIG';

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function getHostwardenDir(): string {
  return resolve(homedir(), '.hostwarden');
}

export function getConfigPath(): string {
  return join(getHostwardenDir(), 'config.json');
}

/** Explicit path, then $HOSTWARDEN_CONFIG, then the default location. */
export function resolveConfigPath(explicit?: string): string {
  const fromEnv = process.env[CONFIG_ENV_VAR];
  if (explicit) return resolve(explicit);
  if (fromEnv) return resolve(fromEnv);
  return getConfigPath();
}

export function ensureConfigDir(): void {
  mkdirSync(getHostwardenDir(), { recursive: true });
}

export function configExists(configPath?: string): boolean {
  return existsSync(resolveConfigPath(configPath));
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export function getDefaultConfig(): HostwardenConfig {
  return {
    clientId: 'client-1',
    maxServers: 25,
    tickIntervalMs: 1_000,
    gateway: {
      bind: '127.0.0.1',
      port: 8765,
    },
    relay: {
      enabled: false,
      reconnectBaseMs: 1_000,
      reconnectMaxMs: 30_000,
    },
    observability: {
      observers: ['console'],
      logLevel: 'info',
    },
    servers: [],
  };
}

// ---------------------------------------------------------------------------
// Load / save
// ---------------------------------------------------------------------------

export function loadConfig(configPath?: string): HostwardenConfig {
  const path = resolveConfigPath(configPath);

  let user: unknown = {};
  if (existsSync(path)) {
    let text: string;
    try {
      text = readFileSync(path, 'utf-8');
    } catch (err) {
      throw new ConfigLoadError(`Cannot read config file ${path}: ${toError(err).message}`, { path });
    }
    try {
      user = JSON.parse(text);
    } catch (err) {
      throw new ConfigLoadError(`Invalid JSON in ${path}: ${toError(err).message}`, { path });
    }
    if (!isRecord(user)) {
      throw new ConfigLoadError(`Config file ${path} must contain a JSON object`, { path });
    }
  }

  const merged = deepMerge(getDefaultConfig(), user);
  return validateConfig(resolveEnvVars(merged));
}

export function saveConfig(config: HostwardenConfig, configPath?: string): void {
  const path = resolveConfigPath(configPath);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

// ---------------------------------------------------------------------------
// Merge and env resolution
// ---------------------------------------------------------------------------

/** Objects merge key by key; anything else (arrays included) replaces. */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (override === undefined) return base;
  if (!isRecord(base) || !isRecord(override)) return override;

  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    result[key] = deepMerge(base[key], value);
  }
  return result;
}

const ENV_REF = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/** Replace `${VAR}` in every string; unset variables become ''. */
export function resolveEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_REF, (_match, name: string) => process.env[name] ?? '');
  }
  if (Array.isArray(value)) return value.map(resolveEnvVars);
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) out[key] = resolveEnvVars(inner);
    return out;
  }
  return value;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export function validateConfig(raw: unknown): HostwardenConfig {
  const root = expectRecord(raw, 'config');

  const clientId = expectString(root['clientId'], 'clientId');
  if (clientId.length === 0) fail('clientId', 'must not be empty');

  const gatewayRaw = expectRecord(root['gateway'], 'gateway');
  const gateway: GatewayConfig = {
    bind: expectString(gatewayRaw['bind'], 'gateway.bind'),
    port: expectInteger(gatewayRaw['port'], 'gateway.port', 1, 65_535),
  };
  const sharedSecret = optionalString(gatewayRaw['sharedSecret'], 'gateway.sharedSecret');
  if (sharedSecret !== undefined) gateway.sharedSecret = sharedSecret;

  const relayRaw = expectRecord(root['relay'], 'relay');
  const relay: RelayConfig = {
    enabled: expectBoolean(relayRaw['enabled'], 'relay.enabled'),
    reconnectBaseMs: expectInteger(relayRaw['reconnectBaseMs'], 'relay.reconnectBaseMs', 1),
    reconnectMaxMs: expectInteger(relayRaw['reconnectMaxMs'], 'relay.reconnectMaxMs', 1),
  };
  const relayUrl = optionalString(relayRaw['url'], 'relay.url');
  const relayToken = optionalString(relayRaw['token'], 'relay.token');
  if (relayUrl !== undefined) {
    if (!isUrl(relayUrl, ['ws:', 'wss:'])) fail('relay.url', 'must be a ws:// or wss:// URL');
    relay.url = relayUrl;
  }
  if (relayToken !== undefined) relay.token = relayToken;
  if (relay.enabled && (relayUrl === undefined || relayToken === undefined)) {
    fail('relay', 'url and token are required when relay.enabled is true');
  }
  if (relay.reconnectMaxMs < relay.reconnectBaseMs) {
    fail('relay.reconnectMaxMs', 'must be at least relay.reconnectBaseMs');
  }

  const observabilityRaw = expectRecord(root['observability'], 'observability');
  const logLevel = observabilityRaw['logLevel'];
  const level = LOG_LEVELS.find((l) => l === logLevel);
  if (level === undefined) {
    fail('observability.logLevel', `must be one of ${LOG_LEVELS.join(', ')}`);
  }

  const serversRaw = root['servers'];
  if (!Array.isArray(serversRaw)) fail('servers', 'must be an array');
  const seen = new Set<string>();
  const servers = serversRaw.map((entry, index) => validateServer(entry, index, seen));

  return {
    clientId,
    maxServers: expectInteger(root['maxServers'], 'maxServers', 1),
    tickIntervalMs: expectInteger(root['tickIntervalMs'], 'tickIntervalMs', 100),
    gateway,
    relay,
    observability: {
      observers: expectStringArray(observabilityRaw['observers'], 'observability.observers'),
      logLevel: level,
    },
    servers,
  };
}

function validateServer(raw: unknown, index: number, seen: Set<string>): ServerConfig {
  const at = `servers[${index}]`;
  const entry = expectRecord(raw, at);

  const id = expectString(entry['id'], `${at}.id`);
  if (id.length === 0) fail(`${at}.id`, 'must not be empty');
  if (seen.has(id)) fail(`${at}.id`, `duplicate server id "${id}"`);
  seen.add(id);

  const workdir = expectString(entry['workdir'], `${at}.workdir`);
  if (workdir.length === 0) fail(`${at}.workdir`, 'must not be empty');

  const startCmd = expectStringArray(entry['startCmd'], `${at}.startCmd`);
  if (startCmd.length === 0) fail(`${at}.startCmd`, 'must not be empty');

  const policyRaw = entry['restartPolicy'] ?? SERVER_CONFIG_DEFAULTS.restartPolicy;
  const restartPolicy: RestartPolicyName | undefined = RESTART_POLICIES.find((p) => p === policyRaw);
  if (restartPolicy === undefined) {
    fail(`${at}.restartPolicy`, `must be one of ${RESTART_POLICIES.join(', ')}`);
  }

  const keywords = expectStringArray(
    entry['logImportantKeywords'] ?? [...SERVER_CONFIG_DEFAULTS.logImportantKeywords],
    `${at}.logImportantKeywords`,
  );
  if (keywords.some((k) => k.length === 0)) {
    fail(`${at}.logImportantKeywords`, 'must not contain empty keywords');
  }

  const server: ServerConfig = {
    id,
    name: entry['name'] === undefined ? id : expectString(entry['name'], `${at}.name`),
    workdir,
    startCmd,
    env: expectStringRecord(entry['env'] ?? {}, `${at}.env`),
    restartPolicy,
    maxRestartPerMinute: expectInteger(
      entry['maxRestartPerMinute'] ?? SERVER_CONFIG_DEFAULTS.maxRestartPerMinute,
      `${at}.maxRestartPerMinute`,
      1,
    ),
    priority: expectInteger(entry['priority'] ?? SERVER_CONFIG_DEFAULTS.priority, `${at}.priority`),
    healthTimeoutMs: expectInteger(
      entry['healthTimeoutMs'] ?? SERVER_CONFIG_DEFAULTS.healthTimeoutMs,
      `${at}.healthTimeoutMs`,
      1,
    ),
    logImportantKeywords: keywords,
  };

  if (entry['stopCmd'] !== undefined && entry['stopCmd'] !== null) {
    server.stopCmd = expectStringArray(entry['stopCmd'], `${at}.stopCmd`);
  }
  if (entry['healthPort'] !== undefined && entry['healthPort'] !== null) {
    server.healthPort = expectInteger(entry['healthPort'], `${at}.healthPort`, 1, 65_535);
  }
  const healthUrl = optionalString(entry['healthHttpUrl'], `${at}.healthHttpUrl`);
  if (healthUrl !== undefined) {
    if (!isUrl(healthUrl, ['http:', 'https:'])) fail(`${at}.healthHttpUrl`, 'must be an http(s) URL');
    server.healthHttpUrl = healthUrl;
  }

  return server;
}

// ---------------------------------------------------------------------------
// Field helpers
// ---------------------------------------------------------------------------

function fail(field: string, problem: string): never {
  throw new ConfigLoadError(`Invalid config: ${field} ${problem}`, { field });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isUrl(value: string, protocols: readonly string[]): boolean {
  try {
    return protocols.includes(new URL(value).protocol);
  } catch {
    return false;
  }
}

function expectRecord(value: unknown, field: string): Record<string, unknown> {
  if (!isRecord(value)) fail(field, 'must be an object');
  return value;
}

function expectString(value: unknown, field: string): string {
  if (typeof value !== 'string') fail(field, 'must be a string');
  return value;
}

/** Absent, null and '' (an unset ${VAR}) all mean "not configured". */
function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  return expectString(value, field);
}

function expectBoolean(value: unknown, field: string): boolean {
  if (typeof value !== 'boolean') fail(field, 'must be true or false');
  return value;
}

function expectInteger(value: unknown, field: string, min?: number, max?: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) fail(field, 'must be an integer');
  if (min !== undefined && value < min) fail(field, `must be >= ${min}`);
  if (max !== undefined && value > max) fail(field, `must be <= ${max}`);
  return value;
}

function expectStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    fail(field, 'must be an array of strings');
  }
  return [...value];
}

function expectStringRecord(value: unknown, field: string): Record<string, string> {
  const record = expectRecord(value, field);
  const out: Record<string, string> = {};
  for (const [key, inner] of Object.entries(record)) {
    out[key] = expectString(inner, `${field}.${key}`);
  }
  return out;
}
