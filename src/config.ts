import * as fs from "node:fs";
import * as path from "node:path";
import type { Logger, ProxyRuleEntry } from "./types.js";
import { errorMessage, isErrnoException } from "./utils.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Config file looked up in the working directory. */
export const CONFIG_FILE_NAME = "devroute.json";

export const DEFAULT_HOST = "localhost";

export const DEFAULT_PORT = 8080;

const MAX_PORT = 65535;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Fully resolved dev server configuration. */
export interface DevConfig {
  host: string;
  port: number;
  /** Extra headers added to every response. */
  headers: Record<string, string>;
  /** Proxy entries in file order. */
  proxy: ProxyRuleEntry[];
}

/** Values that take priority over the environment and the config file. */
export interface ConfigOverrides {
  configPath?: string;
  host?: string;
  port?: number;
  headers?: Record<string, string>;
}

export interface LoadConfigOptions {
  logger: Logger;
  overrides?: ConfigOverrides;
  /** Directory the default config file and relative paths resolve against. */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Thrown for config files that cannot be used at all: unreadable, not JSON,
 * or with fields of the wrong type.
 */
export class ConfigError extends Error {
  readonly path: string;

  constructor(filePath: string, message: string) {
    super(`${filePath}: ${message}`);
    this.name = "ConfigError";
    this.path = filePath;
  }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isValidPort(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= MAX_PORT;
}

function typeName(value: unknown): string {
  if (value === null) return "null";
  return Array.isArray(value) ? "array" : typeof value;
}

/**
 * Turn the `proxy` map into rule entries, in key order. Entries that cannot
 * become a rule are skipped with a warning rather than failing the load:
 * keys must end with `/` and `target` must be a string.
 */
export function parseProxyEntries(proxy: Record<string, unknown>, logger: Logger): ProxyRuleEntry[] {
  const entries: ProxyRuleEntry[] = [];
  for (const [key, value] of Object.entries(proxy)) {
    if (!isRecord(value)) continue;

    if (!key.endsWith("/")) {
      logger.warn(`Proxy key '${key}' does not end with '/'. Ignoring this proxy rule.`);
      continue;
    }
    if (typeof value.target !== "string" || value.target === "") {
      logger.warn(`Proxy rule '${key}' has no target. Ignoring this proxy rule.`);
      continue;
    }

    const entry: ProxyRuleEntry = { key, target: value.target };
    const { rewrite } = value;
    if (typeof rewrite === "boolean" || typeof rewrite === "string") {
      entry.rewrite = rewrite;
    } else if (rewrite !== undefined) {
      logger.warn(
        `Proxy rule '${key}' has a rewrite of type ${typeName(rewrite)}; ` +
          `expected a boolean or 'regex -> replacement'. Ignoring rewrite.`
      );
    }
    entries.push(entry);
  }
  return entries;
}

/**
 * Validate the parsed contents of a config file. The root must be an object
 * with a `server` object; every field of `server` is optional.
 */
export function parseDevConfig(raw: unknown, filePath: string, logger: Logger): Partial<DevConfig> {
  if (!isRecord(raw)) {
    throw new ConfigError(filePath, `the root must be an object, found ${typeName(raw)}`);
  }
  const { server } = raw;
  if (!isRecord(server)) {
    throw new ConfigError(filePath, `the "server" key is missing or is not an object`);
  }

  const config: Partial<DevConfig> = {};

  if (server.host !== undefined) {
    if (typeof server.host !== "string") {
      throw new ConfigError(filePath, `host must be a string, found ${typeName(server.host)}`);
    }
    config.host = server.host;
  }

  if (server.port !== undefined) {
    if (!isValidPort(server.port)) {
      throw new ConfigError(filePath, `port must be an integer between 0 and ${MAX_PORT}`);
    }
    config.port = server.port;
  }

  if (server.headers !== undefined) {
    if (!isRecord(server.headers)) {
      throw new ConfigError(filePath, `headers must be an object, found ${typeName(server.headers)}`);
    }
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(server.headers)) {
      if (typeof value !== "string") {
        throw new ConfigError(filePath, `header "${name}" must be a string`);
      }
      headers[name] = value;
    }
    config.headers = headers;
  }

  if (server.proxy !== undefined) {
    if (!isRecord(server.proxy)) {
      throw new ConfigError(filePath, `proxy must be an object, found ${typeName(server.proxy)}`);
    }
    config.proxy = parseProxyEntries(server.proxy, logger);
  }

  return config;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/** Read DEVROUTE_PORT; unset or invalid values yield undefined. */
function portFromEnv(env: NodeJS.ProcessEnv): number | undefined {
  const raw = env.DEVROUTE_PORT;
  if (!raw) return undefined;
  const port = Number(raw);
  return isValidPort(port) ? port : undefined;
}

function readConfigFile(
  filePath: string,
  explicit: boolean,
  logger: Logger
): Partial<DevConfig> {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === "ENOENT" && !explicit) {
      logger.info(`No ${CONFIG_FILE_NAME} found. Running with the default configuration.`);
      return {};
    }
    throw new ConfigError(filePath, `cannot read config file: ${errorMessage(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    throw new ConfigError(filePath, `invalid JSON: ${errorMessage(err)}`);
  }
  return parseDevConfig(raw, filePath, logger);
}

/**
 * Resolve the dev server config.
 *
 * Priority: overrides (CLI flags) > environment variables > config file >
 * defaults. Headers from overrides are merged over the file's headers.
 *
 * Environment variables:
 * - `DEVROUTE_CONFIG` for the config file path (default: ./devroute.json)
 * - `DEVROUTE_HOST` for the bind host (default: "localhost")
 * - `DEVROUTE_PORT` for the port (default: 8080)
 */
export function loadDevConfig(options: LoadConfigOptions): DevConfig {
  const { logger, overrides = {}, cwd = process.cwd(), env = process.env } = options;

  const explicitPath = overrides.configPath || env.DEVROUTE_CONFIG;
  const filePath = path.resolve(cwd, explicitPath || CONFIG_FILE_NAME);
  const file = readConfigFile(filePath, !!explicitPath, logger);

  return {
    host: overrides.host || env.DEVROUTE_HOST || file.host || DEFAULT_HOST,
    port: overrides.port ?? portFromEnv(env) ?? file.port ?? DEFAULT_PORT,
    headers: { ...file.headers, ...overrides.headers },
    proxy: file.proxy ?? [],
  };
}

/** Multi-line summary printed at startup. */
export function describeConfig(config: DevConfig): string {
  const headers = Object.entries(config.headers);
  const lines = [
    `host: ${config.host}`,
    `port: ${config.port}`,
    `headers: ${headers.length > 0 ? headers.map(([name, value]) => `${name}=${value}`).join(", ") : "none"}`,
    `proxy: ${config.proxy.length > 0 ? "" : "none"}`.trimEnd(),
  ];
  for (const entry of config.proxy) {
    const rewrite = entry.rewrite === undefined ? "" : ` (rewrite: ${String(entry.rewrite)})`;
    lines.push(`  ${entry.key} -> ${entry.target}${rewrite}`);
  }
  return lines.join("\n");
}
