import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { DEFAULT_DENYLIST } from "./security/destructive-denylist.js";

export interface ListenConfig {
  host: string;
  port: number;
}

export interface SandboxConfig extends ListenConfig {
  timeoutMs: number;
  maxBufferBytes: number;
  bodyLimitBytes: number;
}

export interface RelayHopConfig extends ListenConfig {
  sandboxUrl: string;
  timeoutMs: number;
  bodyLimitBytes: number;
}

export interface RelayClientConfig {
  serverUrl: string;
  timeoutMs: number;
  maxRetries: number;
  cooldownMs: number;
  backoffMs: number;
  denylist: string[];
}

export interface GeneratorConfig {
  provider: "ollama";
  baseURL: string;
  model: string;
  timeoutMs: number;
}

export interface ConsoleConfig extends ListenConfig {
  maxPromptChars: number;
}

export interface ActionLogConfig {
  path: string;
}

export interface ShellRelayConfig {
  sandbox: SandboxConfig;
  relay: RelayHopConfig;
  client: RelayClientConfig;
  generator: GeneratorConfig;
  console: ConsoleConfig;
  actionLog: ActionLogConfig;
}

/** Per-section partial settings, as read from a file, the environment or a caller. */
export type ConfigOverrides = {
  [Section in keyof ShellRelayConfig]?: Partial<ShellRelayConfig[Section]>;
};

export const DEFAULT_CONFIG: ShellRelayConfig = {
  sandbox: {
    host: "127.0.0.1",
    port: 8000,
    timeoutMs: 10_000,
    maxBufferBytes: 1024 * 1024,
    bodyLimitBytes: 64 * 1024
  },
  relay: {
    host: "127.0.0.1",
    port: 8002,
    sandboxUrl: "http://localhost:8000",
    timeoutMs: 30_000,
    bodyLimitBytes: 64 * 1024
  },
  client: {
    serverUrl: "http://localhost:8002",
    timeoutMs: 30_000,
    maxRetries: 3,
    cooldownMs: 100,
    backoffMs: 1_000,
    denylist: [...DEFAULT_DENYLIST]
  },
  generator: {
    provider: "ollama",
    baseURL: "http://localhost:11434",
    model: "qwen3:0.6b",
    timeoutMs: 30_000
  },
  console: {
    host: "127.0.0.1",
    port: 8003,
    maxPromptChars: 4_000
  },
  actionLog: {
    path: "llm_actions.json"
  }
};

function applyOverrides(base: ShellRelayConfig, layer: ConfigOverrides): ShellRelayConfig {
  return {
    sandbox: { ...base.sandbox, ...layer.sandbox },
    relay: { ...base.relay, ...layer.relay },
    client: {
      ...base.client,
      ...layer.client,
      denylist: [...(layer.client?.denylist ?? base.client.denylist)]
    },
    generator: { ...base.generator, ...layer.generator },
    console: { ...base.console, ...layer.console },
    actionLog: { ...base.actionLog, ...layer.actionLog }
  };
}

function requirePositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number (got ${value})`);
  }
}

function requireNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must not be negative (got ${value})`);
  }
}

/** Applies override layers in order over the defaults and validates the result. */
export function loadConfig(...layers: Array<ConfigOverrides | undefined>): ShellRelayConfig {
  const config = layers.reduce<ShellRelayConfig>(
    (current, layer) => (layer ? applyOverrides(current, layer) : current),
    applyOverrides(DEFAULT_CONFIG, {})
  );
  requirePositive("sandbox.timeoutMs", config.sandbox.timeoutMs);
  requirePositive("sandbox.maxBufferBytes", config.sandbox.maxBufferBytes);
  requirePositive("relay.timeoutMs", config.relay.timeoutMs);
  requirePositive("client.timeoutMs", config.client.timeoutMs);
  requirePositive("generator.timeoutMs", config.generator.timeoutMs);
  requireNonNegative("client.cooldownMs", config.client.cooldownMs);
  requireNonNegative("client.backoffMs", config.client.backoffMs);
  if (!Number.isInteger(config.client.maxRetries) || config.client.maxRetries < 1) {
    throw new Error(`client.maxRetries must be an integer >= 1 (got ${config.client.maxRetries})`);
  }
  if (config.client.denylist.some((pattern) => typeof pattern !== "string" || pattern.trim() === "")) {
    throw new Error("client.denylist entries must be non-empty strings");
  }
  return config;
}

export interface LoadConfigFromDiskOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export function resolveConfigPath(options: LoadConfigFromDiskOptions = {}): string {
  if (options.configPath) {
    return options.configPath;
  }
  const env = options.env ?? process.env;
  if (env.SHELL_RELAY_CONFIG_PATH) {
    return env.SHELL_RELAY_CONFIG_PATH;
  }
  return join(options.cwd ?? process.cwd(), "shell-relay.json");
}

/** Environment variables win over the file for the endpoints a deployment usually rewires. */
function envOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
  const out: ConfigOverrides = {};
  if (env.SHELL_RELAY_SANDBOX_URL) {
    out.relay = { sandboxUrl: env.SHELL_RELAY_SANDBOX_URL };
  }
  if (env.SHELL_RELAY_RELAY_URL) {
    out.client = { serverUrl: env.SHELL_RELAY_RELAY_URL };
  }
  if (env.SHELL_RELAY_OLLAMA_URL) {
    out.generator = { baseURL: env.SHELL_RELAY_OLLAMA_URL };
  }
  if (env.SHELL_RELAY_ACTION_LOG) {
    out.actionLog = { path: env.SHELL_RELAY_ACTION_LOG };
  }
  return out;
}

export function loadConfigFromDisk(options: LoadConfigFromDiskOptions = {}): ShellRelayConfig {
  const env = options.env ?? process.env;
  const configPath = resolveConfigPath(options);
  let fromFile: ConfigOverrides | undefined;
  if (existsSync(configPath)) {
    const parsed: unknown = JSON.parse(readFileSync(configPath, "utf8"));
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new Error(`${configPath} must contain a JSON object`);
    }
    fromFile = parsed as ConfigOverrides;
  }
  return loadConfig(fromFile, envOverrides(env));
}
