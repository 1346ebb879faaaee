#!/usr/bin/env node
/**
 * shell-relay entry point.
 * Usage: shell-relay <sandbox|relay|console> [--config=<path>]
 *        shell-relay exec [--config=<path>] [--purpose=<text>] <command...>
 */

import { resolve } from "node:path";

import type { FastifyInstance } from "fastify";

import { ActionLog } from "./action-log.js";
import { loadConfigFromDisk, type ListenConfig, type ShellRelayConfig } from "./config.js";
import { buildConsoleServer } from "./console/server.js";
import { CommandSession } from "./console/session.js";
import { HostExecSandbox } from "./exec/host-sandbox.js";
import { OllamaCommandGenerator } from "./generator/ollama.js";
import { logger } from "./logger.js";
import { RelayClient } from "./relay/client.js";
import { isExecutionFailure } from "./relay/errors.js";
import { buildRelayServer } from "./relay/server.js";
import { buildSandboxServer } from "./sandbox/server.js";

const ROLES = ["sandbox", "relay", "console", "exec"] as const;
type Role = (typeof ROLES)[number];

interface CliArgs {
  role: Role | null;
  configPath: string | null;
  purpose: string | null;
  rest: string[];
}

function parseArgv(argv: string[]): CliArgs {
  let configPath: string | null = null;
  let purpose: string | null = null;
  const positional: string[] = [];
  for (const arg of argv) {
    if (arg.startsWith("--config=")) {
      configPath = arg.slice("--config=".length).trim() || null;
    } else if (arg.startsWith("--purpose=")) {
      purpose = arg.slice("--purpose=".length).trim() || null;
    } else {
      positional.push(arg);
    }
  }
  const [first, ...rest] = positional;
  const role = ROLES.find((candidate) => candidate === first) ?? null;
  return { role, configPath, purpose, rest };
}

async function openActionLog(config: ShellRelayConfig): Promise<ActionLog> {
  const actionLog = new ActionLog({ path: resolve(process.cwd(), config.actionLog.path) });
  await actionLog.load();
  return actionLog;
}

function createRelayClient(config: ShellRelayConfig, actionLog: ActionLog): RelayClient {
  return new RelayClient({
    serverUrl: config.client.serverUrl,
    actionLog,
    timeoutMs: config.client.timeoutMs,
    maxRetries: config.client.maxRetries,
    cooldownMs: config.client.cooldownMs,
    backoffMs: config.client.backoffMs,
    denylist: config.client.denylist
  });
}

async function buildServer(role: Exclude<Role, "exec">, config: ShellRelayConfig): Promise<{
  app: FastifyInstance;
  listen: ListenConfig;
}> {
  const actionLog = await openActionLog(config);
  if (role === "sandbox") {
    return {
      app: buildSandboxServer({ config: config.sandbox, sandbox: new HostExecSandbox(), actionLog }),
      listen: config.sandbox
    };
  }
  if (role === "relay") {
    return { app: buildRelayServer({ config: config.relay, actionLog }), listen: config.relay };
  }
  const session = new CommandSession({
    generator: new OllamaCommandGenerator(config.generator),
    relay: createRelayClient(config, actionLog),
    maxPromptChars: config.console.maxPromptChars
  });
  return { app: buildConsoleServer({ session }), listen: config.console };
}

async function runExec(config: ShellRelayConfig, command: string, purpose: string | null): Promise<number> {
  const actionLog = await openActionLog(config);
  const client = createRelayClient(config, actionLog);
  const result = await client.execute(command, purpose ?? undefined);
  if (isExecutionFailure(result)) {
    console.error(`Error Type: ${result.error_type}`);
    console.error(`Error: ${result.error}`);
    console.error(JSON.stringify(result.details, null, 2));
    return 1;
  }
  console.log(result.output);
  return 0;
}

async function main(): Promise<number> {
  const args = parseArgv(process.argv.slice(2));
  if (!args.role) {
    console.error("Usage: shell-relay <sandbox|relay|console> [--config=<path>]");
    console.error("       shell-relay exec [--config=<path>] [--purpose=<text>] <command...>");
    return 2;
  }
  const cwd = process.cwd();
  const config = loadConfigFromDisk(args.configPath ? { configPath: resolve(cwd, args.configPath) } : { cwd });

  if (args.role === "exec") {
    return runExec(config, args.rest.join(" "), args.purpose);
  }

  const { app, listen } = await buildServer(args.role, config);
  const port = Number.parseInt(process.env.PORT ?? String(listen.port), 10);
  await app.listen({ host: listen.host, port });
  logger.info({ role: args.role, host: listen.host, port }, "listening");

  await new Promise<void>((resolveShutdown) => {
    let shuttingDown = false;
    const shutdown = (): void => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      app
        .close()
        .catch((error: unknown) => {
          logger.error({ err: error }, "error during shutdown");
        })
        .finally(resolveShutdown);
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.fatal({ err: error }, "shell-relay failed");
    process.exit(1);
  });
