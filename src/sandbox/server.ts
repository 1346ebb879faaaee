import Fastify, { type FastifyError, type FastifyInstance } from "fastify";

import type { ActionInput, ActionLog } from "../action-log.js";
import type { SandboxConfig } from "../config.js";
import type { ExecSandbox } from "../exec/types.js";
import { abortOnDisconnect } from "../http-error.js";
import { createLogger } from "../logger.js";

const log = createLogger("sandbox");

export interface SandboxServerDependencies {
  config: Pick<SandboxConfig, "timeoutMs" | "maxBufferBytes" | "bodyLimitBytes">;
  sandbox: ExecSandbox;
  actionLog?: ActionLog;
  cwd?: string;
}

interface RunBody {
  command: string;
}

const runBodySchema = {
  type: "object",
  required: ["command"],
  properties: {
    command: { type: "string" }
  }
} as const;

export function buildSandboxServer(deps: SandboxServerDependencies): FastifyInstance {
  const app = Fastify({
    logger: false,
    bodyLimit: deps.config.bodyLimitBytes
  });

  const record = async (input: ActionInput): Promise<void> => {
    if (deps.actionLog) {
      await deps.actionLog.append(input);
    }
  };

  app.setErrorHandler<FastifyError>(async (error, _request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      log.error({ err: error }, "sandbox request failed");
    }
    return reply.code(statusCode).send({ detail: statusCode >= 500 ? "Internal server error" : error.message });
  });

  app.get("/", async () => {
    return { status: "sandbox ready" };
  });

  app.post<{ Body: RunBody }>("/run", { schema: { body: runBodySchema } }, async (request, reply) => {
    const { command } = request.body;
    const caller = abortOnDisconnect(reply.raw);
    await record({ action_type: "sandbox_run_start", command, reasoning: "Command received by sandbox" });
    try {
      const result = await deps.sandbox.run(command, {
        timeoutMs: deps.config.timeoutMs,
        maxBufferBytes: deps.config.maxBufferBytes,
        signal: caller.signal,
        ...(deps.cwd !== undefined ? { cwd: deps.cwd } : {})
      });
      if (caller.signal.aborted) {
        log.warn({ command }, "caller disconnected; command killed");
        await record({ action_type: "sandbox_run_error", command, status: "error", error: "client disconnected" });
        return reply.code(499).send({ detail: "client disconnected" });
      }
      if (result.timedOut) {
        await record({ action_type: "sandbox_run_error", command, status: "error", error: "command timeout" });
        return reply.code(408).send({ detail: "command timeout" });
      }
      if (result.code !== 0) {
        await record({
          action_type: "sandbox_run_error",
          command,
          status: "error",
          error: `exit code ${result.code ?? "null"}`,
          output: result.output
        });
        return reply.code(400).send({ detail: result.output });
      }
      await record({
        action_type: "sandbox_run_success",
        command,
        output: result.output,
        ...(result.truncated ? { truncated: true } : {})
      });
      return { output: result.output };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ err: error, command }, "sandbox run failed");
      await record({ action_type: "sandbox_run_error", command, status: "error", error: message });
      return reply.code(500).send({ detail: message });
    }
  });

  return app;
}
