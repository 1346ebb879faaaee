import Fastify, { type FastifyError, type FastifyInstance } from "fastify";

import type { ActionLog } from "../action-log.js";
import type { RelayHopConfig } from "../config.js";
import { HttpError, abortOnDisconnect, mapHttpError } from "../http-error.js";
import { createLogger } from "../logger.js";

const log = createLogger("relay");

export interface RelayServerDependencies {
  config: Pick<RelayHopConfig, "sandboxUrl" | "timeoutMs" | "bodyLimitBytes">;
  actionLog: ActionLog;
}

interface ExecuteBody {
  command: string;
  context?: Record<string, unknown> | null;
}

interface ActionsQuery {
  limit?: number;
}

const executeBodySchema = {
  type: "object",
  required: ["command"],
  properties: {
    command: { type: "string", minLength: 1 },
    context: { type: ["object", "null"] }
  }
} as const;

const actionsQuerySchema = {
  type: "object",
  properties: {
    limit: { type: "integer", minimum: 1, maximum: 1_000 }
  }
} as const;

/**
 * Middle hop: accepts commands from relay clients, forwards them to the
 * sandbox executor and echoes the caller's context back with the result.
 */
export function buildRelayServer(deps: RelayServerDependencies): FastifyInstance {
  const app = Fastify({
    logger: false,
    bodyLimit: deps.config.bodyLimitBytes
  });
  const runUrl = `${deps.config.sandboxUrl.replace(/\/$/, "")}/run`;

  app.setErrorHandler<FastifyError>(async (error, _request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      log.error({ err: error }, "relay request failed");
      return reply.code(500).send({ detail: "Internal server error" });
    }
    return reply.code(statusCode).send({ detail: error.message });
  });

  app.get("/", async () => {
    return { status: "relay ready" };
  });

  app.get("/health", async () => {
    return {
      ok: true,
      time: new Date().toISOString()
    };
  });

  app.get<{ Querystring: ActionsQuery }>(
    "/actions",
    { schema: { querystring: actionsQuerySchema } },
    async (request) => {
      const actions = await deps.actionLog.recent(request.query.limit ?? 10);
      return { actions };
    }
  );

  app.delete("/actions", async () => {
    await deps.actionLog.clear();
    log.warn("action log cleared");
    return { cleared: true };
  });

  app.post<{ Body: ExecuteBody }>("/execute", { schema: { body: executeBodySchema } }, async (request, reply) => {
    const { command } = request.body;
    const context = request.body.context ?? undefined;
    const caller = abortOnDisconnect(reply.raw);
    await deps.actionLog.append({
      action_type: "relay_execution_start",
      command,
      reasoning: "Command received from relay client",
      context: context ?? {}
    });

    try {
      const sandboxResult = await forwardToSandbox(runUrl, command, deps.config.timeoutMs, caller.signal);
      const result: Record<string, unknown> = { ...sandboxResult };
      if (context && Object.keys(context).length > 0) {
        result.context = context;
      }
      await deps.actionLog.append({
        action_type: "relay_execution_success",
        command,
        status: "success",
        output: typeof result.output === "string" ? result.output : "",
        context: context ?? {}
      });
      return result;
    } catch (error: unknown) {
      const mapped = mapHttpError(error);
      if (!(error instanceof HttpError)) {
        log.error({ err: error, command }, "relay forward failed");
      }
      await deps.actionLog.append({
        action_type: "relay_execution_error",
        command,
        status: "error",
        error: mapped.detail,
        status_code: mapped.statusCode,
        context: context ?? {}
      });
      return reply.code(mapped.statusCode).send({ detail: mapped.detail });
    }
  });

  return app;
}

async function forwardToSandbox(
  runUrl: string,
  command: string,
  timeoutMs: number,
  signal: AbortSignal
): Promise<Record<string, unknown>> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = (): void => controller.abort();
  signal.addEventListener("abort", onAbort, { once: true });

  let status: number;
  let text: string;
  try {
    const res = await fetch(runUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ command }),
      signal: controller.signal
    });
    status = res.status;
    text = await res.text();
  } catch (error: unknown) {
    if (timedOut) {
      throw new HttpError(504, `Sandbox did not respond within ${timeoutMs}ms`);
    }
    if (signal.aborted) {
      throw new HttpError(499, "client disconnected");
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new HttpError(503, `Failed to communicate with sandbox: ${message}`);
  } finally {
    clearTimeout(timer);
    signal.removeEventListener("abort", onAbort);
  }

  if (status !== 200) {
    throw new HttpError(status, `Sandbox error: ${readSandboxDetail(text)}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new HttpError(502, "Sandbox returned a non-JSON response");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new HttpError(502, "Sandbox returned an unexpected response shape");
  }
  return { ...parsed };
}

function readSandboxDetail(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === "object" && parsed !== null && "detail" in parsed && typeof parsed.detail === "string") {
      return parsed.detail;
    }
  } catch {
    // plain-text error body
  }
  return text;
}
