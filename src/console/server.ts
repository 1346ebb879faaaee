import { readFile } from "node:fs/promises";

import Fastify, { type FastifyInstance } from "fastify";
import { WebSocket, WebSocketServer, type RawData } from "ws";

import { createLogger } from "../logger.js";
import type { CommandSession, ConsoleEvent } from "./session.js";

const log = createLogger("console");

const DEFAULT_PAGE = new URL("../../public/index.html", import.meta.url);

export interface ConsoleServerDependencies {
  session: CommandSession;
  pagePath?: string | URL;
}

/**
 * Browser-facing hop: serves the console page and runs prompts received on
 * `/ws`, streaming each step back. Prompts on one socket run in order; closing
 * the socket aborts whatever is in flight.
 */
export function buildConsoleServer(deps: ConsoleServerDependencies): FastifyInstance {
  const app = Fastify({ logger: false });
  const pagePath = deps.pagePath ?? DEFAULT_PAGE;
  const wss = new WebSocketServer({ server: app.server, path: "/ws" });

  app.get("/", async (_request, reply) => {
    const html = await readFile(pagePath, "utf8");
    return reply.type("text/html; charset=utf-8").send(html);
  });

  wss.on("connection", (socket) => {
    const controller = new AbortController();
    let queue: Promise<void> = Promise.resolve();

    const send = (event: ConsoleEvent): void => {
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(JSON.stringify(event));
      }
    };

    socket.on("message", (data: RawData) => {
      const prompt = parsePrompt(data);
      if (prompt === undefined) {
        send({ error: "Invalid JSON message" });
        return;
      }
      queue = queue
        .then(() => deps.session.handle(prompt, send, controller.signal))
        .then(
          () => undefined,
          (error: unknown) => {
            log.error({ err: error }, "console prompt failed");
            send({ error: `Console error: ${error instanceof Error ? error.message : String(error)}` });
          }
        );
    });

    socket.on("close", () => {
      controller.abort();
    });

    socket.on("error", (error) => {
      log.warn({ err: error }, "console socket error");
      controller.abort();
    });
  });

  app.addHook("preClose", async () => {
    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      wss.close((error) => (error ? reject(error) : resolve()));
    });
  });

  return app;
}

function parsePrompt(data: RawData): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawToString(data));
  } catch {
    return undefined;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }
  const prompt = "prompt" in parsed ? parsed.prompt : undefined;
  return typeof prompt === "string" ? prompt : "";
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
}
