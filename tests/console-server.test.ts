import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { FastifyInstance } from "fastify";
import { afterEach, describe, expect, it } from "vitest";
import { WebSocket } from "ws";

import { buildConsoleServer } from "../src/console/server.js";
import { CommandSession } from "../src/console/session.js";
import type { ExecutionResult } from "../src/relay/errors.js";

const cleanupPaths: string[] = [];
const apps: FastifyInstance[] = [];

afterEach(async () => {
  while (apps.length > 0) {
    await apps.pop()?.close();
  }
  while (cleanupPaths.length > 0) {
    const path = cleanupPaths.pop();
    if (path) {
      await rm(path, { recursive: true, force: true });
    }
  }
});

function createConsole(pagePath?: string): FastifyInstance {
  const session = new CommandSession({
    generator: {
      async generate() {
        return { command: "uptime", explanation: "Shows uptime" };
      }
    },
    relay: {
      async execute(): Promise<ExecutionResult> {
        return { output: "up 3 days\n", context: {} };
      }
    }
  });
  const app = buildConsoleServer({ session, ...(pagePath !== undefined ? { pagePath } : {}) });
  apps.push(app);
  return app;
}

async function connect(app: FastifyInstance): Promise<WebSocket> {
  await app.listen({ host: "127.0.0.1", port: 0 });
  const address = app.server.address();
  if (address === null || typeof address === "string") {
    throw new Error("expected a TCP address");
  }
  const socket = new WebSocket(`ws://127.0.0.1:${address.port}/ws`);
  await new Promise<void>((resolve, reject) => {
    socket.once("open", () => resolve());
    socket.once("error", reject);
  });
  return socket;
}

function collect(socket: WebSocket, count: number): Promise<unknown[]> {
  return new Promise((resolve) => {
    const messages: unknown[] = [];
    socket.on("message", (data) => {
      messages.push(JSON.parse(data.toString()));
      if (messages.length === count) {
        resolve(messages);
      }
    });
  });
}

describe("console hop", () => {
  it("serves the console page", async () => {
    const dir = await mkdtemp(join(tmpdir(), "console-page-"));
    cleanupPaths.push(dir);
    const pagePath = join(dir, "index.html");
    await writeFile(pagePath, "<!doctype html><title>test console</title>", "utf8");
    const app = createConsole(pagePath);

    const res = await app.inject({ method: "GET", url: "/" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe("text/html; charset=utf-8");
    expect(res.body).toBe("<!doctype html><title>test console</title>");
  });

  it("streams progress for a prompt over the socket", async () => {
    const socket = await connect(createConsole());
    const received = collect(socket, 4);

    socket.send(JSON.stringify({ prompt: "how long has this box been up" }));

    expect(await received).toEqual([
      { status: "Generating command...", prompt: "how long has this box been up" },
      { status: "Command generated", command: "uptime", explanation: "Shows uptime" },
      { status: "Executing command...", command: "uptime" },
      { status: "Command executed", result: { output: "up 3 days\n", context: {} } }
    ]);
    socket.close();
  });

  it("answers malformed messages with an error event", async () => {
    const socket = await connect(createConsole());
    const received = collect(socket, 2);

    socket.send("not json");
    socket.send(JSON.stringify({ text: "no prompt field" }));

    expect(await received).toEqual([{ error: "Invalid JSON message" }, { error: "No prompt provided" }]);
    socket.close();
  });
});
