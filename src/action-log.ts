import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import lockfile from "proper-lockfile";

import { createLogger } from "./logger.js";

const log = createLogger("action-log");

export type ActionStatus = "success" | "error";

export interface Action {
  timestamp: string;
  action_type: string;
  command: string;
  status: ActionStatus;
  reasoning?: string;
  prompt?: string;
  output?: string;
  error?: string;
  context?: Record<string, unknown>;
  [extra: string]: unknown;
}

/** What callers hand to `append`; empty optional fields are dropped. */
export interface ActionInput {
  action_type: string;
  command: string;
  status?: ActionStatus;
  reasoning?: string | undefined;
  prompt?: string | undefined;
  output?: string | undefined;
  error?: string | undefined;
  context?: Record<string, unknown> | undefined;
  [extra: string]: unknown;
}

export interface ActionLogOptions {
  path: string;
  /** How long to keep retrying a lock held by another process. */
  lockWaitMs?: number;
}

const KNOWN_FIELDS = new Set([
  "timestamp",
  "action_type",
  "command",
  "status",
  "reasoning",
  "prompt",
  "output",
  "error",
  "context"
]);

/**
 * Append-only audit trail shared by every hop, possibly across processes.
 * Each append takes the file lock, re-reads the document, adds its entry and
 * replaces the file (per-process temp file + rename) before resolving. The
 * in-memory copy only changes after a write lands.
 */
export class ActionLog {
  private actions: Action[] = [];
  private loaded = false;
  private loading: Promise<void> | undefined;
  private lastTimestampMs = 0;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly options: ActionLogOptions) {}

  get path(): string {
    return this.options.path;
  }

  /** Entry count as of the last read or write by this instance. */
  get size(): number {
    return this.actions.length;
  }

  async load(): Promise<void> {
    if (this.loaded) {
      return;
    }
    this.loading ??= readActions(this.options.path).then((actions) => {
      this.actions = actions;
      this.loaded = true;
    });
    await this.loading;
  }

  async append(input: ActionInput): Promise<Action> {
    const action = await this.commit((current) => {
      const next = this.buildAction(input, current.at(-1));
      return { actions: [...current, next], result: next };
    });
    return { ...action };
  }

  /** Latest entries on disk, most recent last. */
  async recent(limit = 10): Promise<Action[]> {
    await this.writeChain;
    this.actions = await readActions(this.options.path);
    this.loaded = true;
    if (limit <= 0) {
      return [];
    }
    return this.actions.slice(-limit).map((action) => ({ ...action }));
  }

  async clear(): Promise<void> {
    await this.commit(() => ({ actions: [], result: undefined }));
  }

  private buildAction(input: ActionInput, previous: Action | undefined): Action {
    const action: Action = {
      timestamp: this.nextTimestamp(previous),
      action_type: input.action_type,
      command: input.command,
      status: input.status ?? "success"
    };
    if (input.reasoning) action.reasoning = input.reasoning;
    if (input.prompt) action.prompt = input.prompt;
    if (input.output) action.output = input.output;
    if (input.error) action.error = input.error;
    if (input.context && Object.keys(input.context).length > 0) {
      action.context = { ...input.context };
    }
    for (const [key, value] of Object.entries(input)) {
      if (KNOWN_FIELDS.has(key) || value === undefined) {
        continue;
      }
      action[key] = value;
    }
    return action;
  }

  /** Wall clock, clamped so timestamps never go backwards in the file. */
  private nextTimestamp(previous: Action | undefined): string {
    const previousMs = previous ? Date.parse(previous.timestamp) : Number.NaN;
    const floor = Number.isNaN(previousMs) ? this.lastTimestampMs : Math.max(previousMs, this.lastTimestampMs);
    const now = Math.max(Date.now(), floor);
    this.lastTimestampMs = now;
    return new Date(now).toISOString();
  }

  private commit<T>(update: (current: Action[]) => { actions: Action[]; result: T }): Promise<T> {
    const path = this.options.path;
    const write = this.writeChain.then(async () => {
      await mkdir(dirname(path), { recursive: true });
      const release = await lockfile.lock(path, {
        realpath: false,
        stale: 10_000,
        retries: { retries: Math.ceil((this.options.lockWaitMs ?? 5_000) / 50), minTimeout: 20, maxTimeout: 50 }
      });
      try {
        const { actions, result } = update(await readActions(path));
        const tmpPath = `${path}.${process.pid}.tmp`;
        await writeFile(tmpPath, JSON.stringify(actions, null, 2), "utf8");
        await rename(tmpPath, path);
        this.actions = actions;
        this.loaded = true;
        return result;
      } finally {
        await release();
      }
    });
    this.writeChain = write.then(
      () => undefined,
      (error: unknown) => {
        log.error({ err: error, path }, "action log flush failed");
      }
    );
    return write;
  }
}

async function readActions(path: string): Promise<Action[]> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    const code = (error as NodeJS.ErrnoException)?.code;
    if (code !== "ENOENT") {
      log.warn({ err: error, path }, "action log unreadable; starting empty");
    }
    return [];
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    log.warn({ path }, "action log is not valid JSON; starting empty");
    return [];
  }
  if (!Array.isArray(parsed)) {
    log.warn({ path }, "action log is not a list; starting empty");
    return [];
  }
  return parsed.filter(isAction);
}

function isAction(value: unknown): value is Action {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return (
    "action_type" in value &&
    typeof value.action_type === "string" &&
    "timestamp" in value &&
    typeof value.timestamp === "string"
  );
}
