import { spawn } from "node:child_process";

import { createLogger } from "../logger.js";
import type { ExecSandbox, ExecSandboxOptions, ExecSandboxResult } from "./types.js";

export interface HostExecSandboxOptions {
  shell?: string;
  env?: NodeJS.ProcessEnv;
}

const log = createLogger("host-sandbox");

/**
 * Runs commands through `bash -c` on the host, each in its own process group
 * so a timeout or abort kills everything the command forked. No OS-level isolation; deploy
 * the sandbox process in its own container.
 */
export class HostExecSandbox implements ExecSandbox {
  private readonly shell: string;

  constructor(private readonly options: HostExecSandboxOptions = {}) {
    this.shell = options.shell ?? "/bin/bash";
  }

  run(command: string, options: ExecSandboxOptions): Promise<ExecSandboxResult> {
    const { timeoutMs, maxBufferBytes, cwd, signal } = options;
    return new Promise<ExecSandboxResult>((resolve, reject) => {
      const child = spawn(this.shell, ["-c", command], {
        cwd,
        env: this.options.env ?? process.env,
        stdio: ["ignore", "pipe", "pipe"],
        detached: true,
        windowsHide: true
      });
      const chunks: Buffer[] = [];
      let size = 0;
      let truncated = false;
      let timedOut = false;

      const collect = (chunk: Buffer): void => {
        if (size >= maxBufferBytes) {
          truncated = true;
          return;
        }
        const room = maxBufferBytes - size;
        const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
        if (kept.length < chunk.length) {
          truncated = true;
        }
        chunks.push(kept);
        size += kept.length;
      };
      child.stdout.on("data", collect);
      child.stderr.on("data", collect);

      const killGroup = (): void => {
        if (child.pid === undefined) {
          return;
        }
        try {
          process.kill(-child.pid, "SIGKILL");
        } catch (error: unknown) {
          // ESRCH: the group already exited
          if ((error as NodeJS.ErrnoException).code !== "ESRCH") {
            log.warn({ err: error, pid: child.pid }, "could not kill command process group");
          }
        }
      };

      const timer = setTimeout(() => {
        timedOut = true;
        killGroup();
      }, timeoutMs);
      const onAbort = (): void => {
        killGroup();
      };
      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener("abort", onAbort, { once: true });
      }

      // Background jobs left behind by the shell would hold the pipes open.
      child.once("exit", () => {
        clearTimeout(timer);
        killGroup();
      });
      child.once("error", (error) => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        reject(error);
      });
      child.once("close", (code) => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        resolve({
          output: Buffer.concat(chunks).toString("utf8"),
          code,
          timedOut,
          truncated
        });
      });
    });
  }
}
