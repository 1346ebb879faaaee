/**
 * Runs one shell command under a hard wall-clock timeout. The default
 * implementation spawns bash on the host; container or bubblewrap backends
 * can sit behind the same interface.
 */
export interface ExecSandboxOptions {
  timeoutMs: number;
  maxBufferBytes: number;
  cwd?: string;
  signal?: AbortSignal;
}

export interface ExecSandboxResult {
  /** stdout and stderr interleaved in arrival order. */
  output: string;
  /** Exit code; `null` when the process was killed by a signal. */
  code: number | null;
  timedOut: boolean;
  truncated: boolean;
}

export interface ExecSandbox {
  run(command: string, options: ExecSandboxOptions): Promise<ExecSandboxResult>;
}
