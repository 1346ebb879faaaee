import type { ActionInput, ActionLog } from "../action-log.js";
import { createLogger } from "../logger.js";
import { DEFAULT_DENYLIST, validateCommand } from "../security/destructive-denylist.js";
import {
  RelayError,
  isRetryable,
  toFailure,
  type ErrorType,
  type ExecutionFailure,
  type ExecutionResult,
  type ExecutionSuccess
} from "./errors.js";
import { CommandThrottle } from "./throttle.js";
import { AbortedError, systemClock, type Clock } from "./timing.js";

const log = createLogger("relay-client");

export interface RelayClientOptions {
  /** Base URL of the relay hop; requests go to `<serverUrl>/execute`. */
  serverUrl: string;
  actionLog: ActionLog;
  timeoutMs?: number;
  maxRetries?: number;
  cooldownMs?: number;
  backoffMs?: number;
  denylist?: ReadonlyArray<string>;
  clock?: Clock;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export interface RelayPayload {
  command: string;
  context: {
    purpose: string | null;
    previous_context: Record<string, unknown>;
    timestamp: string;
  };
}

interface RawResponse {
  status: number;
  body: string;
}

class AttemptTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`request exceeded ${timeoutMs}ms`);
    this.name = "AttemptTimeoutError";
  }
}

/**
 * Relay core: validates, throttles and forwards one command to the relay hop,
 * retrying transport failures with linear backoff. `execute` never throws;
 * every outcome is an ExecutionResult and every step lands in the action log.
 *
 * The running context is instance state. Concurrent `execute` calls on one
 * instance merge returned context last-write-wins.
 */
export class RelayClient {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly denylist: ReadonlyArray<string>;
  private readonly clock: Clock;
  private readonly throttle: CommandThrottle;
  private readonly actionLog: ActionLog;
  private context: Record<string, unknown> = {};

  constructor(options: RelayClientOptions) {
    this.endpoint = `${options.serverUrl.replace(/\/$/, "")}/execute`;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.backoffMs = options.backoffMs ?? 1_000;
    this.denylist = options.denylist ?? DEFAULT_DENYLIST;
    this.clock = options.clock ?? systemClock;
    this.actionLog = options.actionLog;
    this.throttle = new CommandThrottle({
      cooldownMs: options.cooldownMs ?? 100,
      clock: this.clock
    });
  }

  getContext(): Record<string, unknown> {
    return { ...this.context };
  }

  async execute(command: string, purpose?: string, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const { signal } = options;
    const commandText = typeof command === "string" ? command : "";
    try {
      await this.record({
        action_type: "command_execution_start",
        command: commandText,
        prompt: purpose,
        reasoning: "Executing command through relay"
      });
      validateCommand(command, this.denylist);
      const dispatchedAt = await this.throttle.acquire(signal);
      const payload: RelayPayload = {
        command,
        context: {
          purpose: purpose ?? null,
          previous_context: { ...this.context },
          timestamp: new Date(dispatchedAt).toISOString()
        }
      };
      return await this.dispatch(payload, signal);
    } catch (error: unknown) {
      const failure =
        error instanceof AbortedError || signal?.aborted === true
          ? cancelledFailure(commandText)
          : toFailure(error, { command: commandText });
      await this.recordFailure(commandText, failure);
      return failure;
    }
  }

  private async dispatch(payload: RelayPayload, signal: AbortSignal | undefined): Promise<ExecutionSuccess> {
    const { command } = payload;
    for (let attempt = 1; ; attempt++) {
      let response: RawResponse;
      try {
        response = await this.post(payload, signal);
      } catch (error: unknown) {
        if (signal?.aborted) {
          throw new AbortedError("Command execution cancelled");
        }
        const { errorType, message } = this.classifyAttemptFailure(error);
        if (!isRetryable(errorType) || attempt >= this.maxRetries) {
          throw new RelayError(errorType, message, { command, attempt });
        }
        const delayMs = attempt * this.backoffMs;
        log.warn({ command, attempt, errorType, delayMs }, "relay attempt failed; retrying");
        await this.record({
          action_type: "command_execution_retry",
          command,
          status: "error",
          error: message,
          error_type: errorType,
          attempt,
          delay_ms: delayMs
        });
        await this.clock.sleep(delayMs, signal);
        continue;
      }
      return await this.handleResponse(command, response);
    }
  }

  private classifyAttemptFailure(error: unknown): { errorType: ErrorType; message: string } {
    if (error instanceof AttemptTimeoutError) {
      return { errorType: "timeout", message: `Command timed out after ${this.timeoutMs / 1000} seconds` };
    }
    if (error instanceof Error && hasErrorCode(error.cause, "ERR_INVALID_URL")) {
      return { errorType: "validation", message: `Invalid relay URL: ${this.endpoint}` };
    }
    return { errorType: "network", message: `Failed to communicate with relay: ${describeError(error)}` };
  }

  private async post(payload: RelayPayload, signal: AbortSignal | undefined): Promise<RawResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      if (signal?.aborted) {
        throw new AbortedError("Command execution cancelled");
      }
      const res = await fetch(this.endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: controller.signal
      });
      return { status: res.status, body: await res.text() };
    } catch (error: unknown) {
      if (timedOut) {
        throw new AttemptTimeoutError(this.timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private async handleResponse(command: string, response: RawResponse): Promise<ExecutionSuccess> {
    const { status, body } = response;
    if (status === 503) {
      throw new RelayError("server", "Server is temporarily unavailable", { status_code: status });
    }
    if (status === 400) {
      throw new RelayError("command", `Command failed: ${readDetail(body)}`, body);
    }
    if (status === 408) {
      throw new RelayError("timeout", `Command timed out in sandbox: ${readDetail(body)}`, body);
    }
    if (status !== 200) {
      throw new RelayError("server", `Server error: ${status}`, body);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw new RelayError("validation", "Invalid response format from server", { response: body });
    }
    if (!isRecord(parsed) || (parsed.output !== undefined && typeof parsed.output !== "string")) {
      throw new RelayError("validation", "Invalid response format from server", { response: parsed ?? null });
    }

    const returnedContext = isRecord(parsed.context) ? parsed.context : {};
    Object.assign(this.context, returnedContext);
    const output = typeof parsed.output === "string" ? parsed.output : "";

    await this.record({
      action_type: "command_execution_success",
      command,
      status: "success",
      output,
      details: { context: returnedContext }
    });
    return { output, context: { ...returnedContext } };
  }

  private async record(input: ActionInput): Promise<void> {
    await this.actionLog.append(input);
  }

  /** Last stop: a broken log must not turn a failure result into a thrown error. */
  private async recordFailure(command: string, failure: ExecutionFailure): Promise<void> {
    try {
      await this.actionLog.append({
        action_type: "command_execution_error",
        command,
        status: "error",
        error: failure.error,
        error_type: failure.error_type,
        details: failure.details
      });
    } catch (error: unknown) {
      log.error({ err: error, command, failure }, "could not record command failure");
    }
  }
}

function cancelledFailure(command: string): ExecutionFailure {
  return {
    error: "Command execution cancelled",
    error_type: "unknown",
    details: { command, cancelled: true }
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readDetail(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (isRecord(parsed) && typeof parsed.detail === "string") {
      return parsed.detail;
    }
  } catch {
    // not JSON; fall through to the raw body
  }
  return body.slice(0, 500);
}

function hasErrorCode(value: unknown, code: string): boolean {
  return typeof value === "object" && value !== null && "code" in value && value.code === code;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    return cause instanceof Error ? `${error.message} (${cause.message})` : error.message;
  }
  return String(error);
}
