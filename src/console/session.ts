import type { ExecutionResult } from "../relay/errors.js";
import type { RelayClient } from "../relay/client.js";
import { isGeneratedCommand, type CommandGenerator } from "../generator/types.js";

export type ConsoleEvent =
  | { status: "Generating command..."; prompt: string }
  | { status: "Command generated"; command: string; explanation: string }
  | { status: "Executing command..."; command: string }
  | { status: "Command executed"; result: ExecutionResult }
  | { error: string; details?: Record<string, unknown> | string };

export type ConsoleEmitter = (event: ConsoleEvent) => void | Promise<void>;

export interface CommandSessionDependencies {
  generator: CommandGenerator;
  relay: Pick<RelayClient, "execute">;
  maxPromptChars?: number;
}

/**
 * One prompt, end to end: generate a command, run it through the relay
 * client and stream each step to the caller. A generator failure stops the
 * flow before anything is dispatched.
 */
export class CommandSession {
  constructor(private readonly deps: CommandSessionDependencies) {}

  async handle(prompt: string, emit: ConsoleEmitter, signal?: AbortSignal): Promise<ExecutionResult | undefined> {
    const text = prompt.trim();
    if (!text) {
      await emit({ error: "No prompt provided" });
      return undefined;
    }
    const limit = this.deps.maxPromptChars;
    if (limit !== undefined && text.length > limit) {
      await emit({ error: `Prompt too long (limit=${limit})` });
      return undefined;
    }

    await emit({ status: "Generating command...", prompt: text });
    const generated = await this.deps.generator.generate(text, signal);
    if (!isGeneratedCommand(generated)) {
      await emit({
        error: "error" in generated ? generated.error : "No command to execute",
        details: "error" in generated ? generated.details : {}
      });
      return undefined;
    }

    const { command, explanation } = generated;
    await emit({ status: "Command generated", command, explanation });
    await emit({ status: "Executing command...", command });
    const result = await this.deps.relay.execute(command, text, signal ? { signal } : {});
    await emit({ status: "Command executed", result });
    return result;
  }
}
