import { describe, expect, it, vi } from "vitest";

import { CommandSession, type ConsoleEvent } from "../src/console/session.js";
import type { CommandGenerator, GenerationResult } from "../src/generator/types.js";
import type { ExecutionResult } from "../src/relay/errors.js";

function fixedGenerator(result: GenerationResult): CommandGenerator & { prompts: string[] } {
  const prompts: string[] = [];
  return {
    prompts,
    async generate(prompt: string) {
      prompts.push(prompt);
      return result;
    }
  };
}

function createSession(generated: GenerationResult, executed: ExecutionResult, maxPromptChars?: number) {
  const generator = fixedGenerator(generated);
  const execute = vi.fn(async (_command: string, _purpose?: string, _options?: { signal?: AbortSignal }) => executed);
  const session = new CommandSession({
    generator,
    relay: { execute },
    ...(maxPromptChars !== undefined ? { maxPromptChars } : {})
  });
  const events: ConsoleEvent[] = [];
  return { session, generator, execute, events, emit: (event: ConsoleEvent) => void events.push(event) };
}

describe("CommandSession", () => {
  it("streams each step and runs the generated command with the prompt as purpose", async () => {
    const executed: ExecutionResult = { output: "a.txt\n", context: {} };
    const { session, execute, events, emit } = createSession(
      { command: "ls", explanation: "Lists files" },
      executed
    );

    const result = await session.handle("  list files  ", emit);

    expect(result).toEqual(executed);
    expect(events).toEqual([
      { status: "Generating command...", prompt: "list files" },
      { status: "Command generated", command: "ls", explanation: "Lists files" },
      { status: "Executing command...", command: "ls" },
      { status: "Command executed", result: executed }
    ]);
    expect(execute).toHaveBeenCalledWith("ls", "list files", {});
  });

  it("forwards relay failures as the executed result", async () => {
    const failure: ExecutionResult = {
      error: "Potentially dangerous command detected",
      error_type: "validation",
      details: { command: "rm -rf /", pattern: "rm -rf" }
    };
    const { session, events, emit } = createSession({ command: "rm -rf /", explanation: "" }, failure);

    await session.handle("wipe it", emit);

    expect(events.at(-1)).toEqual({ status: "Command executed", result: failure });
  });

  it("stops before dispatch when generation fails", async () => {
    const { session, execute, events, emit } = createSession(
      { error: "No JSON object found in response", details: { response: "hmm" } },
      { output: "", context: {} }
    );

    const result = await session.handle("list files", emit);

    expect(result).toBeUndefined();
    expect(execute).not.toHaveBeenCalled();
    expect(events).toEqual([
      { status: "Generating command...", prompt: "list files" },
      { error: "No JSON object found in response", details: { response: "hmm" } }
    ]);
  });

  it("rejects an empty prompt without generating", async () => {
    const { session, generator, events, emit } = createSession(
      { command: "ls", explanation: "" },
      { output: "", context: {} }
    );

    await session.handle("   ", emit);

    expect(events).toEqual([{ error: "No prompt provided" }]);
    expect(generator.prompts).toEqual([]);
  });

  it("rejects a prompt over the length limit", async () => {
    const { session, generator, events, emit } = createSession(
      { command: "ls", explanation: "" },
      { output: "", context: {} },
      5
    );

    await session.handle("list all files", emit);

    expect(events).toEqual([{ error: "Prompt too long (limit=5)" }]);
    expect(generator.prompts).toEqual([]);
  });

  it("passes the caller's abort signal to the relay", async () => {
    const { session, execute, emit } = createSession(
      { command: "ls", explanation: "" },
      { output: "", context: {} }
    );
    const controller = new AbortController();

    await session.handle("list files", emit, controller.signal);

    expect(execute).toHaveBeenCalledWith("ls", "list files", { signal: controller.signal });
  });
});
