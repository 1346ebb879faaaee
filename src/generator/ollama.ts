import { Ajv, type ValidateFunction } from "ajv";

import type { GeneratorConfig } from "../config.js";
import { createLogger } from "../logger.js";
import type { CommandGenerator, GenerationResult } from "./types.js";

const log = createLogger("generator");

interface ModelCommandPayload {
  command: string;
  explanation?: string;
}

const modelCommandSchema = {
  type: "object",
  properties: {
    command: { type: "string" },
    explanation: { type: "string" }
  },
  required: ["command"]
};

/** Lines that read as model chatter rather than a command. */
const CHATTER_PREFIXES = ["{", "[", "<", "think", "Thought", "Okay", "Let", "I", "The"];

export function buildCommandPrompt(request: string): string {
  return [
    "You are a command generator. Your task is to convert user requests into bash commands.",
    "",
    "IMPORTANT: Respond with ONLY a JSON object. No other text, no thoughts, no explanations.",
    "The response must be a valid JSON object with exactly these fields:",
    "- command: the bash command to execute",
    "- explanation: a brief explanation of what the command does",
    "",
    "Example response:",
    '{"command": "ls -la", "explanation": "Lists all files including hidden ones with detailed information"}',
    "",
    `User request: ${request}`,
    "",
    "Response:"
  ].join("\n");
}

/**
 * Command generator backed by Ollama's /api/generate. Small local models wrap
 * the JSON in reasoning text, so the last `{...}` span is taken and checked
 * against a schema; plain-text replies fall back to the first command-like line.
 */
export class OllamaCommandGenerator implements CommandGenerator {
  private readonly ajv = new Ajv({ strict: false, allErrors: true });
  private readonly validatePayload: ValidateFunction<ModelCommandPayload>;

  constructor(private readonly config: Pick<GeneratorConfig, "baseURL" | "model" | "timeoutMs">) {
    this.validatePayload = this.ajv.compile<ModelCommandPayload>(modelCommandSchema);
  }

  async generate(prompt: string, signal?: AbortSignal): Promise<GenerationResult> {
    const baseURL = this.config.baseURL.replace(/\/$/, "");
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    let responseText: string;
    try {
      const res = await fetch(`${baseURL}/api/generate`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: this.config.model,
          prompt: buildCommandPrompt(prompt),
          stream: false
        }),
        signal: controller.signal
      });
      if (!res.ok) {
        return {
          error: `LLM API error: ${res.status}`,
          details: await res.text()
        };
      }
      const body: unknown = await res.json();
      responseText =
        typeof body === "object" && body !== null && "response" in body && typeof body.response === "string"
          ? body.response.trim()
          : "";
    } catch (err) {
      const message = err instanceof Error && err.name === "AbortError"
        ? "request aborted or timed out"
        : err instanceof Error
          ? err.message
          : String(err);
      log.warn({ err, prompt }, "command generation request failed");
      return {
        error: `Failed to generate command: ${message}`,
        details: { prompt }
      };
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }

    log.debug({ responseText }, "model response");
    return this.parseModelResponse(responseText);
  }

  parseModelResponse(raw: string): GenerationResult {
    const text = stripThinking(raw).trim();
    const jsonStart = text.lastIndexOf("{");
    const jsonEnd = text.lastIndexOf("}") + 1;
    if (jsonStart < 0 || jsonEnd <= jsonStart) {
      return {
        error: "No JSON object found in response",
        details: { response: text }
      };
    }
    const candidate = text.slice(jsonStart, jsonEnd);

    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch {
      return extractCommandLine(candidate);
    }
    if (!this.validatePayload(parsed)) {
      return {
        error: "No command found in response",
        details: { response: candidate, errors: this.ajv.errorsText(this.validatePayload.errors) }
      };
    }
    const command = parsed.command.trim();
    if (!command) {
      return {
        error: "No command found in response",
        details: { response: candidate }
      };
    }
    return {
      command,
      explanation: (parsed.explanation ?? "").trim()
    };
  }
}

function stripThinking(text: string): string {
  return text.replace(/<think>[\s\S]*?<\/think>/gi, "");
}

function extractCommandLine(text: string): GenerationResult {
  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    if (line && !CHATTER_PREFIXES.some((prefix) => line.startsWith(prefix))) {
      return {
        command: line,
        explanation: "Command extracted from response"
      };
    }
  }
  return {
    error: "Could not extract command from response",
    details: { response: text }
  };
}
