export interface GeneratedCommand {
  command: string;
  explanation: string;
}

export interface GenerationFailure {
  error: string;
  details: Record<string, unknown> | string;
}

export type GenerationResult = GeneratedCommand | GenerationFailure;

/** Turns a natural-language request into one candidate shell command. */
export interface CommandGenerator {
  generate(prompt: string, signal?: AbortSignal): Promise<GenerationResult>;
}

export function isGeneratedCommand(result: GenerationResult): result is GeneratedCommand {
  return !("error" in result) && typeof result.command === "string" && result.command.trim().length > 0;
}
