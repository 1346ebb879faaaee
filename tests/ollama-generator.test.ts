import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";

import { OllamaCommandGenerator, buildCommandPrompt } from "../src/generator/ollama.js";

const originalFetch = globalThis.fetch;
let fetchMock: Mock<typeof fetch>;

beforeEach(() => {
  fetchMock = vi.fn<typeof fetch>();
  globalThis.fetch = fetchMock;
});

afterEach(() => {
  globalThis.fetch = originalFetch;
});

function createGenerator(): OllamaCommandGenerator {
  return new OllamaCommandGenerator({ baseURL: "http://ollama.test/", model: "test-model", timeoutMs: 1_000 });
}

function modelReply(response: string): Response {
  return new Response(JSON.stringify({ response }), {
    status: 200,
    headers: { "Content-Type": "application/json" }
  });
}

describe("buildCommandPrompt", () => {
  it("embeds the request after the response format instructions", () => {
    const prompt = buildCommandPrompt("show disk usage");
    expect(prompt.startsWith("You are a command generator.")).toBe(true);
    expect(prompt.endsWith("User request: show disk usage\n\nResponse:")).toBe(true);
  });
});

describe("OllamaCommandGenerator", () => {
  it("posts a non-streaming generate request and returns the parsed command", async () => {
    fetchMock.mockResolvedValueOnce(
      modelReply('{"command": "ls -la", "explanation": "Lists all files"}')
    );

    const result = await createGenerator().generate("list files");

    expect(result).toEqual({ command: "ls -la", explanation: "Lists all files" });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://ollama.test/api/generate");
    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
    expect(body).toEqual({
      model: "test-model",
      prompt: buildCommandPrompt("list files"),
      stream: false
    });
  });

  it("ignores reasoning blocks around the JSON", async () => {
    fetchMock.mockResolvedValueOnce(
      modelReply('<think>Maybe {"command": "rm"} is wrong</think>\nSure: {"command": "pwd", "explanation": "Prints the directory"}')
    );

    const result = await createGenerator().generate("where am I");

    expect(result).toEqual({ command: "pwd", explanation: "Prints the directory" });
  });

  it("reports an API error with the response text", async () => {
    fetchMock.mockResolvedValueOnce(new Response("model not found", { status: 404 }));

    const result = await createGenerator().generate("list files");

    expect(result).toEqual({ error: "LLM API error: 404", details: "model not found" });
  });

  it("reports a transport failure with the prompt", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    const result = await createGenerator().generate("list files");

    expect(result).toEqual({
      error: "Failed to generate command: fetch failed",
      details: { prompt: "list files" }
    });
  });

  it("stops when the caller aborts", async () => {
    fetchMock.mockImplementationOnce(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            reject(Object.assign(new Error("This operation was aborted"), { name: "AbortError" }));
          });
        })
    );
    const controller = new AbortController();
    const pending = createGenerator().generate("list files", controller.signal);
    controller.abort();

    expect(await pending).toEqual({
      error: "Failed to generate command: request aborted or timed out",
      details: { prompt: "list files" }
    });
  });
});

describe("parseModelResponse", () => {
  const generator = createGenerator();

  it("requires a JSON object", () => {
    expect(generator.parseModelResponse("just some text")).toEqual({
      error: "No JSON object found in response",
      details: { response: "just some text" }
    });
  });

  it("requires a non-empty command field", () => {
    expect(generator.parseModelResponse('{"explanation": "nothing"}')).toMatchObject({
      error: "No command found in response"
    });
    expect(generator.parseModelResponse('{"command": "   "}')).toEqual({
      error: "No command found in response",
      details: { response: '{"command": "   "}' }
    });
  });

  it("defaults a missing explanation to an empty string", () => {
    expect(generator.parseModelResponse('{"command": "  uptime  "}')).toEqual({
      command: "uptime",
      explanation: ""
    });
  });

  it("falls back to the first command-like line of a malformed object", () => {
    expect(generator.parseModelResponse("{\nThe command is:\ndf -h\n}")).toEqual({
      command: "df -h",
      explanation: "Command extracted from response"
    });
  });

  it("gives up when no line looks like a command", () => {
    expect(generator.parseModelResponse("{command: ls}")).toEqual({
      error: "Could not extract command from response",
      details: { response: "{command: ls}" }
    });
  });
});
