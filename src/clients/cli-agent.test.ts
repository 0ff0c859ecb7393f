import { describe, it, expect, vi, beforeEach } from "vitest";
import { generateText, streamText, type LanguageModelUsage } from "ai";
import { CLIAgent, createSearchTools, formatUsage, loadModel } from "./cli-agent.js";
import { getSystemPrompt } from "./tool-descriptions.js";

// Mock the AI SDK
vi.mock("ai", async (importOriginal) => {
  const actual = await importOriginal<typeof import("ai")>();
  return {
    ...actual,
    generateText: vi.fn(),
    streamText: vi.fn(),
  };
});

// Mock all provider packages
vi.mock("@ai-sdk/openai", () => {
  const ollamaChat = vi.fn(() => "mock-ollama-model");
  return {
    openai: { chat: vi.fn(() => "mock-openai-model") },
    createOpenAI: vi.fn(() => ({ chat: ollamaChat })),
  };
});

vi.mock("@ai-sdk/anthropic", () => ({
  anthropic: vi.fn(() => "mock-anthropic-model"),
}));

vi.mock("@ai-sdk/google", () => ({
  google: vi.fn(() => "mock-google-model"),
}));

const usage: LanguageModelUsage = { inputTokens: 12, outputTokens: 5, totalTokens: 17 };

function fakeStream(chunks: string[]) {
  return {
    textStream: (async function* () {
      for (const chunk of chunks) yield chunk;
    })(),
    totalUsage: Promise.resolve(usage),
  } as unknown as ReturnType<typeof streamText>;
}

function createMockOutput() {
  const write = vi.fn((_chunk: string) => true);
  return { write, text: () => write.mock.calls.map((c) => c[0]).join("") };
}

describe("CLIAgent", () => {
  let mockClient: {
    getRawMatches: ReturnType<typeof vi.fn>;
    getFileNamesWithMatches: ReturnType<typeof vi.fn>;
  };

  beforeEach(() => {
    vi.clearAllMocks();
    mockClient = {
      getRawMatches: vi.fn().mockResolvedValue("[]"),
      getFileNamesWithMatches: vi.fn().mockResolvedValue("demo/src/foo.py"),
    };
  });

  it("throws when asked before initialize()", async () => {
    const agent = new CLIAgent({ client: mockClient, provider: "ollama", model: "llama3.3" });
    await expect(agent.ask("hello")).rejects.toThrow("Agent not initialized");
  });

  it("streams the response and records history and usage", async () => {
    vi.mocked(streamText).mockReturnValue(fakeStream(["Found ", "it."]));
    const output = createMockOutput();
    const agent = new CLIAgent({ client: mockClient, provider: "ollama", model: "llama3.3", output });
    await agent.initialize();

    const answer = await agent.ask("Where is foo defined?");

    expect(answer).toBe("Found it.");
    expect(output.text()).toBe("Found it.\n");
    expect(agent.getHistory()).toEqual([
      { role: "user", content: "Where is foo defined?" },
      { role: "assistant", content: "Found it." },
    ]);
    expect(agent.getUsageInfo()).toBe("Input tokens: 12, Output tokens: 5, Total tokens: 17");
  });

  it("passes model, prompt, temperature and both tools to the SDK", async () => {
    vi.mocked(streamText).mockReturnValue(fakeStream(["ok"]));
    const agent = new CLIAgent({
      client: mockClient,
      provider: "ollama",
      model: "llama3.3",
      temperature: 0.7,
      output: createMockOutput(),
    });
    await agent.initialize();

    await agent.ask("q");

    const options = vi.mocked(streamText).mock.calls[0][0];
    expect(options.model).toBe("mock-ollama-model");
    expect(options.system).toBe(getSystemPrompt());
    expect(options.temperature).toBe(0.7);
    expect(Object.keys(options.tools ?? {})).toEqual(["get_raw_matches", "get_file_names_with_matches"]);
  });

  it("defaults temperature to 0.2", async () => {
    vi.mocked(streamText).mockReturnValue(fakeStream(["ok"]));
    const agent = new CLIAgent({ client: mockClient, provider: "ollama", model: "llama3.3", output: createMockOutput() });
    await agent.initialize();

    await agent.ask("q");

    expect(vi.mocked(streamText).mock.calls[0][0].temperature).toBe(0.2);
  });

  it("sends earlier turns with follow-up questions", async () => {
    vi.mocked(streamText)
      .mockReturnValueOnce(fakeStream(["first"]))
      .mockReturnValueOnce(fakeStream(["second"]));
    const agent = new CLIAgent({ client: mockClient, provider: "ollama", model: "llama3.3", output: createMockOutput() });
    await agent.initialize();

    await agent.ask("one");
    await agent.ask("two");

    expect(agent.getHistory()).toHaveLength(4);
    expect(agent.getHistory()[2]).toEqual({ role: "user", content: "two" });
  });

  it("uses generateText when streaming is off", async () => {
    vi.mocked(generateText).mockResolvedValue({
      text: "Generated answer",
      totalUsage: usage,
    } as unknown as Awaited<ReturnType<typeof generateText>>);
    const agent = new CLIAgent({
      client: mockClient,
      provider: "openai",
      model: "gpt-5-mini",
      stream: false,
      output: createMockOutput(),
    });
    await agent.initialize();

    expect(await agent.ask("q")).toBe("Generated answer");
    expect(streamText).not.toHaveBeenCalled();
    expect(agent.getUsageInfo()).toBe("Input tokens: 12, Output tokens: 5, Total tokens: 17");
  });

  it("echoes tool calls and results when showToolCalls is on", async () => {
    vi.mocked(streamText).mockReturnValue(fakeStream([]));
    const output = createMockOutput();
    const agent = new CLIAgent({
      client: mockClient,
      provider: "ollama",
      model: "llama3.3",
      showToolCalls: true,
      output,
    });
    await agent.initialize();
    await agent.ask("q");
    output.write.mockClear();

    const { onStepFinish } = vi.mocked(streamText).mock.calls[0][0];
    await onStepFinish?.({
      text: "",
      toolCalls: [{ toolName: "get_file_names_with_matches", input: { search_query: "foo" } }],
      toolResults: [{ toolName: "get_file_names_with_matches", output: "demo/src/foo.py" }],
    } as never);

    expect(output.text()).toBe(
      '\x1b[90m[tool] get_file_names_with_matches({"search_query":"foo"})\x1b[0m\n' +
        "\x1b[90m[result] get_file_names_with_matches: demo/src/foo.py\x1b[0m\n"
    );
  });

  it("stays quiet about tool calls by default", async () => {
    vi.mocked(streamText).mockReturnValue(fakeStream([]));
    const output = createMockOutput();
    const agent = new CLIAgent({ client: mockClient, provider: "ollama", model: "llama3.3", output });
    await agent.initialize();
    await agent.ask("q");
    output.write.mockClear();

    const { onStepFinish } = vi.mocked(streamText).mock.calls[0][0];
    await onStepFinish?.({
      text: "",
      toolCalls: [{ toolName: "get_raw_matches", input: { search_query: "foo" } }],
      toolResults: [],
    } as never);

    expect(output.write).not.toHaveBeenCalled();
  });

  it("reset() starts a new conversation", async () => {
    vi.mocked(streamText).mockReturnValue(fakeStream(["ok"]));
    const agent = new CLIAgent({ client: mockClient, provider: "ollama", model: "llama3.3", output: createMockOutput() });
    await agent.initialize();
    await agent.ask("q");

    agent.reset();

    expect(agent.getHistory()).toHaveLength(0);
    expect(agent.getUsageInfo()).toBe("No usage information available yet.");
  });

  it("bounds tool output by the context window", async () => {
    const agent = new CLIAgent({
      client: mockClient,
      provider: "ollama",
      model: "llama3.3",
      contextWindow: 1000,
      output: createMockOutput(),
    });
    vi.mocked(streamText).mockReturnValue(fakeStream(["ok"]));
    await agent.initialize();
    await agent.ask("q");

    const tools = vi.mocked(streamText).mock.calls[0][0].tools;
    await tools?.get_raw_matches.execute?.({ search_query: "foo" }, { toolCallId: "call-1", messages: [] });

    expect(mockClient.getRawMatches).toHaveBeenCalledWith("foo", { maxOutputLength: 2000 });
  });
});

describe("createSearchTools", () => {
  const options = { toolCallId: "call-1", messages: [] };

  it("get_raw_matches returns the client's JSON", async () => {
    const client = {
      getRawMatches: vi.fn().mockResolvedValue('[{"type":"code_search_result"}]'),
      getFileNamesWithMatches: vi.fn(),
    };
    const tools = createSearchTools(client, 500);

    const result = await tools.get_raw_matches.execute?.({ search_query: "foo lang:python" }, options);

    expect(result).toBe('[{"type":"code_search_result"}]');
    expect(client.getRawMatches).toHaveBeenCalledWith("foo lang:python", { maxOutputLength: 500 });
  });

  it("get_file_names_with_matches returns the names", async () => {
    const client = {
      getRawMatches: vi.fn(),
      getFileNamesWithMatches: vi.fn().mockResolvedValue("demo/a.py\ndemo/b.py"),
    };
    const tools = createSearchTools(client);

    expect(await tools.get_file_names_with_matches.execute?.({ search_query: "foo" }, options)).toBe(
      "demo/a.py\ndemo/b.py"
    );
  });

  it("get_file_names_with_matches says so when nothing matches", async () => {
    const client = {
      getRawMatches: vi.fn(),
      getFileNamesWithMatches: vi.fn().mockResolvedValue(""),
    };
    const tools = createSearchTools(client);

    expect(await tools.get_file_names_with_matches.execute?.({ search_query: "foo" }, options)).toBe(
      "No matching files found."
    );
  });
});

describe("loadModel", () => {
  it("points the OpenAI-compatible client at Ollama", async () => {
    const { createOpenAI } = await import("@ai-sdk/openai");

    const model = await loadModel("ollama", "llama3.3", "http://ollama.test:11434/v1");

    expect(model).toBe("mock-ollama-model");
    expect(createOpenAI).toHaveBeenCalledWith({
      name: "ollama",
      baseURL: "http://ollama.test:11434/v1",
      apiKey: "ollama",
    });
  });

  it("loads hosted providers", async () => {
    expect(await loadModel("openai", "gpt-5-mini")).toBe("mock-openai-model");
    expect(await loadModel("anthropic", "claude-haiku-4-5")).toBe("mock-anthropic-model");
    expect(await loadModel("google", "gemini-2.5-flash")).toBe("mock-google-model");
  });
});

describe("formatUsage", () => {
  it("treats missing counts as zero", () => {
    expect(formatUsage({ inputTokens: 3, outputTokens: undefined, totalTokens: undefined })).toBe(
      "Input tokens: 3, Output tokens: 0, Total tokens: 0"
    );
  });
});
