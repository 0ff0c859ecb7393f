/**
 * CLI Agent - AI agent that answers questions by searching Bitbucket code.
 *
 * Uses AI SDK tools in an agentic loop: each model turn may request
 * searches, the SDK runs them and feeds the results back, and the loop
 * ends when the model answers without calling a tool or the step limit
 * is reached. Supports a local Ollama server and hosted providers.
 *
 * @module clients/cli-agent
 *
 * @example
 * ```typescript
 * import { CLIAgent, SearchClient } from "bitbucket-code-search";
 *
 * const agent = new CLIAgent({
 *   client: searchClient,
 *   provider: "ollama",
 *   model: "llama3.3",
 * });
 * await agent.initialize();
 *
 * await agent.ask("Where is the retry policy configured?");
 * console.log(agent.getUsageInfo());
 * ```
 */

import {
  generateText,
  streamText,
  stepCountIs,
  tool,
  type LanguageModel,
  type LanguageModelUsage,
  type ModelMessage,
} from "ai";
import { z } from "zod";
import type { SearchClient } from "./search-client.js";
import {
  FILE_NAMES_DESCRIPTION,
  RAW_MATCHES_DESCRIPTION,
  getSystemPrompt,
} from "./tool-descriptions.js";

/**
 * Supported LLM providers.
 * "ollama" talks to a local Ollama server through its OpenAI-compatible API.
 */
export type Provider = "ollama" | "openai" | "anthropic" | "google";

export const PROVIDERS: readonly Provider[] = ["ollama", "openai", "anthropic", "google"];

/** Default model per provider */
export const PROVIDER_DEFAULTS: Record<Provider, string> = {
  ollama: "llama3.3",
  openai: "gpt-5-mini",
  anthropic: "claude-haiku-4-5",
  google: "gemini-2.5-flash",
};

/** Default context window in tokens */
export const DEFAULT_CONTEXT_WINDOW = 8192;

/** Rough characters per token; tool output may fill half the window */
const TOOL_OUTPUT_CHARS_PER_TOKEN = 2;

const DEFAULT_OLLAMA_BASE_URL = "http://localhost:11434/v1";

/** Search operations the agent exposes as tools */
export type AgentSearchClient = Pick<SearchClient, "getRawMatches" | "getFileNamesWithMatches">;

/** Anything with a string write, such as process.stdout */
export interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * Configuration for the CLI agent.
 */
export interface CLIAgentConfig {
  /** Client the search tools call into */
  client: AgentSearchClient;
  /** LLM provider to use */
  provider: Provider;
  /** Model name (e.g., "llama3.3", "gpt-5-mini") */
  model: string;
  /**
   * Sampling temperature.
   * @default 0.2
   */
  temperature?: number;
  /**
   * Model context window in tokens. Bounds the size of tool output.
   * @default 8192
   */
  contextWindow?: number;
  /**
   * Maximum number of agent steps (tool calls + responses).
   * @default 10
   */
  maxSteps?: number;
  /**
   * Echo tool calls and their results to the output.
   * @default false
   */
  showToolCalls?: boolean;
  /**
   * Stream responses token by token.
   * @default true
   */
  stream?: boolean;
  /** Custom system prompt. Defaults to the code search prompt with syntax rules. */
  systemPrompt?: string;
  /**
   * Base URL of the Ollama OpenAI-compatible API.
   * @default process.env.OLLAMA_BASE_URL or http://localhost:11434/v1
   */
  ollamaBaseUrl?: string;
  /** Where responses are written. Defaults to process.stdout. */
  output?: OutputStream;
}

/**
 * Load a model from the specified provider.
 * Hosted providers read their API keys from their usual environment variables.
 */
export async function loadModel(
  provider: Provider,
  modelName: string,
  ollamaBaseUrl?: string
): Promise<LanguageModel> {
  switch (provider) {
    case "ollama": {
      const { createOpenAI } = await import("@ai-sdk/openai");
      const ollama = createOpenAI({
        name: "ollama",
        baseURL: ollamaBaseUrl ?? process.env.OLLAMA_BASE_URL ?? DEFAULT_OLLAMA_BASE_URL,
        // Ollama ignores the key but the client requires one
        apiKey: "ollama",
      });
      return ollama.chat(modelName);
    }
    case "openai": {
      const { openai } = await import("@ai-sdk/openai");
      // Chat Completions API rather than the stateful Responses API
      return openai.chat(modelName);
    }
    case "anthropic": {
      const { anthropic } = await import("@ai-sdk/anthropic");
      return anthropic(modelName);
    }
    case "google": {
      const { google } = await import("@ai-sdk/google");
      return google(modelName);
    }
  }
}

/**
 * Create the AI SDK tools backed by a search client.
 *
 * @param maxOutputLength - Cap on characters returned by each tool call
 */
export function createSearchTools(client: AgentSearchClient, maxOutputLength?: number) {
  return {
    get_raw_matches: tool({
      description: RAW_MATCHES_DESCRIPTION,
      inputSchema: z.object({
        search_query: z.string().describe("Query in Bitbucket code search syntax."),
      }),
      execute: async ({ search_query }) => {
        return client.getRawMatches(search_query, { maxOutputLength });
      },
    }),
    get_file_names_with_matches: tool({
      description: FILE_NAMES_DESCRIPTION,
      inputSchema: z.object({
        search_query: z.string().describe("Query in Bitbucket code search syntax."),
      }),
      execute: async ({ search_query }) => {
        const names = await client.getFileNamesWithMatches(search_query, { maxOutputLength });
        return names || "No matching files found.";
      },
    }),
  };
}

/**
 * Format token usage for display.
 */
export function formatUsage(usage: LanguageModelUsage): string {
  return [
    `Input tokens: ${usage.inputTokens ?? 0}`,
    `Output tokens: ${usage.outputTokens ?? 0}`,
    `Total tokens: ${usage.totalTokens ?? 0}`,
  ].join(", ");
}

/**
 * AI agent for code search Q&A.
 *
 * The agent maintains conversation history, allowing for follow-up
 * questions. Call `reset()` to start a new conversation.
 *
 * @example
 * ```typescript
 * const agent = new CLIAgent({
 *   client: searchClient,
 *   provider: "openai",
 *   model: "gpt-5-mini",
 *   showToolCalls: true,
 * });
 *
 * await agent.initialize();
 *
 * await agent.ask("Which services call the billing API?");
 * await agent.ask("Only the ones written in python");
 *
 * agent.reset();
 * ```
 */
export class CLIAgent {
  private model: LanguageModel | null = null;
  private readonly provider: Provider;
  private readonly modelName: string;
  private readonly temperature: number;
  private readonly maxSteps: number;
  private readonly showToolCalls: boolean;
  private readonly stream: boolean;
  private readonly systemPrompt: string;
  private readonly ollamaBaseUrl: string | undefined;
  private readonly output: OutputStream;
  private readonly tools: ReturnType<typeof createSearchTools>;
  private messages: ModelMessage[] = [];
  private lastUsage: LanguageModelUsage | null = null;

  /**
   * Create a new CLI agent.
   *
   * Note: You must call `initialize()` before using the agent.
   */
  constructor(config: CLIAgentConfig) {
    this.provider = config.provider;
    this.modelName = config.model;
    this.temperature = config.temperature ?? 0.2;
    this.maxSteps = config.maxSteps ?? 10;
    this.showToolCalls = config.showToolCalls ?? false;
    this.stream = config.stream ?? true;
    this.systemPrompt = config.systemPrompt ?? getSystemPrompt();
    this.ollamaBaseUrl = config.ollamaBaseUrl;
    this.output = config.output ?? process.stdout;
    const contextWindow = config.contextWindow ?? DEFAULT_CONTEXT_WINDOW;
    this.tools = createSearchTools(config.client, contextWindow * TOOL_OUTPUT_CHARS_PER_TOKEN);
  }

  /**
   * Load the model from the provider. Must be called before `ask()`.
   */
  async initialize(): Promise<void> {
    this.model = await loadModel(this.provider, this.modelName, this.ollamaBaseUrl);
  }

  /**
   * Ask a question and get a response.
   *
   * The model may call the search tools before answering. The question
   * and the answer are added to the conversation history.
   *
   * @throws Error if agent not initialized
   */
  async ask(query: string): Promise<string> {
    if (!this.model) {
      throw new Error("Agent not initialized. Call initialize() first.");
    }

    this.messages.push({ role: "user", content: query });

    if (this.stream) {
      return this.streamResponse(this.model);
    }
    return this.generateResponse(this.model);
  }

  private async generateResponse(model: LanguageModel): Promise<string> {
    const result = await generateText({
      model,
      tools: this.tools,
      stopWhen: stepCountIs(this.maxSteps),
      system: this.systemPrompt,
      messages: this.messages,
      temperature: this.temperature,
      onStepFinish: this.handleStepFinish.bind(this),
    });

    this.lastUsage = result.totalUsage;
    this.messages.push({ role: "assistant", content: result.text });
    return result.text;
  }

  private async streamResponse(model: LanguageModel): Promise<string> {
    const result = streamText({
      model,
      tools: this.tools,
      stopWhen: stepCountIs(this.maxSteps),
      system: this.systemPrompt,
      messages: this.messages,
      temperature: this.temperature,
      onStepFinish: this.handleStepFinish.bind(this),
    });

    let fullText = "";
    for await (const chunk of result.textStream) {
      this.output.write(chunk);
      fullText += chunk;
    }
    this.output.write("\n");

    this.lastUsage = await result.totalUsage;
    this.messages.push({ role: "assistant", content: fullText });
    return fullText;
  }

  private handleStepFinish(step: {
    text?: string;
    toolCalls?: Array<{ toolName: string; input?: unknown }>;
    toolResults?: Array<{ toolName: string; output?: unknown }>;
  }): void {
    if (this.showToolCalls) {
      for (const call of step.toolCalls ?? []) {
        this.output.write(`\x1b[90m[tool] ${call.toolName}(${JSON.stringify(call.input ?? {})})\x1b[0m\n`);
      }
      for (const result of step.toolResults ?? []) {
        const text = typeof result.output === "string" ? result.output : JSON.stringify(result.output);
        this.output.write(`\x1b[90m[result] ${result.toolName}: ${text}\x1b[0m\n`);
      }
    }
    // Add spacing after each step (agent turn) for readability
    if (step.text) {
      this.output.write("\n\n");
    }
  }

  /**
   * Start a new conversation, dropping history and usage.
   */
  reset(): void {
    this.messages = [];
    this.lastUsage = null;
  }

  /**
   * Token usage of the most recent response.
   */
  getUsageInfo(): string {
    if (!this.lastUsage) {
      return "No usage information available yet.";
    }
    return formatUsage(this.lastUsage);
  }

  /**
   * Get a copy of the conversation history.
   */
  getHistory(): ModelMessage[] {
    return [...this.messages];
  }
}
