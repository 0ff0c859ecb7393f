/**
 * Search command - Let a language model search Bitbucket code
 *
 * Default command of the CLI. Without a mode flag the prompt goes to the
 * model once and the answer streams to stdout. `--debug` and
 * `--debug_json` bypass the model and run the prompt as a search query.
 */

import { Command, InvalidArgumentError } from "commander";
import { CLIAgent, PROVIDERS, PROVIDER_DEFAULTS, DEFAULT_CONTEXT_WINDOW, type Provider } from "../clients/cli-agent.js";
import { SearchClient } from "../clients/search-client.js";
import { InteractiveShell } from "../clients/shell.js";
import { getCredentials, parseFloatOption, parseLogLevel, parsePositiveInt } from "../core/config.js";
import { ConfigurationError, errorMessage } from "../core/errors.js";
import { createLogger, type Logger } from "../core/logger.js";
import { DEFAULT_MAX_PAGES } from "../core/query-executor.js";
import type { CodeSearchSource } from "../sources/types.js";
import { DEFAULT_CACHE_DIR, FilesystemPageCache } from "../stores/filesystem.js";
import type { PageCache } from "../stores/types.js";

/** Parsed command-line options */
export interface SearchCommandOptions {
  workspace: string;
  prompt?: string;
  provider: string;
  model?: string;
  temperature: number;
  n_ctx: number;
  maxPages: number;
  maxSteps: number;
  baseUrl?: string;
  cacheDir: string;
  /** False when --no-cache is given */
  cache: boolean;
  debug?: boolean;
  debug_json?: boolean;
  interactive?: boolean;
  log_level: string;
}

/** Collaborators that tests replace */
export interface SearchCommandDeps {
  /** Search backend override. Defaults to the Bitbucket API. */
  source?: CodeSearchSource;
  env?: NodeJS.ProcessEnv;
  /** Line printer. Defaults to console.log. */
  print?: (text: string) => void;
  logger?: Logger;
}

const SEPARATOR = "-".repeat(40);

function isProvider(name: string): name is Provider {
  return PROVIDERS.some((provider) => provider === name);
}

/**
 * Wrap a config parser so commander reports its failures as invalid arguments.
 */
function optionParser<T>(parse: (value: string) => T): (value: string) => T {
  return (value) => {
    try {
      return parse(value);
    } catch (error) {
      throw new InvalidArgumentError(errorMessage(error));
    }
  };
}

/**
 * Run the search command.
 *
 * Configuration errors are raised before any network activity. The page
 * cache is opened once and closed on every exit path.
 */
export async function runSearch(
  options: SearchCommandOptions,
  deps: SearchCommandDeps = {}
): Promise<void> {
  const prompt = options.prompt?.trim();
  if (!prompt) {
    throw new ConfigurationError("Prompt must be provided");
  }
  if (!isProvider(options.provider)) {
    throw new ConfigurationError(
      `Unknown provider: ${options.provider}. Use: ${PROVIDERS.join(", ")}`
    );
  }
  const provider = options.provider;
  const level = parseLogLevel(options.log_level);
  const logger = deps.logger ?? createLogger({ level });
  const print = deps.print ?? ((text: string) => console.log(text));

  const cache: PageCache | null = options.cache
    ? await FilesystemPageCache.open({ directory: options.cacheDir })
    : null;

  try {
    const client = new SearchClient({
      workspace: options.workspace,
      credentials: getCredentials(deps.env),
      baseUrl: options.baseUrl,
      source: deps.source,
      cache,
      maxPages: options.maxPages,
      logger,
    });

    if (options.debug_json) {
      print(await client.getRawMatches(prompt));
      return;
    }

    if (options.debug) {
      const results = await client.getMatches(prompt, { highlight: true });
      for (const { fileName, matches } of results) {
        print(`File: ${fileName}`);
        print(matches);
        print(SEPARATOR);
      }
      return;
    }

    const model = options.model ?? PROVIDER_DEFAULTS[provider];
    logger.debug(`Using ${provider}/${model}`);
    const agent = new CLIAgent({
      client,
      provider,
      model,
      temperature: options.temperature,
      contextWindow: options.n_ctx,
      maxSteps: options.maxSteps,
      showToolCalls: true,
    });
    await agent.initialize();

    if (options.interactive) {
      const shell = new InteractiveShell({ agent });
      await shell.chat(prompt);
      await shell.run();
      return;
    }

    await agent.ask(prompt);
  } finally {
    await cache?.close();
  }
}

export const searchCommand = new Command("search")
  .description("Search Bitbucket code with a language model")
  .requiredOption("--workspace <name>", "Bitbucket workspace name")
  .option("--prompt <text>", "Prompt for the model (the search query in debug modes)")
  .option("--provider <name>", `LLM provider (${PROVIDERS.join(", ")})`, "ollama")
  .option("--model <name>", "Model to use (defaults based on provider)")
  .option("--temperature <number>", "Temperature for LLM generation", optionParser(parseFloatOption), 0.2)
  .option("--n_ctx <tokens>", "Context window of the model in tokens", optionParser(parsePositiveInt), DEFAULT_CONTEXT_WINDOW)
  .option("--max-pages <n>", "Maximum result pages per query", optionParser(parsePositiveInt), DEFAULT_MAX_PAGES)
  .option("--max-steps <n>", "Maximum agent steps", optionParser(parsePositiveInt), 10)
  .option("--base-url <url>", "Bitbucket API base URL")
  .option("--cache-dir <dir>", "Directory for cached search pages", DEFAULT_CACHE_DIR)
  .option("--no-cache", "Do not cache search pages")
  .option("--debug", "Print formatted matches for the prompt and exit")
  .option("--debug_json", "Print raw JSON results for the prompt and exit")
  .option("--interactive", "Run in interactive mode")
  .option("--log_level <level>", "Logging level (DEBUG, INFO, WARNING, ERROR, CRITICAL)", "INFO")
  .action(async (options: SearchCommandOptions) => {
    try {
      await runSearch(options);
    } catch (error) {
      console.error("Search failed:", errorMessage(error));
      process.exit(1);
    }
  });
