/**
 * Clients module exports
 */

export { SearchClient, type SearchClientConfig } from "./search-client.js";
export {
  CLIAgent,
  createSearchTools,
  formatUsage,
  loadModel,
  PROVIDERS,
  PROVIDER_DEFAULTS,
  DEFAULT_CONTEXT_WINDOW,
  type CLIAgentConfig,
  type AgentSearchClient,
  type OutputStream,
  type Provider,
} from "./cli-agent.js";
export {
  InteractiveShell,
  SHELL_PROMPT,
  SHELL_INTRO,
  type InteractiveShellConfig,
  type ShellAgent,
  type ShellState,
} from "./shell.js";
export {
  SYNTAX_RULES,
  RAW_MATCHES_DESCRIPTION,
  FILE_NAMES_DESCRIPTION,
  getSystemPrompt,
} from "./tool-descriptions.js";
