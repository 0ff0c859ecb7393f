/**
 * Interactive shell - Command loop around a CLIAgent.
 *
 * States: AwaitingInput -> Processing -> AwaitingInput, until `exit`,
 * `quit` or end of input.
 *
 * Commands:
 * - `chat <prompt>`: start a new conversation with the prompt
 * - `usage`: token usage of the last response
 * - `help`: list commands
 * - `exit` / `quit`: leave the shell
 * - anything else: follow-up turn in the current conversation
 *
 * @module clients/shell
 */

import * as readline from "node:readline";
import { errorMessage } from "../core/errors.js";
import type { CLIAgent } from "./cli-agent.js";

export type ShellState = "awaiting-input" | "processing" | "closed";

/** Agent operations the shell dispatches to */
export type ShellAgent = Pick<CLIAgent, "ask" | "reset" | "getUsageInfo">;

export interface InteractiveShellConfig {
  agent: ShellAgent;
  /** Line source. Defaults to process.stdin. */
  input?: NodeJS.ReadableStream;
  /** Prompt and message sink. Defaults to process.stdout. */
  output?: NodeJS.WritableStream;
}

export const SHELL_PROMPT = "LLM> ";

export const SHELL_INTRO = "Welcome to the LLM interactive shell. Type 'help' for commands.";

const HELP_TEXT = `Commands:
  chat <prompt>  Start a new conversation with <prompt>
  usage          Show token usage of the last response
  help           Show this help
  exit, quit     Leave the shell
Anything else is sent as a follow-up in the current conversation.`;

export class InteractiveShell {
  private readonly agent: ShellAgent;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private currentState: ShellState = "awaiting-input";

  constructor(config: InteractiveShellConfig) {
    this.agent = config.agent;
    this.input = config.input ?? process.stdin;
    this.output = config.output ?? process.stdout;
  }

  get state(): ShellState {
    return this.currentState;
  }

  private print(text: string): void {
    this.output.write(`${text}\n`);
  }

  /**
   * Start a new conversation and send the prompt.
   */
  async chat(prompt: string): Promise<void> {
    if (!prompt) {
      this.print("Prompt cannot be empty.");
      return;
    }
    this.agent.reset();
    await this.agent.ask(prompt);
  }

  /**
   * Handle one line of input.
   *
   * Errors from the agent are printed and the shell keeps going.
   *
   * @returns false when the shell should stop
   */
  async handleLine(line: string): Promise<boolean> {
    if (this.currentState === "closed") {
      return false;
    }

    const trimmed = line.trim();
    const spaceIdx = trimmed.indexOf(" ");
    const command = (spaceIdx === -1 ? trimmed : trimmed.slice(0, spaceIdx)).toLowerCase();
    const rest = spaceIdx === -1 ? "" : trimmed.slice(spaceIdx + 1).trim();

    if (command === "exit" || command === "quit") {
      this.print("Exiting the interactive shell.");
      this.currentState = "closed";
      return false;
    }

    this.currentState = "processing";
    try {
      switch (command) {
        case "":
          this.print("No command entered.");
          break;
        case "help":
          this.print(HELP_TEXT);
          break;
        case "usage":
          this.print(this.agent.getUsageInfo());
          break;
        case "chat":
          await this.chat(rest);
          break;
        default:
          await this.agent.ask(trimmed);
      }
    } catch (error) {
      this.print(`\x1b[31mError:\x1b[0m ${errorMessage(error)}`);
    } finally {
      this.currentState = "awaiting-input";
    }
    return true;
  }

  /**
   * Read lines until exit or end of input.
   */
  async run(): Promise<void> {
    const rl = readline.createInterface({
      input: this.input,
      output: this.output,
      terminal: false,
    });

    this.print(SHELL_INTRO);
    this.output.write(SHELL_PROMPT);
    try {
      // Leaving the loop early closes the interface
      for await (const line of rl) {
        if (!(await this.handleLine(line))) {
          break;
        }
        this.output.write(SHELL_PROMPT);
      }
    } finally {
      this.currentState = "closed";
    }
  }
}
