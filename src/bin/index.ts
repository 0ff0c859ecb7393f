#!/usr/bin/env node
/**
 * CLI entry point for bitbucket-code-search
 */

import { Command } from "commander";
import { VERSION } from "../core/utils.js";
import { searchCommand } from "./cmd-search.js";

const program = new Command();

program
  .name("bbsearch")
  .description("Let a language model search code in a Bitbucket workspace")
  .version(VERSION);

// `bbsearch --workspace ws --prompt ...` runs search without naming it
program.addCommand(searchCommand, { isDefault: true });

await program.parseAsync();
