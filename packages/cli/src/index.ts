#!/usr/bin/env tsx
import { Command } from "commander";
import pc from "picocolors";
import { TOOL_VERSION } from "@bibverify/refcheck";
import { registerAllCommands } from "./commands/index.js";

const program = new Command();
program
  .name("bibverify")
  .description("Verify BibTeX citations against Crossref, doi.org and Semantic Scholar")
  .version(TOOL_VERSION)
  .option("--cwd <path>", "Working directory", process.cwd());

registerAllCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error(pc.red(error instanceof Error ? error.message : String(error)));
  process.exitCode = 1;
});
