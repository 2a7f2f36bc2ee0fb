import { Command } from "commander";
import pc from "picocolors";
import type { OverallStatus, VerificationResult } from "@bibverify/refcheck";
import { printError } from "../errors.js";
import { statusCountLines } from "../reports/index.js";

export function cliContext(command: Command) {
  let root = command;
  while (root.parent) {
    root = root.parent;
  }
  const { cwd } = root.opts<{ cwd: string }>();
  return { cwd };
}

export function withAction<T extends unknown[]>(fn: (...args: T) => Promise<void>) {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      printError(error instanceof Error ? error : String(error));
      if (process.env.DEBUG && error instanceof Error) {
        console.error(error.stack);
      }
      process.exitCode = 1;
    }
  };
}

export function colorStatus(status: OverallStatus): string {
  switch (status) {
    case "VERIFIED":
      return pc.green(status);
    case "WARNING":
      return pc.yellow(status);
    case "SUSPICIOUS":
      return pc.magenta(status);
    case "FABRICATED":
    case "IDENTIFIER_INVALID":
      return pc.red(status);
    default:
      return pc.dim(status);
  }
}

/**
 * Verbose log line on stderr, prefixed with the local time
 */
export function timestampedLog(message: string): void {
  const time = new Date().toTimeString().slice(0, 8);
  console.error(pc.dim(`[${time}] ${message}`));
}

export function printSummary(results: VerificationResult[]) {
  const rule = "=".repeat(60);
  console.error();
  console.error(pc.bold(rule));
  console.error(pc.bold("VERIFICATION SUMMARY"));
  console.error(pc.bold(rule));
  for (const line of statusCountLines(results)) {
    console.error(line);
  }
  console.error(pc.bold(rule));
}
