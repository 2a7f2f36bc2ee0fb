import pc from "picocolors";

interface ErrorWithSuggestion {
  message: string;
  suggestion?: string;
}

/**
 * Common error patterns and their suggestions
 */
const ERROR_PATTERNS: Array<{
  pattern: RegExp;
  suggestion: (match: RegExpMatchArray) => string;
}> = [
  {
    pattern: /BibTeX file not found: (.+)/i,
    suggestion: (match) =>
      `Check the path passed to --bib (default: references.bib).\nLooked for: ${match[1]}`,
  },
  {
    pattern: /Citation key not found: (\S+)(?:.*Available keys: (.+))?/i,
    suggestion: (match) =>
      match[2]
        ? `Keys are case-sensitive. Some keys in this file:\n  ${match[2].split(", ").join("\n  ")}`
        : "Keys are case-sensitive. Run 'bibverify list' to see every key.",
  },
  {
    pattern: /Invalid range.*File has (\d+) entries/i,
    suggestion: (match) =>
      `--start and --end are 1-based and inclusive; use values between 1 and ${match[1]}.\nRun 'bibverify list' to see entry numbers.`,
  },
  {
    pattern: /Must specify either --key or both --start and --end/i,
    suggestion: () =>
      "Examples:\n  bibverify verify --start 1 --end 10\n  bibverify verify --key smith2023paper",
  },
  {
    pattern: /Unknown report format (.+)/i,
    suggestion: () => "Supported formats: text, json, markdown (or md).",
  },
  {
    pattern: /Invalid YAML/i,
    suggestion: () =>
      "Common YAML issues:\n  • Check indentation (use spaces, not tabs)\n  • Ensure colons have spaces after them\n  • Quote strings with special characters",
  },
  {
    pattern: /Invalid settings/i,
    suggestion: () =>
      "Check bibverify.config.yaml and the BIBVERIFY_* environment variables.\nExample:\n  minIntervalMs: 500\n  timeoutMs: 10000\n  mailto: you@example.org",
  },
  {
    pattern: /EACCES|EPERM/,
    suggestion: () => "Check that you have permission to read the input and write the output path.",
  },
];

/**
 * Format an error with a helpful suggestion
 */
export function formatError(error: Error | string): ErrorWithSuggestion {
  const message = error instanceof Error ? error.message : error;

  for (const { pattern, suggestion } of ERROR_PATTERNS) {
    const match = message.match(pattern);
    if (match) {
      return {
        message,
        suggestion: suggestion(match),
      };
    }
  }

  return { message };
}

/**
 * Print a formatted error to the console
 */
export function printError(error: Error | string): void {
  const formatted = formatError(error);

  console.error();
  console.error(pc.red(pc.bold("Error:")), formatted.message);

  if (formatted.suggestion) {
    console.error();
    console.error(pc.dim("Try this:"));
    for (const line of formatted.suggestion.split("\n")) {
      console.error(pc.dim(`  ${line}`));
    }
  }

  console.error();
}
