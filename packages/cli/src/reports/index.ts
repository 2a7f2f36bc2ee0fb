import type { VerificationResult } from "@bibverify/refcheck";
import { renderJson } from "./json.js";
import { renderMarkdown } from "./markdown.js";
import { renderText } from "./text.js";
import type { ReportContext } from "./summary.js";

export type ReportFormat = "text" | "json" | "markdown";

export { STATUS_ORDER, countStatuses, statusCountLines, formatTimestamp, type ReportContext } from "./summary.js";

const RENDERERS: Record<ReportFormat, (results: readonly VerificationResult[], context: ReportContext) => string> = {
  text: renderText,
  json: renderJson,
  markdown: renderMarkdown,
};

const FORMAT_ALIASES = new Map<string, ReportFormat>([
  ["text", "text"],
  ["json", "json"],
  ["markdown", "markdown"],
  ["md", "markdown"],
]);

export function parseReportFormat(value: string): ReportFormat {
  const format = FORMAT_ALIASES.get(value.toLowerCase());
  if (!format) {
    throw new Error(`Unknown report format ${value}`);
  }
  return format;
}

export function renderReport(
  results: readonly VerificationResult[],
  format: ReportFormat,
  context: ReportContext
): string {
  return RENDERERS[format](results, context);
}
