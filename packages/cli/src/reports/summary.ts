import type { OverallStatus, VerificationResult } from "@bibverify/refcheck";

export interface ReportContext {
  generatedAt: Date;
  /** BibTeX file the results came from */
  bibPath?: string;
  version?: string;
}

/** Most severe first */
export const STATUS_ORDER: readonly OverallStatus[] = [
  "FABRICATED",
  "IDENTIFIER_INVALID",
  "SUSPICIOUS",
  "WARNING",
  "VERIFIED",
];

export function countStatuses(results: readonly VerificationResult[]): Map<OverallStatus, number> {
  const counts = new Map<OverallStatus, number>();
  for (const result of results) {
    const status = result.verification.overallStatus;
    counts.set(status, (counts.get(status) ?? 0) + 1);
  }
  return counts;
}

export function resultsWithStatus(
  results: readonly VerificationResult[],
  status: OverallStatus
): VerificationResult[] {
  return results.filter((result) => result.verification.overallStatus === status);
}

export function percentage(count: number, total: number): string {
  return total ? ((count / total) * 100).toFixed(1) : "0.0";
}

/**
 * One line per status, sorted by name: `  VERIFIED          :   3 ( 75.0%)`
 */
export function statusCountLines(results: readonly VerificationResult[]): string[] {
  return [...countStatuses(results)]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([status, count]) => {
      const share = percentage(count, results.length).padStart(5);
      return `  ${status.padEnd(18)}: ${String(count).padStart(3)} (${share}%)`;
    });
}

/**
 * Local time as YYYY-MM-DD HH:MM:SS
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}
