import type { VerificationResult } from "@bibverify/refcheck";

export function renderJson(results: readonly VerificationResult[]): string {
  return JSON.stringify(results, null, 2);
}
