/**
 * Recommendation phrases shared by the template analyzer and the aggregator.
 * Both emit the same text for the same count so de-duplication collapses them.
 */

function plural(count: number, singular: string, pluralForm: string): string {
  return count === 1 ? singular : pluralForm;
}

export function criticalRecommendation(count: number): string {
  return `${count} critical ${plural(count, "vulnerability", "vulnerabilities")} found - address before merge`;
}

export function highRecommendation(count: number): string {
  return `${count} high-severity ${plural(count, "vulnerability", "vulnerabilities")} found - review and patch before merge`;
}

export function secretRecommendation(count: number): string {
  return `${count} potential ${plural(count, "secret", "secrets")} detected - remove and rotate the exposed credentials`;
}

export function scannerErrorRecommendation(labels: readonly string[]): string {
  return `Scanner output could not be processed for ${labels.join(", ")} - check the scan jobs`;
}

export const NO_ISSUES_RECOMMENDATION =
  "No significant security issues detected - continue following secure development practices";

export const AI_FAILED_RECOMMENDATION =
  "AI security analysis failed - manual security review recommended";

export const EMERGENCY_RECOMMENDATION = "Security analysis system failed - manual review required";
