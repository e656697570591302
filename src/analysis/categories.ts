/**
 * Changed-file classification and the risk hint derived from it.
 */

import { FILE_CATEGORIES, FileCategory } from "../config/schema";
import { CategoryCounts, RiskHint } from "./types";

export interface FileClassifier {
  categorize(filePath: string): FileCategory[];
}

export function emptyCategoryCounts(): CategoryCounts {
  return { auth: 0, security: 0, security_tests: 0, dependencies: 0, infrastructure: 0 };
}

/**
 * Count changed files per category. A file may land in several categories.
 */
export function countCategories(files: readonly string[], classifier: FileClassifier): CategoryCounts {
  const counts = emptyCategoryCounts();
  for (const file of files) {
    for (const category of classifier.categorize(file)) {
      counts[category]++;
    }
  }
  return counts;
}

/**
 * Risk thresholds for a change set:
 * - HIGH: more than 5 auth/security files, or any dependency manifest
 * - MEDIUM: more than 2 auth/security files, or any infrastructure file
 * - LOW: at least one auth/security file
 * - MINIMAL: otherwise
 */
export function deriveRiskHint(counts: CategoryCounts): RiskHint {
  const securityChanges = counts.auth + counts.security;
  if (securityChanges > 5 || counts.dependencies > 0) return "HIGH";
  if (securityChanges > 2 || counts.infrastructure > 0) return "MEDIUM";
  if (securityChanges > 0) return "LOW";
  return "MINIMAL";
}

/**
 * A supplied hint wins. Without one, the hint is derived from the changed
 * files, or UNKNOWN when no changed files were supplied either.
 */
export function resolveRiskHint(
  supplied: RiskHint | undefined,
  changedFiles: readonly string[],
  counts: CategoryCounts
): RiskHint {
  if (supplied && supplied !== "UNKNOWN") return supplied;
  if (changedFiles.length === 0) return "UNKNOWN";
  return deriveRiskHint(counts);
}

export function describeCategories(counts: CategoryCounts): string {
  return FILE_CATEGORIES.map((category) => `${category}=${counts[category]}`).join(", ");
}
