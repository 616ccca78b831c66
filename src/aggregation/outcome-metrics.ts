import { bucketFileSize, SIZE_BUCKETS } from "../classification/size-buckets.js";
import { successRate } from "../classification/outcome.js";
import type {
  BreakdownEntry,
  EnrichedCheck,
  FilesizeBreakdown,
  FiletypeBreakdown,
  NonActiveAgreementMetrics,
  OutcomeMetrics,
  UniqueItemMetrics,
} from "./aggregation.types.js";
import { groupBy } from "./counter.js";

export function computeOutcomeMetrics(checks: readonly EnrichedCheck[]): OutcomeMetrics {
  const successCount = checks.filter((check) => check.outcome === "success").length;
  const failureCount = checks.length - successCount;
  return { successCount, failureCount, successRate: successRate(successCount, failureCount) };
}

export const countUnique = (checks: readonly EnrichedCheck[]): number =>
  new Set(checks.map((check) => check.itemId)).size;

/**
 * Classifies each unique item by its active-agreement checks. A unit with
 * mixed outcomes counts only toward `withAnyProviderSuccess`.
 */
export function computeUniqueMetrics(checks: readonly EnrichedCheck[]): UniqueItemMetrics {
  const metrics: UniqueItemMetrics = { withAnyProviderSuccess: 0, allProvidersSuccess: 0, allProvidersFailed: 0 };
  for (const itemChecks of groupBy(checks, (check) => check.itemId).values()) {
    const successes = itemChecks.filter((check) => check.outcome === "success").length;
    if (successes > 0) {
      metrics.withAnyProviderSuccess++;
    }
    if (successes === itemChecks.length) {
      metrics.allProvidersSuccess++;
    }
    if (successes === 0) {
      metrics.allProvidersFailed++;
    }
  }
  return metrics;
}

const breakdownEntry = (checks: readonly EnrichedCheck[]): BreakdownEntry => ({
  totalFilesInActiveAgreements: checks.length,
  ...computeOutcomeMetrics(checks),
});

export function computeFiletypeBreakdown(checks: readonly EnrichedCheck[]): FiletypeBreakdown {
  const groups = groupBy(checks, (check) => check.fileType);
  const breakdown: FiletypeBreakdown = {};
  for (const fileType of [...groups.keys()].sort()) {
    breakdown[fileType] = breakdownEntry(groups.get(fileType) ?? []);
  }
  return breakdown;
}

/**
 * Every standard bucket is present, empty ones with a `null` rate; `unknown`
 * only when some check has no usable size.
 */
export function computeFilesizeBreakdown(checks: readonly EnrichedCheck[]): FilesizeBreakdown {
  const groups = groupBy(checks, (check) => bucketFileSize(check.fileSize));
  const breakdown: FilesizeBreakdown = {};
  for (const { name } of SIZE_BUCKETS) {
    breakdown[name] = breakdownEntry(groups.get(name) ?? []);
  }
  const unknown = groups.get("unknown");
  if (unknown) {
    breakdown.unknown = breakdownEntry(unknown);
  }
  return breakdown;
}

export function computeNonActiveMetrics(
  pieceChecks: readonly EnrichedCheck[],
  cidChecks: readonly EnrichedCheck[],
): NonActiveAgreementMetrics {
  return {
    uniquePiecesNotInActiveAgreements: new Set(pieceChecks.map((check) => check.pieceCid)).size,
    uniqueCidsNotInActiveAgreements: countUnique(cidChecks),
    pieceChecksNotInActiveAgreements: pieceChecks.length,
    cidChecksNotInActiveAgreements: cidChecks.length,
  };
}
