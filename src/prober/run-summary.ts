import { isSuccess, successRate } from "../classification/outcome.js";
import { NO_ACTIVE_AGREEMENT_STATUS_CODE, type ProbeResult, type ProbeStatus, RetrievalType } from "../common/types.js";

export type StatusCounts = Partial<Record<ProbeStatus, number>>;

export interface AvailabilityRate {
  withAgreementsTotal: number;
  available: number;
  /** Percentage of successful checks, two decimals; null when nothing was probed. */
  ratePercent: number | null;
}

export interface RunSummary {
  totalChecks: number;
  timestamp: string;
  aborted: boolean;
  byTypeStatus: Record<string, StatusCounts>;
  byProviderStatus: Record<string, StatusCounts>;
  /** Over real requests only; null when none was made. */
  responseTimes: {
    averageMs: number | null;
    medianMs: number | null;
  };
  availabilityRates: {
    pieces: AvailabilityRate;
    cids: AvailabilityRate;
  };
  noActiveAgreementCounts: {
    pieces: number;
    cids: number;
  };
}

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const isSkipped = (result: ProbeResult): boolean => result.statusCode === NO_ACTIVE_AGREEMENT_STATUS_CODE;

function countStatuses(results: readonly ProbeResult[], keyOf: (result: ProbeResult) => string): Record<string, StatusCounts> {
  const counts: Record<string, StatusCounts> = {};
  for (const result of results) {
    const key = keyOf(result);
    const bucket = counts[key] ?? {};
    bucket[result.status] = (bucket[result.status] ?? 0) + 1;
    counts[key] = bucket;
  }
  return counts;
}

function availabilityRate(results: readonly ProbeResult[]): AvailabilityRate {
  const withAgreements = results.filter((result) => !isSkipped(result));
  const available = withAgreements.filter((result) => isSuccess(result.status, result.statusCode)).length;
  const rate = successRate(available, withAgreements.length - available);
  return {
    withAgreementsTotal: withAgreements.length,
    available,
    ratePercent: rate === null ? null : round(rate * 100, 2),
  };
}

function median(values: number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

/**
 * Status counts, response times and availability rates over all recorded
 * results of a probe run.
 */
export function buildRunSummary(results: readonly ProbeResult[], aborted: boolean, now: Date = new Date()): RunSummary {
  const pieces = results.filter((result) => result.retrievalType === RetrievalType.PIECE);
  const cids = results.filter((result) => result.retrievalType === RetrievalType.CID);
  const responseTimes = results.filter((result) => result.responseTimeMs > 0).map((result) => result.responseTimeMs);

  return {
    totalChecks: results.length,
    timestamp: now.toISOString(),
    aborted,
    byTypeStatus: countStatuses(results, (result) => result.retrievalType),
    byProviderStatus: countStatuses(results, (result) => result.providerId),
    responseTimes: {
      averageMs:
        responseTimes.length > 0
          ? round(responseTimes.reduce((sum, value) => sum + value, 0) / responseTimes.length, 2)
          : null,
      medianMs: median(responseTimes),
    },
    availabilityRates: {
      pieces: availabilityRate(pieces),
      cids: availabilityRate(cids),
    },
    noActiveAgreementCounts: {
      pieces: pieces.filter(isSkipped).length,
      cids: cids.filter(isSkipped).length,
    },
  };
}
