import { comparePreparationIds } from "../content-units/content-catalog.js";
import type {
  EnrichedCheck,
  OverallMetrics,
  PreparationMetrics,
  PreparationUnitMetrics,
  ProviderMetrics,
  ProviderUnitMetrics,
  SplitChecks,
  UnitMetrics,
} from "./aggregation.types.js";
import { Counter, groupBy } from "./counter.js";
import {
  computeFilesizeBreakdown,
  computeFiletypeBreakdown,
  computeNonActiveMetrics,
  computeOutcomeMetrics,
  computeUniqueMetrics,
  countUnique,
} from "./outcome-metrics.js";

const EMPTY: readonly EnrichedCheck[] = [];

const unitMetrics = (checks: readonly EnrichedCheck[]): UnitMetrics => ({
  unitsInActiveAgreements: countUnique(checks),
  retrievalChecks: checks.length,
  ...computeOutcomeMetrics(checks),
});

function preparationUnitMetrics(checks: readonly EnrichedCheck[]): PreparationUnitMetrics {
  const unique = computeUniqueMetrics(checks);
  return {
    ...unitMetrics(checks),
    uniqueWithAnyProviderSuccess: unique.withAnyProviderSuccess,
    uniqueAllProvidersSuccess: unique.allProvidersSuccess,
    uniqueAllProvidersFailed: unique.allProvidersFailed,
  };
}

/** Checks of one provider only, so "all providers" reads as "all checks". */
function providerUnitMetrics(checks: readonly EnrichedCheck[]): ProviderUnitMetrics {
  const unique = computeUniqueMetrics(checks);
  return {
    ...unitMetrics(checks),
    uniqueWithSuccess: unique.withAnyProviderSuccess,
    uniqueAllChecksFailed: unique.allProvidersFailed,
  };
}

interface GroupedChecks {
  pieceActive: Map<string, EnrichedCheck[]>;
  pieceNonActive: Map<string, EnrichedCheck[]>;
  cidActive: Map<string, EnrichedCheck[]>;
  cidNonActive: Map<string, EnrichedCheck[]>;
  keys: Set<string>;
}

function groupChecks(split: SplitChecks, keyOf: (check: EnrichedCheck) => string): GroupedChecks {
  const grouped = {
    pieceActive: groupBy(split.pieceActive, keyOf),
    pieceNonActive: groupBy(split.pieceNonActive, keyOf),
    cidActive: groupBy(split.cidActive, keyOf),
    cidNonActive: groupBy(split.cidNonActive, keyOf),
  };
  const keys = new Set([
    ...grouped.pieceActive.keys(),
    ...grouped.pieceNonActive.keys(),
    ...grouped.cidActive.keys(),
    ...grouped.cidNonActive.keys(),
  ]);
  return { ...grouped, keys };
}

export function computePreparationMetrics(split: SplitChecks): Record<string, PreparationMetrics> {
  const grouped = groupChecks(split, (check) => check.preparationId);
  const result: Record<string, PreparationMetrics> = {};

  for (const preparationId of [...grouped.keys].sort(comparePreparationIds)) {
    const cidChecks = grouped.cidActive.get(preparationId) ?? EMPTY;
    result[preparationId] = {
      pieceMetrics: preparationUnitMetrics(grouped.pieceActive.get(preparationId) ?? EMPTY),
      cidMetrics: preparationUnitMetrics(cidChecks),
      byFiletype: computeFiletypeBreakdown(cidChecks),
      byFilesizeBucket: computeFilesizeBreakdown(cidChecks),
      nonActiveAgreements: computeNonActiveMetrics(
        grouped.pieceNonActive.get(preparationId) ?? EMPTY,
        grouped.cidNonActive.get(preparationId) ?? EMPTY,
      ),
    };
  }
  return result;
}

export function computeProviderMetrics(split: SplitChecks): Record<string, ProviderMetrics> {
  const grouped = groupChecks(split, (check) => check.providerId);
  const names = new Map<string, Counter>();
  for (const check of [...split.pieceActive, ...split.cidActive]) {
    if (!check.providerName) {
      continue;
    }
    const counter = names.get(check.providerId) ?? new Counter();
    counter.increment(check.providerName);
    names.set(check.providerId, counter);
  }

  const result: Record<string, ProviderMetrics> = {};
  for (const providerId of [...grouped.keys].sort()) {
    const cidChecks = grouped.cidActive.get(providerId) ?? EMPTY;
    const [mostCommonName] = names.get(providerId)?.mostCommon(1) ?? [];
    result[providerId] = {
      providerId,
      providerName: mostCommonName?.[0] ?? "",
      pieceMetrics: providerUnitMetrics(grouped.pieceActive.get(providerId) ?? EMPTY),
      cidMetrics: providerUnitMetrics(cidChecks),
      byFiletype: computeFiletypeBreakdown(cidChecks),
      byFilesizeBucket: computeFilesizeBreakdown(cidChecks),
      nonActiveAgreements: computeNonActiveMetrics(
        grouped.pieceNonActive.get(providerId) ?? EMPTY,
        grouped.cidNonActive.get(providerId) ?? EMPTY,
      ),
    };
  }
  return result;
}

export function computeOverallMetrics(split: SplitChecks): OverallMetrics {
  return {
    counts: {
      uniquePiecesInActiveAgreements: countUnique(split.pieceActive),
      uniqueCidsInActiveAgreements: countUnique(split.cidActive),
      pieceRetrievalChecks: split.pieceActive.length,
      cidRetrievalChecks: split.cidActive.length,
    },
    pieceOutcomes: computeOutcomeMetrics(split.pieceActive),
    cidOutcomes: computeOutcomeMetrics(split.cidActive),
    uniqueMetrics: {
      pieces: computeUniqueMetrics(split.pieceActive),
      cids: computeUniqueMetrics(split.cidActive),
    },
    byFiletype: computeFiletypeBreakdown(split.cidActive),
    byFilesizeBucket: computeFilesizeBreakdown(split.cidActive),
    nonActiveAgreements: computeNonActiveMetrics(split.pieceNonActive, split.cidNonActive),
  };
}
