import type { ErrorCategory } from "../classification/error-categories.js";
import type { Outcome } from "../classification/outcome.js";
import type { SizeBucketOrUnknown } from "../classification/size-buckets.js";
import type { RetrievalType } from "../common/types.js";

/**
 * A probe result joined with catalog attributes. `active` comes from the
 * agreement set, never from the result itself.
 */
export interface EnrichedCheck {
  retrievalType: RetrievalType;
  itemId: string;
  pieceCid: string;
  preparationId: string;
  providerId: string;
  providerName: string;
  status: string;
  statusCode: number | null;
  errorMessage: string | null;
  responseBody: string | null;
  fileName: string | null;
  fileType: string;
  fileSize: number | null;
  outcome: Outcome;
  active: boolean;
}

export interface SplitChecks {
  pieceActive: EnrichedCheck[];
  pieceNonActive: EnrichedCheck[];
  cidActive: EnrichedCheck[];
  cidNonActive: EnrichedCheck[];
}

export interface OutcomeMetrics {
  successCount: number;
  failureCount: number;
  /** `null` when nothing was checked. */
  successRate: number | null;
}

export interface UniqueItemMetrics {
  withAnyProviderSuccess: number;
  allProvidersSuccess: number;
  allProvidersFailed: number;
}

export type BreakdownEntry = OutcomeMetrics & { totalFilesInActiveAgreements: number };

export type FiletypeBreakdown = Record<string, BreakdownEntry>;

export type FilesizeBreakdown = Partial<Record<SizeBucketOrUnknown, BreakdownEntry>>;

export interface NonActiveAgreementMetrics {
  uniquePiecesNotInActiveAgreements: number;
  uniqueCidsNotInActiveAgreements: number;
  pieceChecksNotInActiveAgreements: number;
  cidChecksNotInActiveAgreements: number;
}

export type UnitMetrics = OutcomeMetrics & {
  unitsInActiveAgreements: number;
  retrievalChecks: number;
};

export type PreparationUnitMetrics = UnitMetrics & {
  uniqueWithAnyProviderSuccess: number;
  uniqueAllProvidersSuccess: number;
  uniqueAllProvidersFailed: number;
};

export type ProviderUnitMetrics = UnitMetrics & {
  uniqueWithSuccess: number;
  uniqueAllChecksFailed: number;
};

export interface OverallMetrics {
  counts: {
    uniquePiecesInActiveAgreements: number;
    uniqueCidsInActiveAgreements: number;
    pieceRetrievalChecks: number;
    cidRetrievalChecks: number;
  };
  pieceOutcomes: OutcomeMetrics;
  cidOutcomes: OutcomeMetrics;
  uniqueMetrics: {
    pieces: UniqueItemMetrics;
    cids: UniqueItemMetrics;
  };
  byFiletype: FiletypeBreakdown;
  byFilesizeBucket: FilesizeBreakdown;
  nonActiveAgreements: NonActiveAgreementMetrics;
}

export interface PreparationMetrics {
  pieceMetrics: PreparationUnitMetrics;
  cidMetrics: PreparationUnitMetrics;
  byFiletype: FiletypeBreakdown;
  byFilesizeBucket: FilesizeBreakdown;
  nonActiveAgreements: NonActiveAgreementMetrics;
}

export interface ProviderMetrics {
  providerId: string;
  /** Most frequent name recorded for the provider. */
  providerName: string;
  pieceMetrics: ProviderUnitMetrics;
  cidMetrics: ProviderUnitMetrics;
  byFiletype: FiletypeBreakdown;
  byFilesizeBucket: FilesizeBreakdown;
  nonActiveAgreements: NonActiveAgreementMetrics;
}

export interface RetrievabilityCounts {
  retrievableByAnyProvider: number;
  retrievableByAllProviders: number;
  notRetrievableByAnyProvider: number;
  notInAnyActiveAgreements: number;
}

export interface ProviderRetrievability {
  providerName: string;
  retrievable: number;
  notRetrievable: number;
  notInAgreements: number;
}

export type ProviderRetrievabilityMap = Record<string, ProviderRetrievability>;

export type PreparedCidMetrics = RetrievabilityCounts & {
  totalFiles: number;
  uniqueCids: number;
  byProvider: ProviderRetrievabilityMap;
};

export type PreparedPieceMetrics = RetrievabilityCounts & {
  totalPieces: number;
  uniquePieceCids: number;
  byProvider: ProviderRetrievabilityMap;
};

export interface PreparedDimensionEntry {
  uniqueCids: number;
  byProvider: ProviderRetrievabilityMap;
}

export interface PreparedPreparationMetrics {
  cidMetrics: PreparedCidMetrics & { sourceFile: string };
  pieceMetrics: PreparedPieceMetrics & { sourceFile: string };
  byFiletype: Record<string, PreparedDimensionEntry>;
  byFilesizeBucket: Partial<Record<SizeBucketOrUnknown, PreparedDimensionEntry>>;
}

export interface PreparedContentMetrics {
  overall: {
    cidMetrics: PreparedCidMetrics;
    pieceMetrics: PreparedPieceMetrics;
  };
  byPreparation: Record<string, PreparedPreparationMetrics>;
  /** Provider id to display name. */
  providers: Record<string, string>;
}

export type CategoryCounts = Partial<Record<ErrorCategory, number>>;

export interface ErrorPattern {
  pattern: string;
  count: number;
  percentage: number;
}

export interface FailureCharacteristics {
  byPreparation: Record<string, number>;
  byFiletype: Record<string, number>;
  byFilesizeBucket: Partial<Record<SizeBucketOrUnknown, number>>;
}

export interface CategoryCombination {
  /** Provider display name to category, providers in id order. */
  categories: Record<string, ErrorCategory>;
  count: number;
  percentage: number;
}

export interface CrossProviderAnalysis {
  unitsWithMultipleProvidersAndErrors: number;
  allProvidersFail: number;
  someProvidersFail: number;
  allFailCharacteristics?: FailureCharacteristics & { topCategoryCombinations: CategoryCombination[] };
  someFailCharacteristics?: FailureCharacteristics;
}

export interface ErrorAnalysisSection {
  overview: {
    totalErrors: number;
    unitsWithAnyError: number;
    unitsAllProvidersFailed: number;
    /** Null when there are no active-agreement units. */
    percentageOfActiveAgreementUnits: number | null;
  };
  byProvider: Record<
    string,
    {
      providerName: string;
      totalErrors: number;
      categories: CategoryCounts;
      topPatterns: ErrorPattern[];
    }
  >;
  byPreparation: Record<string, { totalErrors: number; categories: CategoryCounts }>;
  crossProviderAnalysis: CrossProviderAnalysis;
  fileCharacteristicsByCategory: Record<
    string,
    {
      totalErrors: number;
      byFiletype: Record<string, number>;
      byFilesizeBucket: Partial<Record<SizeBucketOrUnknown, number>>;
    }
  >;
}

export interface ErrorAnalysis {
  scope: "active_agreements_only";
  /** HTTP codes the analysis is restricted to; empty means every failed check. */
  statusCodes: number[];
  pieces: ErrorAnalysisSection;
  cids: ErrorAnalysisSection;
}

export interface AggregatedMetrics {
  overall: OverallMetrics;
  byPreparation: Record<string, PreparationMetrics>;
  byProvider: Record<string, ProviderMetrics>;
  preparedContentOverall: PreparedContentMetrics;
  errorAnalysis: ErrorAnalysis;
}
