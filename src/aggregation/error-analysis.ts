import {
  categorizeError,
  type ErrorCategory,
  failureText,
  normalizeErrorPattern,
} from "../classification/error-categories.js";
import { extractFileType, UNKNOWN_FILE_TYPE } from "../classification/file-types.js";
import { bucketFileSize, SIZE_BUCKET_ORDER, type SizeBucketOrUnknown } from "../classification/size-buckets.js";
import { comparePreparationIds } from "../content-units/content-catalog.js";
import type {
  CategoryCombination,
  CrossProviderAnalysis,
  EnrichedCheck,
  ErrorAnalysis,
  ErrorAnalysisSection,
  ErrorPattern,
  FailureCharacteristics,
} from "./aggregation.types.js";
import { Counter, groupBy, toRecord } from "./counter.js";

const TOP_PATTERNS = 5;
const TOP_COMBINATIONS = 5;
const TOP_FILE_TYPES = 10;
const MAX_PATTERN_LENGTH = 200;
const MAX_EXTENSION_LENGTH = 10;

interface UnitFailure {
  preparationId: string;
  fileType: string;
  fileSize: number | null;
  /** Category per failing provider; providers that did not fail are absent. */
  categories: Map<string, ErrorCategory>;
  providers: string[];
}

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const truncatePattern = (pattern: string): string =>
  pattern.length > MAX_PATTERN_LENGTH ? `${pattern.slice(0, MAX_PATTERN_LENGTH)}...` : pattern;

const sortPreparations = <V>(entries: Iterable<[string, V]>): Record<string, V> => {
  const sorted = [...entries].sort(([left], [right]) => comparePreparationIds(left, right));
  const record: Record<string, V> = {};
  for (const [key, value] of sorted) {
    record[key] = value;
  }
  return record;
};

const sortSizeBuckets = (counts: Counter<SizeBucketOrUnknown>): Partial<Record<SizeBucketOrUnknown, number>> =>
  toRecord(
    SIZE_BUCKET_ORDER.filter((bucket) => counts.get(bucket) > 0).map((bucket): [SizeBucketOrUnknown, number] => [
      bucket,
      counts.get(bucket),
    ]),
  );

const fileTypeOf = (check: EnrichedCheck): string =>
  check.fileType !== UNKNOWN_FILE_TYPE
    ? check.fileType
    : extractFileType(check.fileName, { maxExtensionLength: MAX_EXTENSION_LENGTH });

function characteristics(units: readonly UnitFailure[]): FailureCharacteristics {
  const byPreparation = new Counter();
  const byFiletype = new Counter();
  const byFilesize = new Counter<SizeBucketOrUnknown>();
  for (const unit of units) {
    byPreparation.increment(unit.preparationId);
    byFiletype.increment(unit.fileType);
    byFilesize.increment(bucketFileSize(unit.fileSize));
  }
  return {
    byPreparation: sortPreparations(byPreparation.entries()),
    byFiletype: Object.fromEntries(byFiletype.mostCommon()),
    byFilesizeBucket: sortSizeBuckets(byFilesize),
  };
}

function topCategoryCombinations(
  units: readonly UnitFailure[],
  providerNames: ReadonlyMap<string, string>,
): CategoryCombination[] {
  const combinations = new Counter();
  const samples = new Map<string, Record<string, ErrorCategory>>();
  for (const unit of units) {
    const ordered = [...unit.providers].sort();
    const key = JSON.stringify(ordered.map((provider) => [provider, unit.categories.get(provider)]));
    combinations.increment(key);
    if (!samples.has(key)) {
      const categories: Record<string, ErrorCategory> = {};
      for (const provider of ordered) {
        const category = unit.categories.get(provider);
        if (category) {
          categories[providerNames.get(provider) || provider] = category;
        }
      }
      samples.set(key, categories);
    }
  }
  return combinations.mostCommon(TOP_COMBINATIONS).map(([key, count]) => ({
    categories: samples.get(key) ?? {},
    count,
    percentage: round((count / units.length) * 100, 1),
  }));
}

function crossProviderAnalysis(
  allFail: readonly UnitFailure[],
  someFail: readonly UnitFailure[],
  providerNames: ReadonlyMap<string, string>,
): CrossProviderAnalysis {
  const analysis: CrossProviderAnalysis = {
    unitsWithMultipleProvidersAndErrors: allFail.length + someFail.length,
    allProvidersFail: allFail.length,
    someProvidersFail: someFail.length,
  };
  if (allFail.length > 0) {
    analysis.allFailCharacteristics = {
      topCategoryCombinations: topCategoryCombinations(allFail, providerNames),
      ...characteristics(allFail),
    };
  }
  if (someFail.length > 0) {
    analysis.someFailCharacteristics = characteristics(someFail);
  }
  return analysis;
}

/**
 * Error analysis over active-agreement checks of one retrieval type. A check
 * counts as an error when it failed and, if `statusCodes` is non-empty, its
 * status code is listed.
 */
export function computeErrorAnalysisSection(
  activeChecks: readonly EnrichedCheck[],
  providerNames: ReadonlyMap<string, string>,
  statusCodes: readonly number[],
): ErrorAnalysisSection {
  const codes = new Set(statusCodes);
  const isError = (check: EnrichedCheck): boolean =>
    check.outcome === "failure" && (codes.size === 0 || (check.statusCode !== null && codes.has(check.statusCode)));

  let totalErrors = 0;
  let unitsWithAnyError = 0;
  let unitsAllProvidersFailed = 0;
  const providerErrors = new Counter();
  const categoriesByProvider = new Map<string, Counter<ErrorCategory>>();
  const patternsByProvider = new Map<string, Counter>();
  const categoriesByPreparation = new Map<string, Counter<ErrorCategory>>();
  const fileTypesByCategory = new Map<ErrorCategory, Counter>();
  const sizesByCategory = new Map<ErrorCategory, Counter<SizeBucketOrUnknown>>();
  const allFail: UnitFailure[] = [];
  const someFail: UnitFailure[] = [];

  const units = groupBy(activeChecks, (check) => check.itemId);
  for (const checks of units.values()) {
    // One check per provider; a later duplicate replaces an earlier one.
    const byProvider = new Map(checks.map((check): [string, EnrichedCheck] => [check.providerId, check]));
    const [first] = checks;
    const unit: UnitFailure = {
      preparationId: first.preparationId,
      fileType: fileTypeOf(first),
      fileSize: first.fileSize,
      categories: new Map(),
      providers: [...byProvider.keys()],
    };

    for (const [providerId, check] of byProvider) {
      if (!isError(check)) {
        continue;
      }
      totalErrors++;
      const category = categorizeError(failureText(check.responseBody, check.errorMessage));
      const pattern = normalizeErrorPattern(check.responseBody || check.errorMessage);
      unit.categories.set(providerId, category);

      providerErrors.increment(providerId);
      counterFor(categoriesByProvider, providerId).increment(category);
      counterFor(patternsByProvider, providerId).increment(pattern);
      counterFor(categoriesByPreparation, unit.preparationId).increment(category);
      counterFor(fileTypesByCategory, category).increment(unit.fileType);
      counterFor(sizesByCategory, category).increment(bucketFileSize(unit.fileSize));
    }

    if (unit.categories.size === 0) {
      continue;
    }
    unitsWithAnyError++;
    const allFailed = unit.categories.size === unit.providers.length;
    if (allFailed) {
      unitsAllProvidersFailed++;
    }
    if (unit.providers.length > 1) {
      (allFailed ? allFail : someFail).push(unit);
    }
  }

  const byProvider: ErrorAnalysisSection["byProvider"] = {};
  for (const providerId of [...categoriesByProvider.keys()].sort()) {
    const patterns = patternsByProvider.get(providerId) ?? new Counter();
    const patternTotal = patterns.total();
    const topPatterns: ErrorPattern[] = patterns.mostCommon(TOP_PATTERNS).map(([pattern, count]) => ({
      pattern: truncatePattern(pattern),
      count,
      percentage: round((count / patternTotal) * 100, 1),
    }));
    byProvider[providerId] = {
      providerName: providerNames.get(providerId) || providerId,
      totalErrors: providerErrors.get(providerId),
      categories: toRecord(categoriesByProvider.get(providerId)?.mostCommon() ?? []),
      topPatterns,
    };
  }

  const byPreparation = sortPreparations(
    [...categoriesByPreparation].map(([preparationId, categories]): [string, ErrorAnalysisSection["byPreparation"][string]] => [
      preparationId,
      { totalErrors: categories.total(), categories: toRecord(categories.mostCommon()) },
    ]),
  );

  const fileCharacteristicsByCategory: ErrorAnalysisSection["fileCharacteristicsByCategory"] = {};
  for (const category of [...fileTypesByCategory.keys()].sort()) {
    const fileTypes = fileTypesByCategory.get(category) ?? new Counter();
    fileCharacteristicsByCategory[category] = {
      totalErrors: fileTypes.total(),
      byFiletype: Object.fromEntries(fileTypes.mostCommon(TOP_FILE_TYPES)),
      byFilesizeBucket: sortSizeBuckets(sizesByCategory.get(category) ?? new Counter()),
    };
  }

  return {
    overview: {
      totalErrors,
      unitsWithAnyError,
      unitsAllProvidersFailed,
      percentageOfActiveAgreementUnits: units.size > 0 ? round((unitsWithAnyError / units.size) * 100, 2) : null,
    },
    byProvider,
    byPreparation,
    crossProviderAnalysis: crossProviderAnalysis(allFail, someFail, providerNames),
    fileCharacteristicsByCategory,
  };
}

function counterFor<K extends string, V extends string>(counters: Map<K, Counter<V>>, key: K): Counter<V> {
  let counter = counters.get(key);
  if (!counter) {
    counter = new Counter<V>();
    counters.set(key, counter);
  }
  return counter;
}

export function computeErrorAnalysis(
  pieceActive: readonly EnrichedCheck[],
  cidActive: readonly EnrichedCheck[],
  providerNames: ReadonlyMap<string, string>,
  statusCodes: readonly number[],
): ErrorAnalysis {
  return {
    scope: "active_agreements_only",
    statusCodes: [...statusCodes],
    pieces: computeErrorAnalysisSection(pieceActive, providerNames, statusCodes),
    cids: computeErrorAnalysisSection(cidActive, providerNames, statusCodes),
  };
}
