import { extractFileType } from "../classification/file-types.js";
import { bucketFileSize, SIZE_BUCKET_ORDER, SIZE_BUCKETS } from "../classification/size-buckets.js";
import { comparePreparationIds } from "../content-units/content-catalog.js";
import type { ContentCatalog } from "../content-units/content-units.types.js";
import type {
  EnrichedCheck,
  PreparedContentMetrics,
  PreparedDimensionEntry,
  PreparedPreparationMetrics,
  ProviderRetrievability,
  ProviderRetrievabilityMap,
  RetrievabilityCounts,
  SplitChecks,
} from "./aggregation.types.js";

/** Outcome per active provider for one item. */
type ItemRetrievability = Map<string, boolean>;

interface RetrievalLookups {
  cids: Map<string, ItemRetrievability>;
  pieces: Map<string, ItemRetrievability>;
  providerNames: Map<string, string>;
  providers: string[];
}

interface CidAttributes {
  fileType: string;
  fileSize: number | null;
}

type ProviderCounts = Omit<ProviderRetrievability, "providerName">;

function buildLookups(split: SplitChecks): RetrievalLookups {
  const record = (target: Map<string, ItemRetrievability>, check: EnrichedCheck): void => {
    const outcomes = target.get(check.itemId) ?? new Map<string, boolean>();
    outcomes.set(check.providerId, check.outcome === "success");
    target.set(check.itemId, outcomes);
  };

  const cids = new Map<string, ItemRetrievability>();
  const pieces = new Map<string, ItemRetrievability>();
  split.cidActive.forEach((check) => record(cids, check));
  split.pieceActive.forEach((check) => record(pieces, check));

  const providerNames = new Map<string, string>();
  const providers = new Set<string>();
  for (const check of [...split.cidActive, ...split.cidNonActive, ...split.pieceActive, ...split.pieceNonActive]) {
    providers.add(check.providerId);
    if (check.providerName && !providerNames.has(check.providerId)) {
      providerNames.set(check.providerId, check.providerName);
    }
  }

  return { cids, pieces, providerNames, providers: [...providers].sort() };
}

function computeRetrievabilityCounts(
  ids: Iterable<string>,
  retrievability: Map<string, ItemRetrievability>,
): RetrievabilityCounts {
  const counts: RetrievabilityCounts = {
    retrievableByAnyProvider: 0,
    retrievableByAllProviders: 0,
    notRetrievableByAnyProvider: 0,
    notInAnyActiveAgreements: 0,
  };

  for (const id of ids) {
    const outcomes = [...(retrievability.get(id)?.values() ?? [])];
    if (outcomes.length === 0) {
      counts.notInAnyActiveAgreements++;
      continue;
    }
    const successes = outcomes.filter(Boolean).length;
    if (successes > 0) {
      counts.retrievableByAnyProvider++;
    }
    if (successes === outcomes.length) {
      counts.retrievableByAllProviders++;
    }
    if (successes === 0) {
      counts.notRetrievableByAnyProvider++;
    }
  }
  return counts;
}

const emptyProviderCounts = (providers: readonly string[]): Map<string, ProviderCounts> =>
  new Map(
    providers.map((provider): [string, ProviderCounts] => [
      provider,
      { retrievable: 0, notRetrievable: 0, notInAgreements: 0 },
    ]),
  );

function tallyProviders(
  counts: Map<string, ProviderCounts>,
  outcomes: ItemRetrievability | undefined,
): void {
  for (const [provider, tally] of counts) {
    const outcome = outcomes?.get(provider);
    if (outcome === undefined) {
      tally.notInAgreements++;
    } else if (outcome) {
      tally.retrievable++;
    } else {
      tally.notRetrievable++;
    }
  }
}

function withNames(counts: Map<string, ProviderCounts>, lookups: RetrievalLookups): ProviderRetrievabilityMap {
  const result: ProviderRetrievabilityMap = {};
  for (const [provider, tally] of counts) {
    result[provider] = { providerName: lookups.providerNames.get(provider) ?? "", ...tally };
  }
  return result;
}

function computePerProviderCounts(
  ids: Iterable<string>,
  retrievability: Map<string, ItemRetrievability>,
  lookups: RetrievalLookups,
): ProviderRetrievabilityMap {
  const counts = emptyProviderCounts(lookups.providers);
  for (const id of ids) {
    tallyProviders(counts, retrievability.get(id));
  }
  return withNames(counts, lookups);
}

class DimensionTally {
  private readonly entries = new Map<string, { uniqueCids: number; counts: Map<string, ProviderCounts> }>();

  constructor(private readonly providers: readonly string[]) {}

  ensure(key: string): void {
    if (!this.entries.has(key)) {
      this.entries.set(key, { uniqueCids: 0, counts: emptyProviderCounts(this.providers) });
    }
  }

  add(key: string, outcomes: ItemRetrievability | undefined): void {
    this.ensure(key);
    const entry = this.entries.get(key);
    if (entry) {
      entry.uniqueCids++;
      tallyProviders(entry.counts, outcomes);
    }
  }

  toRecord(lookups: RetrievalLookups, order: readonly string[]): Record<string, PreparedDimensionEntry> {
    const result: Record<string, PreparedDimensionEntry> = {};
    for (const key of order) {
      const entry = this.entries.get(key);
      if (entry) {
        result[key] = { uniqueCids: entry.uniqueCids, byProvider: withNames(entry.counts, lookups) };
      }
    }
    return result;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}

function preparationMetrics(
  catalog: Pick<ContentCatalog, "filePreparations" | "piecePreparations">,
  preparationId: string,
  lookups: RetrievalLookups,
): PreparedPreparationMetrics {
  const filePreparation = catalog.filePreparations.get(preparationId);
  const piecePreparation = catalog.piecePreparations.get(preparationId);

  // First occurrence within the preparation sets a CID's attributes.
  const attributes = new Map<string, CidAttributes>();
  for (const file of filePreparation?.files ?? []) {
    if (file.cid && !attributes.has(file.cid)) {
      attributes.set(file.cid, { fileType: extractFileType(file.fileName), fileSize: file.size });
    }
  }
  const uniqueCids = [...attributes.keys()];
  const uniquePieceCids = new Set((piecePreparation?.pieces ?? []).map((piece) => piece.pieceCid).filter(Boolean));

  const byFiletype = new DimensionTally(lookups.providers);
  const byFilesize = new DimensionTally(lookups.providers);
  SIZE_BUCKETS.forEach(({ name }) => byFilesize.ensure(name));
  for (const [cid, { fileType, fileSize }] of attributes) {
    const outcomes = lookups.cids.get(cid);
    byFiletype.add(fileType, outcomes);
    byFilesize.add(bucketFileSize(fileSize), outcomes);
  }

  return {
    cidMetrics: {
      sourceFile: filePreparation?.sourceFile ?? "",
      totalFiles: filePreparation?.files.length ?? 0,
      uniqueCids: uniqueCids.length,
      ...computeRetrievabilityCounts(uniqueCids, lookups.cids),
      byProvider: computePerProviderCounts(uniqueCids, lookups.cids, lookups),
    },
    pieceMetrics: {
      sourceFile: piecePreparation?.sourceFile ?? "",
      totalPieces: piecePreparation?.pieces.length ?? 0,
      uniquePieceCids: uniquePieceCids.size,
      ...computeRetrievabilityCounts(uniquePieceCids, lookups.pieces),
      byProvider: computePerProviderCounts(uniquePieceCids, lookups.pieces, lookups),
    },
    byFiletype: byFiletype.toRecord(lookups, byFiletype.keys().sort()),
    byFilesizeBucket: byFilesize.toRecord(lookups, SIZE_BUCKET_ORDER),
  };
}

/**
 * Coverage of everything the metadata lists, whether or not it has an active
 * agreement. Pieces come from piece metadata, CIDs from file metadata.
 */
export function computePreparedContentMetrics(
  catalog: Pick<ContentCatalog, "filePreparations" | "piecePreparations">,
  split: SplitChecks,
): PreparedContentMetrics {
  const lookups = buildLookups(split);

  let totalFiles = 0;
  const uniqueCids = new Set<string>();
  for (const preparation of catalog.filePreparations.values()) {
    totalFiles += preparation.files.length;
    for (const file of preparation.files) {
      if (file.cid) {
        uniqueCids.add(file.cid);
      }
    }
  }

  let totalPieces = 0;
  const uniquePieceCids = new Set<string>();
  for (const preparation of catalog.piecePreparations.values()) {
    totalPieces += preparation.pieces.length;
    for (const piece of preparation.pieces) {
      if (piece.pieceCid) {
        uniquePieceCids.add(piece.pieceCid);
      }
    }
  }

  const preparationIds = new Set([...catalog.filePreparations.keys(), ...catalog.piecePreparations.keys()]);
  const byPreparation: Record<string, PreparedPreparationMetrics> = {};
  for (const preparationId of [...preparationIds].sort(comparePreparationIds)) {
    byPreparation[preparationId] = preparationMetrics(catalog, preparationId, lookups);
  }

  const providers: Record<string, string> = {};
  for (const provider of lookups.providers) {
    providers[provider] = lookups.providerNames.get(provider) ?? "";
  }

  return {
    overall: {
      cidMetrics: {
        totalFiles,
        uniqueCids: uniqueCids.size,
        ...computeRetrievabilityCounts(uniqueCids, lookups.cids),
        byProvider: computePerProviderCounts(uniqueCids, lookups.cids, lookups),
      },
      pieceMetrics: {
        totalPieces,
        uniquePieceCids: uniquePieceCids.size,
        ...computeRetrievabilityCounts(uniquePieceCids, lookups.pieces),
        byProvider: computePerProviderCounts(uniquePieceCids, lookups.pieces, lookups),
      },
    },
    byPreparation,
    providers,
  };
}
