import type { EnrichedCheck } from "../aggregation/aggregation.types.js";
import type { IConfig } from "../config/app.config.js";
import { type ContentUnit, type ProbeResult, ProbeStatus, type ProviderEndpoint, RetrievalType } from "../common/types.js";

export function makeProbeResult(overrides: Partial<ProbeResult> = {}): ProbeResult {
  return {
    retrievalType: RetrievalType.CID,
    itemId: "bafy-test",
    pieceCid: "piece-test",
    preparationId: "1",
    providerId: "f01",
    providerName: "Alpha Storage",
    url: "https://alpha.sp.test/ipfs/bafy-test",
    status: ProbeStatus.AVAILABLE,
    statusCode: 200,
    contentLength: 128,
    errorMessage: null,
    responseBody: null,
    responseTimeMs: 42,
    timestamp: "2025-05-01T12:00:00.000Z",
    agreementState: "active",
    dealId: "1001",
    ...overrides,
  };
}

export function makeUnit(overrides: Partial<ContentUnit> = {}): ContentUnit {
  return {
    kind: RetrievalType.CID,
    id: "bafy-test",
    pieceCid: "piece-test",
    preparationId: "1",
    fileName: "file.txt",
    fileSize: 1024,
    fileType: "txt",
    candidateProviders: new Set<string>(),
    ...overrides,
  };
}

export function makeEnrichedCheck(overrides: Partial<EnrichedCheck> = {}): EnrichedCheck {
  return {
    retrievalType: RetrievalType.CID,
    itemId: "bafy-test",
    pieceCid: "piece-test",
    preparationId: "1",
    providerId: "f01",
    providerName: "Alpha Storage",
    status: ProbeStatus.AVAILABLE,
    statusCode: 200,
    errorMessage: null,
    responseBody: null,
    fileName: "file.txt",
    fileType: "txt",
    fileSize: 10,
    outcome: "success",
    active: true,
    ...overrides,
  };
}

export const TEST_PROVIDERS: ProviderEndpoint[] = [
  { id: "f01", name: "Alpha Storage", retrievalEndpoint: "https://alpha.sp.test" },
  { id: "f02", name: "Beta Storage", retrievalEndpoint: "https://beta.sp.test" },
];

export function makeConfig(overrides: Partial<{ [K in keyof IConfig]: Partial<IConfig[K]> }> = {}): IConfig {
  return {
    app: { env: "test", logLevel: "error", ...overrides.app },
    paths: {
      outputDir: "./output",
      dealsFile: "./output/deals.json",
      fileMetadataDir: "./output/file-metadata",
      pieceMetadataDir: "./output/piece-metadata",
      providersFile: "./config/providers.json",
      resultsFile: "./output/retrieval-status/retrieval-results.json",
      runSummaryFile: "./output/retrieval-status/retrieval-summary.json",
      checkpointFile: "./output/retrieval-status/checkpoint.json",
      reportFile: "./output/summary-reports/summary-report.json",
      ...overrides.paths,
    },
    probe: {
      batchSize: 100,
      concurrency: 4,
      requestTimeoutMs: 30000,
      httpVersion: "1.1",
      nonActiveMode: "skip",
      userAgent: "retrieval-audit/test",
      ...overrides.probe,
    },
    checkpoint: { maxBackups: 5, ...overrides.checkpoint },
    agreements: { staleAfterDays: 30, ...overrides.agreements },
    analysis: { errorAnalysisStatusCodes: [], ...overrides.analysis },
  };
}

/** Minimal stand-in for `ConfigService#get` over a full config object. */
export function mockConfigService(config: IConfig): { get: <K extends keyof IConfig>(key: K) => IConfig[K] } {
  return {
    get: <K extends keyof IConfig>(key: K): IConfig[K] => config[key],
  };
}
