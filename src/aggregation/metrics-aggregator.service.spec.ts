import { Logger } from "@nestjs/common";
import type { ConfigService } from "@nestjs/config";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ActiveAgreementSet } from "../agreements/active-agreement-set.js";
import { NO_ACTIVE_AGREEMENT_MESSAGE, NO_ACTIVE_AGREEMENT_STATUS_CODE, ProbeStatus } from "../common/types.js";
import type { IConfig } from "../config/app.config.js";
import type { ContentCatalog } from "../content-units/content-units.types.js";
import { makeConfig, makeProbeResult, makeUnit, mockConfigService, TEST_PROVIDERS } from "../testing/fixtures.js";
import { MetricsAggregatorService } from "./metrics-aggregator.service.js";

const MiB = 1024 * 1024;

describe("MetricsAggregatorService", () => {
  const { agreements } = ActiveAgreementSet.fromRecords([
    { pieceCid: "piece-1", provider: "f01", state: "active", dealId: 1 },
    { pieceCid: "piece-1", provider: "f02", state: "active", dealId: 2 },
  ]);

  const catalog: ContentCatalog = {
    filePreparations: new Map([
      [
        "1",
        {
          preparationId: "1",
          sourceFile: "prep1_files.csv",
          files: [
            { cid: "bafy-1", pieceCid: "piece-1", size: 1024, fileName: "small.txt", preparationId: "1" },
            { cid: "bafy-2", pieceCid: "piece-1", size: MiB, fileName: "large.bin", preparationId: "1" },
          ],
        },
      ],
    ]),
    piecePreparations: new Map(),
    pieces: [],
    cids: [
      makeUnit({ id: "bafy-1", pieceCid: "piece-1", fileName: "small.txt", fileSize: 1024, fileType: "txt" }),
      makeUnit({ id: "bafy-2", pieceCid: "piece-1", fileName: "large.bin", fileSize: MiB, fileType: "bin" }),
    ],
  };

  const beta = { providerId: "f02", providerName: "Beta Storage" };
  const nodeNotFound = {
    status: ProbeStatus.UNAVAILABLE,
    statusCode: 500,
    contentLength: null,
    errorMessage: "HTTP 500",
    responseBody: "could not find node",
  };

  const results = [
    makeProbeResult({ itemId: "bafy-1", pieceCid: "piece-1" }),
    makeProbeResult({ itemId: "bafy-1", pieceCid: "piece-1", ...beta }),
    makeProbeResult({ itemId: "bafy-2", pieceCid: "piece-1", ...nodeNotFound }),
    makeProbeResult({ itemId: "bafy-2", pieceCid: "piece-1", ...beta, ...nodeNotFound }),
  ];

  const createService = (config: IConfig = makeConfig()): MetricsAggregatorService =>
    new MetricsAggregatorService(mockConfigService(config) as unknown as ConfigService<IConfig, true>);

  let service: MetricsAggregatorService;

  beforeEach(() => {
    vi.spyOn(Logger.prototype, "log").mockImplementation(() => undefined);
    service = createService();
  });

  it("reports one unit retrievable everywhere and one failing everywhere", () => {
    const metrics = service.aggregate(results, agreements, catalog, TEST_PROVIDERS);

    expect(metrics.overall.counts).toEqual({
      uniquePiecesInActiveAgreements: 0,
      uniqueCidsInActiveAgreements: 2,
      pieceRetrievalChecks: 0,
      cidRetrievalChecks: 4,
    });
    expect(metrics.overall.cidOutcomes).toEqual({ successCount: 2, failureCount: 2, successRate: 0.5 });
    expect(metrics.overall.pieceOutcomes).toEqual({ successCount: 0, failureCount: 0, successRate: null });
    expect(metrics.overall.uniqueMetrics.cids).toEqual({
      withAnyProviderSuccess: 1,
      allProvidersSuccess: 1,
      allProvidersFailed: 1,
    });

    const cidErrors = metrics.errorAnalysis.cids;
    expect(cidErrors.crossProviderAnalysis.allProvidersFail).toBe(1);
    expect(cidErrors.crossProviderAnalysis.someProvidersFail).toBe(0);
    expect(cidErrors.fileCharacteristicsByCategory.node_not_found.totalErrors).toBe(2);
    expect(cidErrors.byProvider.f02.providerName).toBe("Beta Storage");
  });

  it("puts a file of exactly 1 MiB in the 1-10MB bucket", () => {
    const { byFilesizeBucket } = service.aggregate(results, agreements, catalog).overall;

    expect(byFilesizeBucket["0-1MB"]).toEqual({
      totalFilesInActiveAgreements: 2,
      successCount: 2,
      failureCount: 0,
      successRate: 1,
    });
    expect(byFilesizeBucket["1-10MB"]).toEqual({
      totalFilesInActiveAgreements: 2,
      successCount: 0,
      failureCount: 2,
      successRate: 0,
    });
    expect(byFilesizeBucket["1GB+"]).toEqual({
      totalFilesInActiveAgreements: 0,
      successCount: 0,
      failureCount: 0,
      successRate: null,
    });
    expect(byFilesizeBucket.unknown).toBeUndefined();
  });

  it("keeps checks without an active agreement out of outcome metrics", () => {
    const extra = [
      ...results,
      makeProbeResult({ itemId: "bafy-1", pieceCid: "piece-1", providerId: "f03", providerName: "Gamma" }),
      makeProbeResult({
        itemId: "bafy-2",
        pieceCid: "piece-1",
        providerId: "f03",
        providerName: "Gamma",
        url: null,
        status: ProbeStatus.UNAVAILABLE,
        statusCode: NO_ACTIVE_AGREEMENT_STATUS_CODE,
        errorMessage: NO_ACTIVE_AGREEMENT_MESSAGE,
        agreementState: "active",
      }),
    ];

    const metrics = service.aggregate(extra, agreements, catalog);

    expect(metrics.overall.counts.cidRetrievalChecks).toBe(4);
    expect(metrics.overall.nonActiveAgreements).toEqual({
      uniquePiecesNotInActiveAgreements: 0,
      uniqueCidsNotInActiveAgreements: 2,
      pieceChecksNotInActiveAgreements: 0,
      cidChecksNotInActiveAgreements: 2,
    });
    expect(metrics.byProvider.f03.cidMetrics.retrievalChecks).toBe(0);
    expect(metrics.byProvider.f03.nonActiveAgreements.cidChecksNotInActiveAgreements).toBe(2);
  });

  it("covers prepared content from the metadata", () => {
    const { overall, byPreparation } = service.aggregate(results, agreements, catalog).preparedContentOverall;

    expect(overall.cidMetrics).toEqual({
      totalFiles: 2,
      uniqueCids: 2,
      retrievableByAnyProvider: 1,
      retrievableByAllProviders: 1,
      notRetrievableByAnyProvider: 1,
      notInAnyActiveAgreements: 0,
      byProvider: {
        f01: { providerName: "Alpha Storage", retrievable: 1, notRetrievable: 1, notInAgreements: 0 },
        f02: { providerName: "Beta Storage", retrievable: 1, notRetrievable: 1, notInAgreements: 0 },
      },
    });
    expect(byPreparation["1"].cidMetrics.sourceFile).toBe("prep1_files.csv");
    expect(byPreparation["1"].pieceMetrics.totalPieces).toBe(0);
  });

  it("applies the configured error-analysis status codes", () => {
    service = createService(makeConfig({ analysis: { errorAnalysisStatusCodes: [404] } }));

    const { errorAnalysis } = service.aggregate(results, agreements, catalog);

    expect(errorAnalysis.statusCodes).toEqual([404]);
    expect(errorAnalysis.cids.overview.totalErrors).toBe(0);
  });
});
