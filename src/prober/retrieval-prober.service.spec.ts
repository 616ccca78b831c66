import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { ActiveAgreementSet } from "../agreements/active-agreement-set.js";
import { CheckpointService } from "../checkpoint/checkpoint.service.js";
import { categorizeError, failureText } from "../classification/error-categories.js";
import { ProbeStatus, RetrievalType } from "../common/types.js";
import type { IConfig } from "../config/app.config.js";
import type { HttpClientService } from "../http-client/http-client.service.js";
import { type ProbeResponse, ProbeTimeoutError } from "../http-client/types.js";
import type { ProbeMetricsService } from "../metrics/probe-metrics.service.js";
import { makeConfig, makeUnit, mockConfigService, TEST_PROVIDERS } from "../testing/fixtures.js";
import { buildProbeUrl } from "./probe-url.js";
import { RetrievalProberService } from "./retrieval-prober.service.js";

const response = (statusCode: number, overrides: Partial<ProbeResponse> = {}): ProbeResponse => ({
  statusCode,
  contentLength: null,
  bodyPreview: null,
  httpVersion: "1.1",
  elapsedMs: 5,
  ...overrides,
});

describe("RetrievalProberService", () => {
  let workDir: string;
  let config: IConfig;
  let httpProbe: Mock<HttpClientService["probe"]>;
  let metrics: {
    recordProbe: Mock<ProbeMetricsService["recordProbe"]>;
    recordCheckpointFlush: Mock<ProbeMetricsService["recordCheckpointFlush"]>;
  };
  let checkpointService: CheckpointService;
  let service: RetrievalProberService;

  const pieceUnit = makeUnit({ kind: RetrievalType.PIECE, id: "piece-1", pieceCid: "piece-1", fileType: null });
  const cidUnit = makeUnit({ kind: RetrievalType.CID, id: "bafy-1", pieceCid: "piece-1" });
  const agreements = ActiveAgreementSet.fromRecords([
    { pieceCid: "piece-1", provider: "f01", state: "active", dealId: "1001" },
    { pieceCid: "piece-1", provider: "f02", state: "expired", dealId: "1002" },
  ]).agreements;

  const createService = (): RetrievalProberService => {
    const configService = mockConfigService(config) as unknown as ConfigService<IConfig, true>;
    checkpointService = new CheckpointService(configService);
    return new RetrievalProberService(
      { probe: httpProbe } as unknown as HttpClientService,
      checkpointService,
      metrics as unknown as ProbeMetricsService,
      configService,
    );
  };

  beforeEach(async () => {
    workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "prober-"));
    config = makeConfig({ paths: { checkpointFile: path.join(workDir, "checkpoint.json") } });
    httpProbe = vi.fn<HttpClientService["probe"]>();
    metrics = {
      recordProbe: vi.fn<ProbeMetricsService["recordProbe"]>(),
      recordCheckpointFlush: vi.fn<ProbeMetricsService["recordCheckpointFlush"]>(),
    };
    service = createService();
    vi.spyOn(Logger.prototype, "log").mockImplementation(() => undefined);
    vi.spyOn(Logger.prototype, "debug").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(workDir, { recursive: true, force: true });
  });

  describe("buildProbeUrl", () => {
    it("uses the piece route for pieces and the ipfs route for CIDs", () => {
      expect(buildProbeUrl("https://sp.test/", RetrievalType.PIECE, "baga1")).toBe("https://sp.test/piece/baga1");
      expect(buildProbeUrl("https://sp.test//", RetrievalType.CID, "bafy1")).toBe("https://sp.test/ipfs/bafy1");
    });
  });

  describe("probe", () => {
    const task = { unit: cidUnit, provider: TEST_PROVIDERS[0], agreement: agreements.getAgreement("piece-1", "f01") };

    it("records 200 on HEAD as available without a GET", async () => {
      httpProbe.mockResolvedValueOnce(response(200, { contentLength: 2048 }));

      const result = await service.probe(task);

      expect(httpProbe).toHaveBeenCalledTimes(1);
      expect(httpProbe).toHaveBeenCalledWith("https://alpha.sp.test/ipfs/bafy-1", { method: "HEAD" }, undefined);
      expect(result).toMatchObject({
        retrievalType: RetrievalType.CID,
        itemId: "bafy-1",
        pieceCid: "piece-1",
        providerId: "f01",
        providerName: "Alpha Storage",
        url: "https://alpha.sp.test/ipfs/bafy-1",
        status: ProbeStatus.AVAILABLE,
        statusCode: 200,
        contentLength: 2048,
        errorMessage: null,
        responseBody: null,
        agreementState: "active",
        dealId: "1001",
      });
      expect(result.responseTimeMs).toBeGreaterThanOrEqual(0);
    });

    it("falls back to GET when HEAD answers 405", async () => {
      httpProbe.mockResolvedValueOnce(response(405)).mockResolvedValueOnce(response(200, { contentLength: 7 }));

      const result = await service.probe(task);

      expect(httpProbe).toHaveBeenNthCalledWith(2, "https://alpha.sp.test/ipfs/bafy-1", { method: "GET" }, undefined);
      expect(result.status).toBe(ProbeStatus.AVAILABLE);
      expect(result.contentLength).toBe(7);
    });

    it("falls back to GET when HEAD throws", async () => {
      httpProbe.mockRejectedValueOnce(new Error("socket hang up")).mockResolvedValueOnce(response(200));

      const result = await service.probe(task);

      expect(httpProbe).toHaveBeenCalledTimes(2);
      expect(result.status).toBe(ProbeStatus.AVAILABLE);
    });

    it("records non-200 GET responses as unavailable with the body preview", async () => {
      httpProbe
        .mockResolvedValueOnce(response(404))
        .mockResolvedValueOnce(response(404, { bodyPreview: "multihash not found", contentLength: 19 }));

      const result = await service.probe(task);

      expect(result).toMatchObject({
        status: ProbeStatus.UNAVAILABLE,
        statusCode: 404,
        contentLength: null,
        errorMessage: "HTTP 404",
        responseBody: "multihash not found",
      });
    });

    it("records any 2xx response with content as available", async () => {
      httpProbe.mockResolvedValueOnce(response(206, { contentLength: 100, bodyPreview: "data" }));

      const result = await service.probe(task);

      expect(httpProbe).toHaveBeenCalledTimes(1);
      expect(result).toMatchObject({
        status: ProbeStatus.AVAILABLE,
        statusCode: 206,
        contentLength: 100,
        errorMessage: null,
        responseBody: null,
      });
    });

    it("treats a 2xx response without content as unavailable", async () => {
      httpProbe.mockResolvedValueOnce(response(204)).mockResolvedValueOnce(response(204, { bodyPreview: "" }));

      const result = await service.probe(task);

      expect(httpProbe).toHaveBeenCalledTimes(2);
      expect(httpProbe).toHaveBeenLastCalledWith(expect.any(String), { method: "GET" }, undefined);
      expect(result.status).toBe(ProbeStatus.UNAVAILABLE);
      expect(result.errorMessage).toBe("HTTP 204");
    });

    it("records timeouts as errors", async () => {
      const url = "https://alpha.sp.test/ipfs/bafy-1";
      httpProbe
        .mockRejectedValueOnce(new ProbeTimeoutError(url, 30000))
        .mockRejectedValueOnce(new ProbeTimeoutError(url, 30000));

      const result = await service.probe(task);

      expect(result).toMatchObject({
        status: ProbeStatus.ERROR,
        statusCode: null,
        errorMessage: "Request timeout",
      });
    });

    it("records other transport failures with their message", async () => {
      httpProbe.mockRejectedValue(new Error("connection refused"));

      const result = await service.probe(task);

      expect(result.status).toBe(ProbeStatus.ERROR);
      expect(result.errorMessage).toBe("connection refused");
    });

    it("labels socket and DNS failures as connection errors", async () => {
      const refused = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:443"), { code: "ECONNREFUSED" });
      const lookupFailure = Object.assign(new Error("getaddrinfo ENOTFOUND"), { code: "ENOTFOUND" });
      const dns = new Error("fetch failed", { cause: lookupFailure });
      httpProbe.mockRejectedValueOnce(refused).mockRejectedValueOnce(refused);

      const result = await service.probe(task);

      expect(result.errorMessage).toBe("Connection error: connect ECONNREFUSED 127.0.0.1:443");
      expect(categorizeError(failureText(result.responseBody, result.errorMessage))).toBe("connection_error");

      httpProbe.mockRejectedValueOnce(dns).mockRejectedValueOnce(dns);
      expect((await service.probe(task)).errorMessage).toBe("Connection error: fetch failed");
    });
  });

  describe("run", () => {
    it("probes active pairs, skips the rest and checkpoints the results", async () => {
      httpProbe.mockResolvedValue(response(200));

      const outcome = await service.run([cidUnit, pieceUnit], { providers: TEST_PROVIDERS, agreements });

      expect(outcome).toMatchObject({ probed: 2, skipped: 2, reused: 0, pending: 0, aborted: false });
      expect(httpProbe.mock.calls.map(([url]) => url)).toEqual([
        "https://alpha.sp.test/piece/piece-1",
        "https://alpha.sp.test/ipfs/bafy-1",
      ]);

      const skipped = outcome.results.find(
        (result) => result.retrievalType === RetrievalType.PIECE && result.providerId === "f02",
      );
      expect(skipped).toMatchObject({
        url: null,
        status: ProbeStatus.UNAVAILABLE,
        statusCode: -1,
        contentLength: -1,
        responseTimeMs: -1,
        errorMessage: "No active agreement with this provider",
        agreementState: "expired",
        dealId: "1002",
      });
      expect(metrics.recordProbe).toHaveBeenCalledTimes(4);
      expect((await checkpointService.load())?.size).toBe(4);
    });

    it("makes no network calls for pairs already in the checkpoint", async () => {
      httpProbe.mockResolvedValue(response(200));
      await service.run([pieceUnit, cidUnit], { providers: TEST_PROVIDERS, agreements });
      httpProbe.mockClear();

      const resumed = createService();
      const outcome = await resumed.run([pieceUnit, cidUnit], { providers: TEST_PROVIDERS, agreements });

      expect(httpProbe).not.toHaveBeenCalled();
      expect(outcome).toMatchObject({ probed: 0, skipped: 0, reused: 4, pending: 0 });
      expect(outcome.results).toHaveLength(4);
    });

    it("re-evaluates skipped pairs when asked to", async () => {
      httpProbe.mockResolvedValue(response(200));
      await service.run([pieceUnit], { providers: TEST_PROVIDERS, agreements });
      httpProbe.mockClear();

      const refreshed = ActiveAgreementSet.fromRecords([
        { pieceCid: "piece-1", provider: "f01", state: "active" },
        { pieceCid: "piece-1", provider: "f02", state: "active", dealId: "2002" },
      ]).agreements;
      const outcome = await service.run([pieceUnit], {
        providers: TEST_PROVIDERS,
        agreements: refreshed,
        recheckSkipped: true,
      });

      expect(httpProbe).toHaveBeenCalledWith("https://beta.sp.test/piece/piece-1", { method: "HEAD" }, undefined);
      expect(outcome).toMatchObject({ probed: 1, reused: 1 });
      const beta = outcome.results.find((result) => result.providerId === "f02");
      expect(beta?.statusCode).toBe(200);
      expect(beta?.dealId).toBe("2002");
    });

    it("probes non-active pairs over the network in probe mode", async () => {
      httpProbe.mockResolvedValue(response(200));

      const outcome = await service.run([pieceUnit], {
        providers: TEST_PROVIDERS,
        agreements,
        nonActiveMode: "probe",
      });

      expect(outcome).toMatchObject({ probed: 2, skipped: 0 });
      expect(httpProbe).toHaveBeenCalledTimes(2);
    });

    it("filters units by preparation", async () => {
      httpProbe.mockResolvedValue(response(200));
      const other = makeUnit({ id: "bafy-2", pieceCid: "piece-1", preparationId: "2" });

      const outcome = await service.run([cidUnit, other], {
        providers: [TEST_PROVIDERS[0]],
        agreements,
        preparationIds: ["2"],
      });

      expect(outcome.results.map((result) => result.itemId)).toEqual(["bafy-2"]);
    });

    it("flushes the checkpoint after every batch", async () => {
      httpProbe.mockResolvedValue(response(200));
      const saveSpy = vi.spyOn(checkpointService, "save");
      const units = [1, 2, 3].map((n) => makeUnit({ id: `bafy-${n}`, pieceCid: "piece-1" }));

      await service.run(units, { providers: [TEST_PROVIDERS[0]], agreements, batchSize: 2 });

      expect(saveSpy).toHaveBeenCalledTimes(2);
      expect(metrics.recordCheckpointFlush).toHaveBeenCalledWith("success");
    });

    it("stops starting probes once aborted and keeps completed results", async () => {
      vi.spyOn(Logger.prototype, "warn").mockImplementation(() => undefined);
      const controller = new AbortController();
      httpProbe.mockImplementation(async () => {
        controller.abort();
        return response(200);
      });
      const units = [1, 2, 3].map((n) => makeUnit({ id: `bafy-${n}`, pieceCid: "piece-1" }));

      const outcome = await service.run(units, {
        providers: [TEST_PROVIDERS[0]],
        agreements,
        concurrency: 1,
        signal: controller.signal,
      });

      expect(outcome).toMatchObject({ probed: 1, pending: 2, aborted: true });
      expect(httpProbe).toHaveBeenCalledTimes(1);
      expect((await checkpointService.load())?.size).toBe(1);
    });
  });
});
