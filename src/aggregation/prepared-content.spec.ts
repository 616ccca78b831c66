import { describe, expect, it } from "vitest";
import { RetrievalType } from "../common/types.js";
import type { ContentCatalog } from "../content-units/content-units.types.js";
import { makeEnrichedCheck } from "../testing/fixtures.js";
import type { SplitChecks } from "./aggregation.types.js";
import { computePreparedContentMetrics } from "./prepared-content.js";

const MiB = 1024 * 1024;

const file = (cid: string, fileName: string, size: number | null) => ({
  cid,
  pieceCid: "piece-1",
  size,
  fileName,
  preparationId: "1",
});

const piece = (pieceCid: string) => ({ pieceCid, pieceSize: 2048, fileSize: 1024, numOfFiles: 1, preparationId: "2" });

const catalog: Pick<ContentCatalog, "filePreparations" | "piecePreparations"> = {
  filePreparations: new Map([
    [
      "1",
      {
        preparationId: "1",
        sourceFile: "prep1_files.csv",
        files: [
          file("bafy-1", "a.txt", 10),
          file("bafy-1", "b.pdf", 5 * MiB),
          file("bafy-2", "c.pdf", 5 * MiB),
          file("bafy-3", "d.pdf", null),
        ],
      },
    ],
  ]),
  piecePreparations: new Map([
    ["2", { preparationId: "2", sourceFile: "prep2_pieces.json", pieces: [piece("piece-1"), piece("piece-9")] }],
  ]),
};

const failure = { status: "unavailable", statusCode: 404, outcome: "failure" } as const;

const split: SplitChecks = {
  cidActive: [makeEnrichedCheck({ itemId: "bafy-1" }), makeEnrichedCheck({ itemId: "bafy-2", ...failure })],
  cidNonActive: [
    makeEnrichedCheck({ itemId: "bafy-3", providerId: "f02", providerName: "Beta Storage", active: false, ...failure }),
  ],
  pieceActive: [makeEnrichedCheck({ retrievalType: RetrievalType.PIECE, itemId: "piece-1", pieceCid: "piece-1" })],
  pieceNonActive: [],
};

describe("computePreparedContentMetrics", () => {
  it("counts every prepared CID and piece against active-agreement outcomes", () => {
    const { overall, providers } = computePreparedContentMetrics(catalog, split);

    expect(overall.cidMetrics).toEqual({
      totalFiles: 4,
      uniqueCids: 3,
      retrievableByAnyProvider: 1,
      retrievableByAllProviders: 1,
      notRetrievableByAnyProvider: 1,
      notInAnyActiveAgreements: 1,
      byProvider: {
        f01: { providerName: "Alpha Storage", retrievable: 1, notRetrievable: 1, notInAgreements: 1 },
        f02: { providerName: "Beta Storage", retrievable: 0, notRetrievable: 0, notInAgreements: 3 },
      },
    });
    expect(overall.pieceMetrics).toEqual({
      totalPieces: 2,
      uniquePieceCids: 2,
      retrievableByAnyProvider: 1,
      retrievableByAllProviders: 1,
      notRetrievableByAnyProvider: 0,
      notInAnyActiveAgreements: 1,
      byProvider: {
        f01: { providerName: "Alpha Storage", retrievable: 1, notRetrievable: 0, notInAgreements: 1 },
        f02: { providerName: "Beta Storage", retrievable: 0, notRetrievable: 0, notInAgreements: 2 },
      },
    });
    expect(providers).toEqual({ f01: "Alpha Storage", f02: "Beta Storage" });
  });

  it("breaks a preparation down by file type and size using the first row per CID", () => {
    const { byPreparation } = computePreparedContentMetrics(catalog, split);

    expect(Object.keys(byPreparation)).toEqual(["1", "2"]);
    const prep = byPreparation["1"];
    expect(Object.keys(prep.byFiletype)).toEqual(["pdf", "txt"]);
    expect(prep.byFiletype.pdf).toEqual({
      uniqueCids: 2,
      byProvider: {
        f01: { providerName: "Alpha Storage", retrievable: 0, notRetrievable: 1, notInAgreements: 1 },
        f02: { providerName: "Beta Storage", retrievable: 0, notRetrievable: 0, notInAgreements: 2 },
      },
    });
    expect(Object.keys(prep.byFilesizeBucket)).toEqual(["0-1MB", "1-10MB", "10-100MB", "100MB-1GB", "1GB+", "unknown"]);
    expect(prep.byFilesizeBucket["0-1MB"]?.uniqueCids).toBe(1);
    expect(prep.byFilesizeBucket["1-10MB"]?.uniqueCids).toBe(1);
    expect(prep.byFilesizeBucket["10-100MB"]?.uniqueCids).toBe(0);
    expect(prep.pieceMetrics.sourceFile).toBe("");
    expect(prep.pieceMetrics.totalPieces).toBe(0);
  });

  it("reports a piece-only preparation with empty CID metrics", () => {
    const prep = computePreparedContentMetrics(catalog, split).byPreparation["2"];

    expect(prep.cidMetrics.totalFiles).toBe(0);
    expect(prep.cidMetrics.sourceFile).toBe("");
    expect(prep.pieceMetrics.sourceFile).toBe("prep2_pieces.json");
    expect(prep.pieceMetrics.uniquePieceCids).toBe(2);
  });

  it("returns zeroed metrics when there is no metadata", () => {
    const empty = { filePreparations: new Map(), piecePreparations: new Map() };
    const none: SplitChecks = { cidActive: [], cidNonActive: [], pieceActive: [], pieceNonActive: [] };

    const metrics = computePreparedContentMetrics(empty, none);

    expect(metrics).toEqual({
      overall: {
        cidMetrics: {
          totalFiles: 0,
          uniqueCids: 0,
          retrievableByAnyProvider: 0,
          retrievableByAllProviders: 0,
          notRetrievableByAnyProvider: 0,
          notInAnyActiveAgreements: 0,
          byProvider: {},
        },
        pieceMetrics: {
          totalPieces: 0,
          uniquePieceCids: 0,
          retrievableByAnyProvider: 0,
          retrievableByAllProviders: 0,
          notRetrievableByAnyProvider: 0,
          notInAnyActiveAgreements: 0,
          byProvider: {},
        },
      },
      byPreparation: {},
      providers: {},
    });
  });
});
