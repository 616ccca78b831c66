import type { AggregatedMetrics } from "../aggregation/aggregation.types.js";

export interface ReportMetadata {
  generatedAt: string;
  inputFiles: {
    resultsFile: string;
    dealsFile: string;
    fileMetadataDir: string;
    pieceMetadataDir: string;
    providersFile: string;
  };
  totalResults: number;
  /** Records dropped because they failed validation. */
  skippedRecords: number;
  activeAgreementPairs: number;
}

export type SummaryReport = { metadata: ReportMetadata } & AggregatedMetrics;

export interface ReportCommandOptions {
  /** Overrides the configured report path. */
  out?: string;
  now?: Date;
}
