import Joi from "joi";
import type { HttpVersion } from "../http-client/types.js";

export const configValidationSchema = Joi.object({
  // Application
  NODE_ENV: Joi.string().valid("development", "production", "test").default("development"),
  LOG_LEVEL: Joi.string()
    .lowercase()
    .valid("fatal", "error", "warn", "log", "info", "debug", "verbose")
    .default("log"),

  // Input and output locations
  AUDIT_OUTPUT_DIR: Joi.string().default("./output"),
  AUDIT_DEALS_FILE: Joi.string().optional(),
  AUDIT_FILE_METADATA_DIR: Joi.string().optional(),
  AUDIT_PIECE_METADATA_DIR: Joi.string().optional(),
  AUDIT_PROVIDERS_FILE: Joi.string().default("./config/providers.json"),
  AUDIT_RESULTS_FILE: Joi.string().optional(),
  AUDIT_RUN_SUMMARY_FILE: Joi.string().optional(),
  AUDIT_CHECKPOINT_FILE: Joi.string().optional(),
  AUDIT_REPORT_FILE: Joi.string().optional(),
  AUDIT_METRICS_FILE: Joi.string().optional(),

  // Probing
  PROBE_BATCH_SIZE: Joi.number().integer().min(1).default(100),
  PROBE_CONCURRENCY: Joi.number().integer().min(1).max(500).default(10),
  PROBE_TIMEOUT_MS: Joi.number().integer().min(100).default(30000),
  PROBE_HTTP_VERSION: Joi.string().valid("1.1", "2").default("1.1"),
  // "skip" records pairs without an active agreement as -1 sentinels, "probe" hits the network for them.
  PROBE_NON_ACTIVE: Joi.string().lowercase().valid("skip", "probe").default("skip"),
  PROBE_USER_AGENT: Joi.string().default("retrieval-audit/1.0"),

  // Checkpointing
  CHECKPOINT_MAX_BACKUPS: Joi.number().integer().min(0).default(5),

  // Agreements
  AGREEMENTS_STALE_AFTER_DAYS: Joi.number().integer().min(1).default(30),

  // Reporting
  ERROR_ANALYSIS_STATUS_CODES: Joi.string()
    .allow("")
    .pattern(/^\s*\d{3}\s*(,\s*\d{3}\s*)*$/)
    .default(""),
});

export type NonActiveProbeMode = "skip" | "probe";

export interface IAppConfig {
  env: string;
  logLevel: string;
}

export interface IPathsConfig {
  outputDir: string;
  dealsFile: string;
  fileMetadataDir: string;
  pieceMetadataDir: string;
  providersFile: string;
  resultsFile: string;
  runSummaryFile: string;
  checkpointFile: string;
  reportFile: string;
  /** Prometheus text exposition output; unset disables the dump. */
  metricsFile?: string;
}

export interface IProbeConfig {
  /** Content units per checkpoint flush. */
  batchSize: number;
  /** Maximum probes in flight. */
  concurrency: number;
  requestTimeoutMs: number;
  httpVersion: HttpVersion;
  nonActiveMode: NonActiveProbeMode;
  userAgent: string;
}

export interface ICheckpointConfig {
  maxBackups: number;
}

export interface IAgreementsConfig {
  staleAfterDays: number;
}

export interface IAnalysisConfig {
  /** Empty means every failed check feeds the error analysis. */
  errorAnalysisStatusCodes: number[];
}

export interface IConfig {
  app: IAppConfig;
  paths: IPathsConfig;
  probe: IProbeConfig;
  checkpoint: ICheckpointConfig;
  agreements: IAgreementsConfig;
  analysis: IAnalysisConfig;
}

const joinPath = (dir: string, ...segments: string[]): string =>
  [dir.replace(/\/+$/, ""), ...segments].join("/");

export const parseStatusCodes = (value: string | undefined): number[] => {
  if (!value || value.trim().length === 0) {
    return [];
  }
  return value
    .split(",")
    .map((code) => Number.parseInt(code.trim(), 10))
    .filter((code) => Number.isInteger(code));
};

export function loadConfig(): IConfig {
  const outputDir = process.env.AUDIT_OUTPUT_DIR || "./output";
  const retrievalStatusDir = joinPath(outputDir, "retrieval-status");

  return {
    app: {
      env: process.env.NODE_ENV || "development",
      logLevel: process.env.LOG_LEVEL || "log",
    },
    paths: {
      outputDir,
      dealsFile: process.env.AUDIT_DEALS_FILE || joinPath(outputDir, "deals.json"),
      fileMetadataDir: process.env.AUDIT_FILE_METADATA_DIR || joinPath(outputDir, "file-metadata"),
      pieceMetadataDir: process.env.AUDIT_PIECE_METADATA_DIR || joinPath(outputDir, "piece-metadata"),
      providersFile: process.env.AUDIT_PROVIDERS_FILE || "./config/providers.json",
      resultsFile: process.env.AUDIT_RESULTS_FILE || joinPath(retrievalStatusDir, "retrieval-results.json"),
      runSummaryFile: process.env.AUDIT_RUN_SUMMARY_FILE || joinPath(retrievalStatusDir, "retrieval-summary.json"),
      checkpointFile: process.env.AUDIT_CHECKPOINT_FILE || joinPath(retrievalStatusDir, "checkpoint.json"),
      reportFile: process.env.AUDIT_REPORT_FILE || joinPath(outputDir, "summary-reports", "summary-report.json"),
      metricsFile: process.env.AUDIT_METRICS_FILE || undefined,
    },
    probe: {
      batchSize: Number.parseInt(process.env.PROBE_BATCH_SIZE || "100", 10),
      concurrency: Number.parseInt(process.env.PROBE_CONCURRENCY || "10", 10),
      requestTimeoutMs: Number.parseInt(process.env.PROBE_TIMEOUT_MS || "30000", 10),
      httpVersion: process.env.PROBE_HTTP_VERSION === "2" ? "2" : "1.1",
      nonActiveMode: (process.env.PROBE_NON_ACTIVE || "skip").toLowerCase() === "probe" ? "probe" : "skip",
      userAgent: process.env.PROBE_USER_AGENT || "retrieval-audit/1.0",
    },
    checkpoint: {
      maxBackups: Number.parseInt(process.env.CHECKPOINT_MAX_BACKUPS || "5", 10),
    },
    agreements: {
      staleAfterDays: Number.parseInt(process.env.AGREEMENTS_STALE_AFTER_DAYS || "30", 10),
    },
    analysis: {
      errorAnalysisStatusCodes: parseStatusCodes(process.env.ERROR_ANALYSIS_STATUS_CODES),
    },
  };
}
