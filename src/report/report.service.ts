import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { AgreementsService } from "../agreements/agreements.service.js";
import { MetricsAggregatorService } from "../aggregation/metrics-aggregator.service.js";
import { InputSourceError } from "../common/errors.js";
import { readJsonFile, writeJsonFileAtomic } from "../common/json-file.js";
import { toErrorMessage, toStructuredError } from "../common/logging.js";
import { validateProbeResult } from "../common/probe-result.schema.js";
import type { ProbeResult, ProviderEndpoint } from "../common/types.js";
import type { IConfig } from "../config/app.config.js";
import { ContentUnitsService } from "../content-units/content-units.service.js";
import { ProvidersService } from "../providers/providers.service.js";
import type { ReportCommandOptions, SummaryReport } from "./report.types.js";

@Injectable()
export class ReportService {
  private readonly logger = new Logger(ReportService.name);

  constructor(
    private readonly agreementsService: AgreementsService,
    private readonly contentUnitsService: ContentUnitsService,
    private readonly providersService: ProvidersService,
    private readonly aggregatorService: MetricsAggregatorService,
    private readonly configService: ConfigService<IConfig, true>,
  ) {}

  /**
   * Aggregates the recorded probe results into the summary report and writes
   * it atomically.
   *
   * @throws InputSourceError when the results or agreements cannot be read
   */
  async generate(options: ReportCommandOptions = {}): Promise<SummaryReport> {
    const paths = this.configService.get("paths");
    const outputPath = options.out ?? paths.reportFile;

    const { results, skipped } = await this.loadResults(paths.resultsFile);
    const agreements = await this.agreementsService.loadAgreements(paths.dealsFile);
    const catalog = await this.contentUnitsService.loadCatalog(agreements);
    const providers = await this.loadProviderNames(paths.providersFile);

    const metrics = this.aggregatorService.aggregate(results, agreements, catalog, providers);
    const report: SummaryReport = {
      metadata: {
        generatedAt: (options.now ?? new Date()).toISOString(),
        inputFiles: {
          resultsFile: paths.resultsFile,
          dealsFile: paths.dealsFile,
          fileMetadataDir: paths.fileMetadataDir,
          pieceMetadataDir: paths.pieceMetadataDir,
          providersFile: paths.providersFile,
        },
        totalResults: results.length,
        skippedRecords: skipped,
        activeAgreementPairs: agreements.size,
      },
      ...metrics,
    };

    await writeJsonFileAtomic(outputPath, report);
    this.logger.log(`Summary report written to ${outputPath}`);
    return report;
  }

  private async loadResults(filePath: string): Promise<{ results: ProbeResult[]; skipped: number }> {
    const raw = await readJsonFile(filePath);
    if (!Array.isArray(raw)) {
      throw new InputSourceError(filePath, "Probe results must be a JSON array");
    }

    const results: ProbeResult[] = [];
    let skipped = 0;
    raw.forEach((value: unknown, index) => {
      try {
        results.push(validateProbeResult(value));
      } catch (error) {
        skipped++;
        this.logger.warn({
          event: "probe_record_skipped",
          message: "Skipping malformed probe result",
          filePath,
          index,
          reason: toErrorMessage(error),
        });
      }
    });

    this.logger.log(`Loaded ${results.length} probe results from ${filePath}`);
    return { results, skipped };
  }

  /** Provider names only label the report, so a missing file is not fatal. */
  private async loadProviderNames(filePath: string): Promise<ProviderEndpoint[]> {
    try {
      return await this.providersService.loadProviders(filePath);
    } catch (error) {
      if (!(error instanceof InputSourceError)) {
        throw error;
      }
      this.logger.warn({
        event: "providers_unavailable",
        message: "Provider names fall back to those recorded in results",
        filePath,
        error: toStructuredError(error),
      });
      return [];
    }
  }
}
