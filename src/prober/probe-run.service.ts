import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { AgreementsService } from "../agreements/agreements.service.js";
import { CheckpointService } from "../checkpoint/checkpoint.service.js";
import { writeJsonFileAtomic } from "../common/json-file.js";
import type { IConfig, NonActiveProbeMode } from "../config/app.config.js";
import { ContentUnitsService } from "../content-units/content-units.service.js";
import { ProbeMetricsService } from "../metrics/probe-metrics.service.js";
import { ProvidersService } from "../providers/providers.service.js";
import { RetrievalProberService } from "./retrieval-prober.service.js";
import { buildRunSummary, type RunSummary } from "./run-summary.js";

export interface ProbeCommandOptions {
  /** Back up and delete the checkpoint before probing. */
  refresh?: boolean;
  recheckSkipped?: boolean;
  preparationIds?: string[];
  batchSize?: number;
  concurrency?: number;
  nonActiveMode?: NonActiveProbeMode;
  signal?: AbortSignal;
}

/**
 * Loads inputs, runs the prober and writes the results file, the run summary
 * and, when configured, the metrics textfile.
 */
@Injectable()
export class ProbeRunService {
  private readonly logger = new Logger(ProbeRunService.name);

  constructor(
    private readonly agreementsService: AgreementsService,
    private readonly contentUnitsService: ContentUnitsService,
    private readonly providersService: ProvidersService,
    private readonly checkpointService: CheckpointService,
    private readonly proberService: RetrievalProberService,
    private readonly probeMetrics: ProbeMetricsService,
    private readonly configService: ConfigService<IConfig, true>,
  ) {}

  async execute(options: ProbeCommandOptions = {}): Promise<RunSummary> {
    const paths = this.configService.get("paths");

    const providers = await this.providersService.loadProviders();
    const agreements = await this.agreementsService.loadAgreements();
    const catalog = await this.contentUnitsService.loadCatalog(agreements);

    if (options.refresh) {
      await this.checkpointService.backupAndRemove();
    }

    const outcome = await this.proberService.run([...catalog.pieces, ...catalog.cids], {
      providers,
      agreements,
      preparationIds: options.preparationIds,
      recheckSkipped: options.recheckSkipped,
      batchSize: options.batchSize,
      concurrency: options.concurrency,
      nonActiveMode: options.nonActiveMode,
      signal: options.signal,
    });

    await writeJsonFileAtomic(paths.resultsFile, outcome.results);
    const summary = buildRunSummary(outcome.results, outcome.aborted);
    await writeJsonFileAtomic(paths.runSummaryFile, summary);
    this.logger.log(`Wrote ${outcome.results.length} results to ${paths.resultsFile}`);

    if (paths.metricsFile) {
      await this.probeMetrics.writeTextfile(paths.metricsFile);
    }

    return summary;
  }
}
