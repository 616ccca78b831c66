import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { ActiveAgreementSet } from "../agreements/active-agreement-set.js";
import type { ProbeResult, ProviderEndpoint } from "../common/types.js";
import type { IConfig } from "../config/app.config.js";
import type { ContentCatalog } from "../content-units/content-units.types.js";
import type { AggregatedMetrics, SplitChecks } from "./aggregation.types.js";
import { computeOverallMetrics, computePreparationMetrics, computeProviderMetrics } from "./dimension-metrics.js";
import { enrichChecks } from "./enrichment.js";
import { computeErrorAnalysis } from "./error-analysis.js";
import { computePreparedContentMetrics } from "./prepared-content.js";

@Injectable()
export class MetricsAggregatorService {
  private readonly logger = new Logger(MetricsAggregatorService.name);

  constructor(private readonly configService: ConfigService<IConfig, true>) {}

  /**
   * Builds every report section from recorded probe results. Only pairs with an
   * active agreement count toward outcome metrics; the rest are reported under
   * `nonActiveAgreements`.
   */
  aggregate(
    results: readonly ProbeResult[],
    agreements: ActiveAgreementSet,
    catalog: ContentCatalog,
    providers: readonly ProviderEndpoint[] = [],
  ): AggregatedMetrics {
    const { errorAnalysisStatusCodes } = this.configService.get("analysis");
    const split = enrichChecks(results, agreements, catalog);

    this.logger.log(
      `Aggregating ${results.length} results: ` +
        `${split.pieceActive.length + split.cidActive.length} in active agreements, ` +
        `${split.pieceNonActive.length + split.cidNonActive.length} outside`,
    );

    return {
      overall: computeOverallMetrics(split),
      byPreparation: computePreparationMetrics(split),
      byProvider: computeProviderMetrics(split),
      preparedContentOverall: computePreparedContentMetrics(catalog, split),
      errorAnalysis: computeErrorAnalysis(
        split.pieceActive,
        split.cidActive,
        this.providerNames(split, providers),
        errorAnalysisStatusCodes,
      ),
    };
  }

  /** Configured names win over names recorded in results. */
  private providerNames(split: SplitChecks, providers: readonly ProviderEndpoint[]): Map<string, string> {
    const names = new Map<string, string>();
    for (const check of [...split.pieceActive, ...split.cidActive]) {
      if (check.providerName && !names.has(check.providerId)) {
        names.set(check.providerId, check.providerName);
      }
    }
    for (const provider of providers) {
      names.set(provider.id, provider.name);
    }
    return names;
  }
}
