import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { CheckpointService, type CheckpointEntries } from "../checkpoint/checkpoint.service.js";
import { toErrorMessage, toStructuredError } from "../common/logging.js";
import { probeResultKey } from "../common/probe-result.schema.js";
import {
  type ContentUnit,
  NO_ACTIVE_AGREEMENT_MESSAGE,
  NO_ACTIVE_AGREEMENT_STATUS_CODE,
  type ProbeResult,
  ProbeStatus,
  RetrievalType,
} from "../common/types.js";
import { runWithConcurrency } from "../common/concurrency.js";
import type { IConfig } from "../config/app.config.js";
import { HttpClientService } from "../http-client/http-client.service.js";
import { type ProbeResponse, ProbeTimeoutError } from "../http-client/types.js";
import { ProbeMetricsService } from "../metrics/probe-metrics.service.js";
import { buildProbeUrl } from "./probe-url.js";
import type { ProbeRunOptions, ProbeRunResult, ProbeTask } from "./prober.types.js";

const REQUEST_TIMEOUT_MESSAGE = "Request timeout";

/** Socket and DNS failures reported as connection errors. */
const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return "cause" in error ? errorCode(error.cause) : undefined;
}

function describeTransportError(error: unknown): string {
  if (error instanceof ProbeTimeoutError) {
    return REQUEST_TIMEOUT_MESSAGE;
  }
  const message = toErrorMessage(error);
  const code = errorCode(error);
  return code && CONNECTION_ERROR_CODES.has(code) ? `Connection error: ${message}` : message;
}

/** A 2xx answer carrying content; 204 and an explicit zero length carry none. */
const hasContent = (response: ProbeResponse): boolean =>
  response.statusCode >= 200 && response.statusCode < 300 && response.statusCode !== 204 && response.contentLength !== 0;

type PendingTask = ProbeTask & { probeOverNetwork: boolean };

@Injectable()
export class RetrievalProberService {
  private readonly logger = new Logger(RetrievalProberService.name);

  constructor(
    private readonly httpClientService: HttpClientService,
    private readonly checkpointService: CheckpointService,
    private readonly probeMetrics: ProbeMetricsService,
    private readonly configService: ConfigService<IConfig, true>,
  ) {}

  /**
   * Probes one pair: HEAD first, GET when HEAD fails or answers without
   * content. Never throws; transport failures are recorded as `error` results.
   */
  async probe(task: ProbeTask, signal?: AbortSignal): Promise<ProbeResult> {
    const { unit, provider } = task;
    const url = buildProbeUrl(provider.retrievalEndpoint, unit.kind, unit.id);
    const startTime = performance.now();
    const elapsed = (): number => Math.round(performance.now() - startTime);

    try {
      let response: ProbeResponse | null = null;
      try {
        response = await this.httpClientService.probe(url, { method: "HEAD" }, signal);
      } catch (error) {
        this.logger.debug(`HEAD ${url} failed, falling back to GET: ${toErrorMessage(error)}`);
      }

      if (response === null || !hasContent(response)) {
        response = await this.httpClientService.probe(url, { method: "GET" }, signal);
      }

      const available = hasContent(response);
      return this.buildResult(task, {
        url,
        status: available ? ProbeStatus.AVAILABLE : ProbeStatus.UNAVAILABLE,
        statusCode: response.statusCode,
        contentLength: available ? response.contentLength : null,
        errorMessage: available ? null : `HTTP ${response.statusCode}`,
        responseBody: available ? null : response.bodyPreview,
        responseTimeMs: elapsed(),
      });
    } catch (error) {
      return this.buildResult(task, {
        url,
        status: ProbeStatus.ERROR,
        statusCode: null,
        contentLength: null,
        errorMessage: describeTransportError(error),
        responseBody: null,
        responseTimeMs: elapsed(),
      });
    }
  }

  /**
   * Result recorded for a pair without an active agreement when non-active
   * pairs are not probed.
   */
  buildSkippedResult(task: ProbeTask): ProbeResult {
    return this.buildResult(task, {
      url: null,
      status: ProbeStatus.UNAVAILABLE,
      statusCode: NO_ACTIVE_AGREEMENT_STATUS_CODE,
      contentLength: NO_ACTIVE_AGREEMENT_STATUS_CODE,
      errorMessage: NO_ACTIVE_AGREEMENT_MESSAGE,
      responseBody: null,
      responseTimeMs: NO_ACTIVE_AGREEMENT_STATUS_CODE,
    });
  }

  /**
   * Probes every unit against every provider, pieces before CIDs, resuming
   * from the checkpoint. The checkpoint is flushed after each batch.
   */
  async run(units: readonly ContentUnit[], options: ProbeRunOptions): Promise<ProbeRunResult> {
    const probeConfig = this.configService.get("probe");
    const batchSize = options.batchSize ?? probeConfig.batchSize;
    const concurrency = options.concurrency ?? probeConfig.concurrency;
    const nonActiveMode = options.nonActiveMode ?? probeConfig.nonActiveMode;
    const { providers, agreements, signal } = options;

    const entries: CheckpointEntries = (await this.checkpointService.load()) ?? new Map();
    const selected = this.selectUnits(units, options.preparationIds);

    let probed = 0;
    let skipped = 0;
    let reused = 0;
    let aborted = false;

    this.logger.log(
      `Probing ${selected.length} units against ${providers.length} providers ` +
        `(batch size ${batchSize}, concurrency ${concurrency}, non-active mode ${nonActiveMode})`,
    );

    for (let offset = 0; offset < selected.length; offset += batchSize) {
      const batchUnits = selected.slice(offset, offset + batchSize);
      const tasks: PendingTask[] = [];

      for (const unit of batchUnits) {
        for (const provider of providers) {
          const existing = entries.get(probeResultKey(unit.kind, unit.id, provider.id));
          if (existing && !(options.recheckSkipped && existing.statusCode === NO_ACTIVE_AGREEMENT_STATUS_CODE)) {
            reused++;
            continue;
          }
          tasks.push({
            unit,
            provider,
            agreement: agreements.getAgreement(unit.pieceCid, provider.id),
            probeOverNetwork: nonActiveMode === "probe" || agreements.has(unit.pieceCid, provider.id),
          });
        }
      }

      if (signal?.aborted) {
        aborted = true;
        break;
      }

      if (tasks.length === 0) {
        continue;
      }

      const { settled, notStarted } = await runWithConcurrency(
        tasks,
        async (task) => (task.probeOverNetwork ? this.probe(task) : this.buildSkippedResult(task)),
        { concurrency, stopSignal: signal },
      );

      let recorded = 0;
      for (const { item, result } of settled) {
        if (result.status === "rejected") {
          this.logger.error({
            event: "probe_failed_unexpectedly",
            message: "Probe threw instead of recording a result; pair stays pending",
            retrievalType: item.unit.kind,
            itemId: item.unit.id,
            providerId: item.provider.id,
            error: toStructuredError(result.reason),
          });
          continue;
        }
        const probeResult = result.value;
        entries.set(probeResultKey(probeResult.retrievalType, probeResult.itemId, probeResult.providerId), probeResult);
        this.probeMetrics.recordProbe(probeResult);
        recorded++;
        if (item.probeOverNetwork) {
          probed++;
        } else {
          skipped++;
        }
      }

      if (recorded > 0) {
        await this.flush(entries);
      }

      this.logger.log(
        `Batch ${Math.floor(offset / batchSize) + 1}: recorded ${recorded} results ` +
          `(${Math.min(offset + batchUnits.length, selected.length)}/${selected.length} units)`,
      );

      if (notStarted.length > 0 || signal?.aborted) {
        aborted = true;
        break;
      }
    }

    const pending = this.countUnrecorded(selected, providers, entries);
    if (aborted) {
      this.logger.warn({
        event: "probe_run_interrupted",
        message: "Probe run interrupted; completed results are checkpointed",
        probed,
        skipped,
        pending,
      });
    }

    this.logger.log(`Probe run finished: ${probed} probed, ${skipped} skipped, ${reused} already recorded`);
    return { results: [...entries.values()], probed, skipped, reused, pending, aborted };
  }

  private selectUnits(units: readonly ContentUnit[], preparationIds?: readonly string[]): ContentUnit[] {
    const filter = preparationIds && preparationIds.length > 0 ? new Set(preparationIds) : null;
    const selected = filter ? units.filter((unit) => filter.has(unit.preparationId)) : [...units];
    const pieces = selected.filter((unit) => unit.kind === RetrievalType.PIECE);
    const cids = selected.filter((unit) => unit.kind === RetrievalType.CID);
    return [...pieces, ...cids];
  }

  private countUnrecorded(
    units: readonly ContentUnit[],
    providers: ProbeRunOptions["providers"],
    entries: CheckpointEntries,
  ): number {
    let recorded = 0;
    for (const unit of units) {
      for (const provider of providers) {
        if (entries.has(probeResultKey(unit.kind, unit.id, provider.id))) {
          recorded++;
        }
      }
    }
    return units.length * providers.length - recorded;
  }

  private async flush(entries: CheckpointEntries): Promise<void> {
    try {
      await this.checkpointService.save(entries);
      this.probeMetrics.recordCheckpointFlush("success");
    } catch (error) {
      this.probeMetrics.recordCheckpointFlush("error");
      throw error;
    }
  }

  private buildResult(
    task: ProbeTask,
    outcome: Pick<
      ProbeResult,
      "url" | "status" | "statusCode" | "contentLength" | "errorMessage" | "responseBody" | "responseTimeMs"
    >,
  ): ProbeResult {
    const { unit, provider, agreement } = task;
    return {
      retrievalType: unit.kind,
      itemId: unit.id,
      pieceCid: unit.pieceCid,
      preparationId: unit.preparationId,
      providerId: provider.id,
      providerName: provider.name,
      ...outcome,
      timestamp: new Date().toISOString(),
      agreementState: agreement?.state ?? null,
      dealId: agreement?.dealId ?? null,
    };
  }
}
