import { Injectable, Logger } from "@nestjs/common";
import { InjectMetric } from "@willsoto/nestjs-prometheus";
import * as fs from "fs";
import * as path from "path";
import { type Counter, type Histogram, type Registry, register } from "prom-client";
import { NO_ACTIVE_AGREEMENT_STATUS_CODE, type ProbeResult } from "../common/types.js";
import { classifyHttpResponseCode } from "./http-code-class.js";

@Injectable()
export class ProbeMetricsService {
  private readonly logger = new Logger(ProbeMetricsService.name);

  constructor(
    @InjectMetric("retrieval_probes_total")
    private readonly probesCounter: Counter,
    @InjectMetric("retrieval_probe_duration_seconds")
    private readonly probeDuration: Histogram,
    @InjectMetric("retrieval_probes_skipped_total")
    private readonly skippedCounter: Counter,
    @InjectMetric("checkpoint_flushes_total")
    private readonly checkpointFlushCounter: Counter,
  ) {}

  recordProbe(result: ProbeResult): void {
    const provider = result.providerId;
    const retrievalType = result.retrievalType;

    if (result.statusCode === NO_ACTIVE_AGREEMENT_STATUS_CODE) {
      this.skippedCounter.inc({ retrieval_type: retrievalType, provider });
      return;
    }

    this.probesCounter.inc({
      retrieval_type: retrievalType,
      provider,
      status: result.status,
      http_code_class: classifyHttpResponseCode(result.statusCode),
    });
    if (result.responseTimeMs > 0) {
      this.probeDuration.observe({ retrieval_type: retrievalType, provider }, result.responseTimeMs / 1000);
    }
  }

  recordCheckpointFlush(outcome: "success" | "error"): void {
    this.checkpointFlushCounter.inc({ outcome });
  }

  /**
   * Writes the registry in Prometheus text exposition format, for node
   * exporter's textfile collector or a pushgateway sidecar.
   */
  async writeTextfile(filePath: string, registry: Registry = register): Promise<void> {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, await registry.metrics(), "utf8");
    this.logger.log(`Wrote probe metrics to ${filePath}`);
  }
}
