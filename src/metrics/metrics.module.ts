import { Global, Module } from "@nestjs/common";
import { makeCounterProvider, makeHistogramProvider, PrometheusModule } from "@willsoto/nestjs-prometheus";
import { ProbeMetricsService } from "./probe-metrics.service.js";

const metricProviders = [
  // Probe outcomes by retrieval type, provider and HTTP code class.
  makeCounterProvider({
    name: "retrieval_probes_total",
    help: "Total number of retrieval probes performed",
    labelNames: ["retrieval_type", "provider", "status", "http_code_class"] as const,
  }),
  makeHistogramProvider({
    name: "retrieval_probe_duration_seconds",
    help: "Retrieval probe duration in seconds, HEAD and GET fallback included",
    labelNames: ["retrieval_type", "provider"] as const,
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30, 60],
  }),
  // Pairs recorded without a network call because no agreement is active.
  makeCounterProvider({
    name: "retrieval_probes_skipped_total",
    help: "Total number of pairs skipped for lack of an active agreement",
    labelNames: ["retrieval_type", "provider"] as const,
  }),
  makeCounterProvider({
    name: "checkpoint_flushes_total",
    help: "Total number of checkpoint flushes",
    labelNames: ["outcome"] as const,
  }),
];

@Global()
@Module({
  imports: [
    PrometheusModule.register({
      defaultMetrics: {
        enabled: false,
      },
      defaultLabels: {
        app: "retrieval-audit",
      },
    }),
  ],
  providers: [...metricProviders, ProbeMetricsService],
  exports: [ProbeMetricsService],
})
export class MetricsModule {}
