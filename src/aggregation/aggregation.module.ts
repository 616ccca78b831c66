import { Module } from "@nestjs/common";
import { MetricsAggregatorService } from "./metrics-aggregator.service.js";

@Module({
  providers: [MetricsAggregatorService],
  exports: [MetricsAggregatorService],
})
export class AggregationModule {}
