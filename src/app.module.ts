import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { AggregationModule } from "./aggregation/aggregation.module.js";
import { configValidationSchema, loadConfig } from "./config/app.config.js";
import { MetricsModule } from "./metrics/metrics.module.js";
import { ProberModule } from "./prober/prober.module.js";
import { ReportModule } from "./report/report.module.js";

@Module({
  imports: [
    ConfigModule.forRoot({
      load: [loadConfig],
      validationSchema: configValidationSchema,
      isGlobal: true,
    }),
    MetricsModule,
    ProberModule,
    AggregationModule,
    ReportModule,
  ],
})
export class AppModule {}
