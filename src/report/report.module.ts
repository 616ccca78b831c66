import { Module } from "@nestjs/common";
import { AgreementsModule } from "../agreements/agreements.module.js";
import { AggregationModule } from "../aggregation/aggregation.module.js";
import { ContentUnitsModule } from "../content-units/content-units.module.js";
import { ProvidersModule } from "../providers/providers.module.js";
import { ReportService } from "./report.service.js";

@Module({
  imports: [AgreementsModule, AggregationModule, ContentUnitsModule, ProvidersModule],
  providers: [ReportService],
  exports: [ReportService],
})
export class ReportModule {}
