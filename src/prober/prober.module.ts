import { Module } from "@nestjs/common";
import { AgreementsModule } from "../agreements/agreements.module.js";
import { CheckpointModule } from "../checkpoint/checkpoint.module.js";
import { ContentUnitsModule } from "../content-units/content-units.module.js";
import { HttpClientModule } from "../http-client/http-client.module.js";
import { ProvidersModule } from "../providers/providers.module.js";
import { ProbeRunService } from "./probe-run.service.js";
import { RetrievalProberService } from "./retrieval-prober.service.js";

@Module({
  imports: [AgreementsModule, CheckpointModule, ContentUnitsModule, HttpClientModule, ProvidersModule],
  providers: [RetrievalProberService, ProbeRunService],
  exports: [RetrievalProberService, ProbeRunService],
})
export class ProberModule {}
