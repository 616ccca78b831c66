import { Module } from "@nestjs/common";
import { ContentUnitsService } from "./content-units.service.js";

@Module({
  providers: [ContentUnitsService],
  exports: [ContentUnitsService],
})
export class ContentUnitsModule {}
