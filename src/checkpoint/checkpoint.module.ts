import { Module } from "@nestjs/common";
import { CheckpointService } from "./checkpoint.service.js";

@Module({
  providers: [CheckpointService],
  exports: [CheckpointService],
})
export class CheckpointModule {}
