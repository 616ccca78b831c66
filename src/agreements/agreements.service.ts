import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import * as fs from "fs";
import { InputSourceError } from "../common/errors.js";
import { readJsonFile } from "../common/json-file.js";
import type { IConfig } from "../config/app.config.js";
import { ActiveAgreementSet } from "./active-agreement-set.js";

const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class AgreementsService {
  private readonly logger = new Logger(AgreementsService.name);

  constructor(private readonly configService: ConfigService<IConfig, true>) {}

  /**
   * Builds the active-agreement set from raw records, logging and skipping
   * rows that fail validation.
   */
  buildActiveAgreementSet(records: unknown, source?: string): ActiveAgreementSet {
    const { agreements, rejected } = ActiveAgreementSet.fromRecords(records, source);

    for (const rejection of rejected) {
      this.logger.warn({
        event: "agreement_record_skipped",
        message: "Skipping malformed agreement record",
        source,
        index: rejection.index,
        reason: rejection.reason,
      });
    }

    this.logger.log(
      `Loaded ${agreements.size} active agreements across ${agreements.pieceCount} pieces` +
        (rejected.length > 0 ? ` (${rejected.length} records skipped)` : ""),
    );
    return agreements;
  }

  /**
   * Loads the deals export from disk.
   *
   * @throws InputSourceError when the file is missing, unreadable or not JSON
   */
  async loadAgreements(filePath: string = this.configService.get("paths").dealsFile): Promise<ActiveAgreementSet> {
    let modifiedAt: Date;
    try {
      modifiedAt = (await fs.promises.stat(filePath)).mtime;
    } catch (error) {
      throw InputSourceError.unreadable(filePath, error);
    }
    this.warnIfStale(filePath, modifiedAt);

    this.logger.log(`Loading agreements from ${filePath}`);
    const records = await readJsonFile(filePath);
    return this.buildActiveAgreementSet(records, filePath);
  }

  private warnIfStale(filePath: string, modifiedAt: Date, now: Date = new Date()): void {
    const { staleAfterDays } = this.configService.get("agreements");
    const ageDays = Math.floor((now.getTime() - modifiedAt.getTime()) / DAY_MS);
    if (ageDays > staleAfterDays) {
      this.logger.warn({
        event: "agreements_file_stale",
        message: `Agreements file is ${ageDays} days old; refresh it for accurate results`,
        filePath,
        ageDays,
        lastModified: modifiedAt.toISOString(),
      });
    }
  }
}
