import * as crypto from "node:crypto";
import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import * as fs from "fs";
import * as path from "path";
import { toErrorMessage, toStructuredError } from "../common/logging.js";
import { probeResultKey, validateProbeResult } from "../common/probe-result.schema.js";
import type { ProbeResult } from "../common/types.js";
import type { IConfig } from "../config/app.config.js";
import { CHECKPOINT_VERSION, type CheckpointFile, checkpointEnvelopeSchema } from "./checkpoint.types.js";

export type CheckpointEntries = Map<string, ProbeResult>;

/** UTC timestamp in `YYYYmmdd_HHMMSS_mmm` form. */
export function formatBackupTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, "")}_${iso.slice(11, 19).replace(/:/g, "")}_${iso.slice(20, 23)}`;
}

export function toCheckpointEntries(results: Iterable<ProbeResult>): CheckpointEntries {
  const entries: CheckpointEntries = new Map();
  for (const result of results) {
    entries.set(probeResultKey(result.retrievalType, result.itemId, result.providerId), result);
  }
  return entries;
}

/**
 * Durable snapshot of completed probes. A single writer flushes the full
 * snapshot at batch boundaries: temp file, backup of the prior file, rename.
 */
@Injectable()
export class CheckpointService {
  private readonly logger = new Logger(CheckpointService.name);

  constructor(private readonly configService: ConfigService<IConfig, true>) {}

  get checkpointPath(): string {
    return this.configService.get("paths").checkpointFile;
  }

  /**
   * Returns the recorded entries, or null when there is no usable checkpoint.
   * A corrupt or truncated file is treated as absent.
   */
  async load(): Promise<CheckpointEntries | null> {
    const filePath = this.checkpointPath;
    let raw: string;
    try {
      raw = await fs.promises.readFile(filePath, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.log(`No checkpoint at ${filePath}; starting from scratch`);
        return null;
      }
      this.warnInvalid(filePath, toErrorMessage(error));
      return null;
    }

    try {
      const entries = this.parse(raw);
      this.logger.log(`Loaded ${entries.size} checkpoint entries from ${filePath}`);
      return entries;
    } catch (error) {
      this.warnInvalid(filePath, toErrorMessage(error));
      return null;
    }
  }

  async save(entries: CheckpointEntries, now: Date = new Date()): Promise<void> {
    const filePath = this.checkpointPath;
    const directory = path.dirname(filePath);
    await fs.promises.mkdir(directory, { recursive: true });

    const snapshot: CheckpointFile = {
      version: CHECKPOINT_VERSION,
      updatedAt: now.toISOString(),
      entryCount: entries.size,
      entries: [...entries.values()],
    };

    const tempPath = path.join(directory, `.${path.basename(filePath)}.${crypto.randomBytes(6).toString("hex")}.tmp`);
    try {
      await fs.promises.writeFile(tempPath, JSON.stringify(snapshot), "utf8");
      await this.backup(now);
      await fs.promises.rename(tempPath, filePath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      this.logger.error({
        event: "checkpoint_save_failed",
        message: "Failed to write checkpoint",
        filePath,
        error: toStructuredError(error),
      });
      throw error;
    }
    this.logger.debug(`Saved checkpoint with ${entries.size} entries to ${filePath}`);
  }

  /**
   * Copies the current checkpoint aside and deletes it so the next run starts fresh.
   */
  async backupAndRemove(now: Date = new Date()): Promise<string | null> {
    const backupPath = await this.backup(now);
    await fs.promises.rm(this.checkpointPath, { force: true });
    if (backupPath) {
      this.logger.log(`Checkpoint reset; previous state kept at ${backupPath}`);
    }
    return backupPath;
  }

  private async backup(now: Date): Promise<string | null> {
    const { maxBackups } = this.configService.get("checkpoint");
    const filePath = this.checkpointPath;
    if (maxBackups === 0 || !fs.existsSync(filePath)) {
      return null;
    }

    // Same-millisecond flushes take the next free timestamp.
    let stamp = now.getTime();
    let backupPath = this.backupPathFor(stamp);
    while (fs.existsSync(backupPath)) {
      stamp++;
      backupPath = this.backupPathFor(stamp);
    }
    await fs.promises.copyFile(filePath, backupPath);
    await this.pruneBackups(maxBackups);
    return backupPath;
  }

  private async pruneBackups(maxBackups: number): Promise<void> {
    const directory = path.dirname(this.checkpointPath);
    const prefix = this.backupPrefix();
    const backups = (await fs.promises.readdir(directory))
      .filter((entry) => entry.startsWith(prefix) && entry.endsWith(".json"))
      .sort();

    for (const stale of backups.slice(0, Math.max(0, backups.length - maxBackups))) {
      await fs.promises.rm(path.join(directory, stale), { force: true });
    }
  }

  private backupPathFor(epochMs: number): string {
    const name = `${this.backupPrefix()}${formatBackupTimestamp(new Date(epochMs))}.json`;
    return path.join(path.dirname(this.checkpointPath), name);
  }

  private backupPrefix(): string {
    const name = path.basename(this.checkpointPath);
    const stem = name.endsWith(".json") ? name.slice(0, -".json".length) : name;
    return `${stem}.backup_`;
  }

  private parse(raw: string): CheckpointEntries {
    const parsed: unknown = JSON.parse(raw);
    const { error, value: envelope } = checkpointEnvelopeSchema.validate(parsed, { abortEarly: false });
    if (error) {
      throw new Error(`Invalid checkpoint format: ${error.message}`);
    }

    const { entries } = envelope;
    if (entries.length !== envelope.entryCount) {
      throw new Error(`Checkpoint declares ${envelope.entryCount} entries but holds ${entries.length}`);
    }
    return toCheckpointEntries(entries.map((entry) => validateProbeResult(entry)));
  }

  private warnInvalid(filePath: string, reason: string): void {
    this.logger.warn({
      event: "checkpoint_invalid",
      message: "Ignoring unusable checkpoint; all pairs will be probed",
      filePath,
      reason,
    });
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
