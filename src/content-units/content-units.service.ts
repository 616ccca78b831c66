import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { parse } from "csv-parse/sync";
import * as fs from "fs";
import * as path from "path";
import type { ActiveAgreementSet } from "../agreements/active-agreement-set.js";
import { InputSourceError } from "../common/errors.js";
import { readJsonFile } from "../common/json-file.js";
import { toErrorMessage } from "../common/logging.js";
import type { IConfig } from "../config/app.config.js";
import { buildContentCatalog, comparePreparationIds } from "./content-catalog.js";
import {
  type ContentCatalog,
  type FileMetadataRow,
  normalizePreparationId,
  parseByteSize,
  type PieceMetadataRow,
  type PreparationFiles,
  type PreparationPieces,
  preparationIdFromFileName,
  rawFileMetadataRowSchema,
  type RawPieceMetadataGroup,
  validatePieceMetadataFile,
} from "./content-units.types.js";

const sortByPreparation = <T>(entries: Map<string, T>): Map<string, T> =>
  new Map([...entries.entries()].sort(([left], [right]) => comparePreparationIds(left, right)));

@Injectable()
export class ContentUnitsService {
  private readonly logger = new Logger(ContentUnitsService.name);

  constructor(private readonly configService: ConfigService<IConfig, true>) {}

  async loadCatalog(agreements: ActiveAgreementSet): Promise<ContentCatalog> {
    const { fileMetadataDir, pieceMetadataDir } = this.configService.get("paths");
    const filePreparations = await this.loadFileMetadata(fileMetadataDir);
    const piecePreparations = await this.loadPieceMetadata(pieceMetadataDir);
    const catalog = buildContentCatalog(filePreparations, piecePreparations, agreements);

    this.logger.log(
      `Catalog has ${catalog.pieces.length} pieces and ${catalog.cids.length} CIDs ` +
        `across ${new Set([...filePreparations.keys(), ...piecePreparations.keys()]).size} preparations`,
    );
    return catalog;
  }

  /**
   * Reads every `*.csv` file in the directory.
   *
   * @throws InputSourceError when the directory or a file cannot be read
   */
  async loadFileMetadata(directory: string): Promise<Map<string, PreparationFiles>> {
    const csvFiles = await this.listFiles(directory, ".csv", true);
    const preparations = new Map<string, PreparationFiles>();

    for (const fileName of csvFiles) {
      const filePath = path.join(directory, fileName);
      const records = await this.parseCsv(filePath);
      const filePreparationId = preparationIdFromFileName(fileName);
      let loaded = 0;

      records.forEach((record, index) => {
        const row = this.toFileMetadataRow(record, filePreparationId);
        if (typeof row === "string") {
          this.logger.warn({
            event: "file_metadata_row_skipped",
            message: "Skipping malformed file metadata row",
            filePath,
            row: index + 2,
            reason: row,
          });
          return;
        }

        const preparation = preparations.get(row.preparationId) ?? {
          preparationId: row.preparationId,
          sourceFile: fileName,
          files: [],
        };
        preparation.files.push(row);
        preparations.set(row.preparationId, preparation);
        loaded += 1;
      });

      this.logger.log(`Loaded ${loaded} file records from ${fileName}`);
    }

    return sortByPreparation(preparations);
  }

  /**
   * Reads every `*.json` file in the directory. A missing directory yields no
   * pieces; a malformed file is skipped with a warning.
   */
  async loadPieceMetadata(directory: string): Promise<Map<string, PreparationPieces>> {
    const jsonFiles = await this.listFiles(directory, ".json", false);
    const preparations = new Map<string, PreparationPieces>();

    for (const fileName of jsonFiles) {
      const filePath = path.join(directory, fileName);
      const filePreparationId = preparationIdFromFileName(fileName);

      let groups: RawPieceMetadataGroup[];
      try {
        groups = validatePieceMetadataFile(await readJsonFile(filePath));
      } catch (error) {
        this.logger.warn({
          event: "piece_metadata_file_skipped",
          message: "Skipping unreadable piece metadata file",
          filePath,
          reason: toErrorMessage(error),
        });
        continue;
      }

      for (const group of groups) {
        const preparationId = normalizePreparationId(group.attachmentId) ?? filePreparationId;
        if (!preparationId) {
          this.logger.warn({
            event: "piece_metadata_group_skipped",
            message: "Piece metadata group has no preparation id",
            filePath,
          });
          continue;
        }

        const preparation = preparations.get(preparationId) ?? { preparationId, sourceFile: fileName, pieces: [] };
        for (const entry of group.pieces) {
          const piece: PieceMetadataRow = {
            pieceCid: entry.pieceCid,
            pieceSize: entry.pieceSize ?? null,
            fileSize: entry.fileSize ?? null,
            numOfFiles: entry.numOfFiles ?? 0,
            preparationId,
          };
          preparation.pieces.push(piece);
        }
        preparations.set(preparationId, preparation);
      }
    }

    return sortByPreparation(preparations);
  }

  private toFileMetadataRow(record: unknown, filePreparationId: string | null): FileMetadataRow | string {
    const { error, value } = rawFileMetadataRowSchema.validate(record);
    if (error) {
      return error.message;
    }
    if (!value.cid && !value.pieceCid) {
      return "row has neither cid nor pieceCid";
    }
    const preparationId = normalizePreparationId(value.attachmentId) ?? filePreparationId;
    if (!preparationId) {
      return "row has no attachmentId and the file name has no prep<N> token";
    }
    return {
      cid: value.cid,
      pieceCid: value.pieceCid,
      size: parseByteSize(value.size),
      fileName: value.fileName,
      preparationId,
    };
  }

  private async parseCsv(filePath: string): Promise<unknown[]> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(filePath, "utf8");
    } catch (error) {
      throw InputSourceError.unreadable(filePath, error);
    }

    try {
      const records: unknown = parse(raw, {
        columns: true,
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
      });
      return Array.isArray(records) ? records : [];
    } catch (error) {
      throw new InputSourceError(filePath, `Invalid CSV: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  private async listFiles(directory: string, extension: string, required: boolean): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(directory);
    } catch (error) {
      if (required) {
        throw InputSourceError.unreadable(directory, error);
      }
      this.logger.warn({
        event: "metadata_directory_missing",
        message: `Metadata directory not found: ${directory}`,
        directory,
      });
      return [];
    }
    return entries.filter((entry) => entry.toLowerCase().endsWith(extension)).sort();
  }
}
