import Joi from "joi";
import type { ContentUnit } from "../common/types.js";

/** One row of a file-metadata CSV after validation. */
export type FileMetadataRow = {
  cid: string;
  pieceCid: string;
  size: number | null;
  fileName: string;
  preparationId: string;
};

/** One piece of a piece-metadata JSON file after validation. */
export type PieceMetadataRow = {
  pieceCid: string;
  pieceSize: number | null;
  fileSize: number | null;
  numOfFiles: number;
  preparationId: string;
};

export type PreparationFiles = {
  preparationId: string;
  sourceFile: string;
  files: FileMetadataRow[];
};

export type PreparationPieces = {
  preparationId: string;
  sourceFile: string;
  pieces: PieceMetadataRow[];
};

/**
 * Everything known about prepared content for one run.
 */
export type ContentCatalog = {
  filePreparations: Map<string, PreparationFiles>;
  piecePreparations: Map<string, PreparationPieces>;
  /** Unique pieces, first occurrence wins. */
  pieces: ContentUnit[];
  /** Unique CIDs, first occurrence wins. */
  cids: ContentUnit[];
};

export type RawFileMetadataRow = {
  cid: string;
  pieceCid: string;
  size: string;
  fileName: string;
  attachmentId: string;
};

export const rawFileMetadataRowSchema = Joi.object<RawFileMetadataRow>({
  cid: Joi.string().trim().allow("").default(""),
  pieceCid: Joi.string().trim().allow("").default(""),
  size: Joi.string().trim().allow("").default(""),
  fileName: Joi.string().allow("").default(""),
  attachmentId: Joi.string().trim().allow("").default(""),
})
  .unknown(true)
  .required();

export type RawPieceMetadataEntry = {
  pieceCid: string;
  pieceSize?: number | null;
  fileSize?: number | null;
  numOfFiles?: number | null;
};

export type RawPieceMetadataGroup = {
  attachmentId?: string | number | null;
  pieces: RawPieceMetadataEntry[];
};

const rawPieceMetadataEntrySchema = Joi.object<RawPieceMetadataEntry>({
  pieceCid: Joi.string().trim().min(1).required(),
  pieceSize: Joi.number().allow(null),
  fileSize: Joi.number().allow(null),
  numOfFiles: Joi.number().integer().min(0).allow(null),
}).unknown(true);

export const pieceMetadataFileSchema = Joi.array()
  .items(
    Joi.object<RawPieceMetadataGroup>({
      attachmentId: Joi.alternatives(Joi.string(), Joi.number()).allow(null),
      pieces: Joi.array().items(rawPieceMetadataEntrySchema).required(),
    }).unknown(true),
  )
  .required();

/**
 * Validates a parsed piece-metadata file.
 *
 * @throws Error if the structure does not match `[{ pieces: [...] }]`
 */
export function validatePieceMetadataFile(value: unknown): RawPieceMetadataGroup[] {
  const { error, value: groups } = pieceMetadataFileSchema.validate(value, { abortEarly: false });
  if (error) {
    throw new Error(`Invalid piece metadata format: ${error.message}`);
  }
  return groups;
}

const PREPARATION_TOKEN = /prep(\d+)/;

/** Preparation id from a `prep<N>` token in a metadata file name. */
export function preparationIdFromFileName(fileName: string): string | null {
  const match = PREPARATION_TOKEN.exec(fileName);
  return match ? match[1] : null;
}

/**
 * Normalizes an attachment id to its integer form ("3.0" becomes "3").
 */
export function normalizePreparationId(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const text = String(value).trim();
  if (text.length === 0) {
    return null;
  }
  const numeric = Number(text);
  return Number.isFinite(numeric) && Number.isInteger(numeric) ? String(numeric) : text;
}

export function parseByteSize(value: string): number | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }
  return Number.parseInt(value, 10);
}
