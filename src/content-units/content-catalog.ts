import type { ActiveAgreementSet } from "../agreements/active-agreement-set.js";
import { type ContentUnit, RetrievalType } from "../common/types.js";
import { extractFileType } from "../classification/file-types.js";
import type { ContentCatalog, PreparationFiles, PreparationPieces } from "./content-units.types.js";

/**
 * Joins file and piece metadata into the unit lists the prober walks.
 *
 * A CID or piece listed more than once keeps the attributes of its first
 * occurrence in preparation order; later duplicates still count toward file
 * totals but are never reclassified.
 */
export function buildContentCatalog(
  filePreparations: Map<string, PreparationFiles>,
  piecePreparations: Map<string, PreparationPieces>,
  agreements: ActiveAgreementSet,
): ContentCatalog {
  const pieces = new Map<string, ContentUnit>();
  const cids = new Map<string, ContentUnit>();

  const addPiece = (pieceCid: string, preparationId: string, fileSize: number | null): void => {
    if (pieces.has(pieceCid)) {
      return;
    }
    pieces.set(pieceCid, {
      kind: RetrievalType.PIECE,
      id: pieceCid,
      pieceCid,
      preparationId,
      fileName: null,
      fileSize,
      fileType: null,
      candidateProviders: agreements.candidateProviders(pieceCid),
    });
  };

  for (const preparation of filePreparations.values()) {
    for (const row of preparation.files) {
      if (row.pieceCid) {
        addPiece(row.pieceCid, preparation.preparationId, null);
      }
      if (!row.cid || cids.has(row.cid)) {
        continue;
      }
      cids.set(row.cid, {
        kind: RetrievalType.CID,
        id: row.cid,
        pieceCid: row.pieceCid,
        preparationId: preparation.preparationId,
        fileName: row.fileName || null,
        fileSize: row.size,
        fileType: extractFileType(row.fileName),
        candidateProviders: agreements.candidateProviders(row.pieceCid),
      });
    }
  }

  for (const preparation of piecePreparations.values()) {
    for (const piece of preparation.pieces) {
      addPiece(piece.pieceCid, preparation.preparationId, piece.fileSize);
    }
  }

  return {
    filePreparations,
    piecePreparations,
    pieces: [...pieces.values()],
    cids: [...cids.values()],
  };
}

/**
 * Orders preparation ids numerically, then non-numeric ids alphabetically.
 */
export function comparePreparationIds(left: string, right: string): number {
  const leftNumeric = /^\d+$/.test(left);
  const rightNumeric = /^\d+$/.test(right);
  if (leftNumeric && rightNumeric) {
    return Number(left) - Number(right);
  }
  if (leftNumeric !== rightNumeric) {
    return leftNumeric ? -1 : 1;
  }
  return left.localeCompare(right);
}
