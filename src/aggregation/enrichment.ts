import type { ActiveAgreementSet } from "../agreements/active-agreement-set.js";
import { classify } from "../classification/outcome.js";
import { UNKNOWN_FILE_TYPE } from "../classification/file-types.js";
import { type ContentUnit, type ProbeResult, RetrievalType } from "../common/types.js";
import type { ContentCatalog } from "../content-units/content-units.types.js";
import type { EnrichedCheck, SplitChecks } from "./aggregation.types.js";

const UNKNOWN_PREPARATION = "unknown";

/**
 * Joins probe results with catalog attributes and splits them by whether the
 * (pieceCid, provider) pair has an active agreement.
 */
export function enrichChecks(
  results: readonly ProbeResult[],
  agreements: ActiveAgreementSet,
  catalog: Pick<ContentCatalog, "pieces" | "cids">,
): SplitChecks {
  const pieces = new Map(catalog.pieces.map((unit): [string, ContentUnit] => [unit.id, unit]));
  const cids = new Map(catalog.cids.map((unit): [string, ContentUnit] => [unit.id, unit]));
  const split: SplitChecks = { pieceActive: [], pieceNonActive: [], cidActive: [], cidNonActive: [] };

  for (const result of results) {
    const isPiece = result.retrievalType === RetrievalType.PIECE;
    const unit = (isPiece ? pieces : cids).get(result.itemId);
    const pieceCid = result.pieceCid || unit?.pieceCid || "";
    const active = agreements.has(pieceCid, result.providerId);

    const check: EnrichedCheck = {
      retrievalType: result.retrievalType,
      itemId: result.itemId,
      pieceCid,
      preparationId: result.preparationId || unit?.preparationId || UNKNOWN_PREPARATION,
      providerId: result.providerId,
      providerName: result.providerName,
      status: result.status,
      statusCode: result.statusCode,
      errorMessage: result.errorMessage,
      responseBody: result.responseBody,
      fileName: unit?.fileName ?? null,
      fileType: unit?.fileType ?? UNKNOWN_FILE_TYPE,
      fileSize: unit?.fileSize ?? null,
      outcome: classify(result.status, result.statusCode),
      active,
    };

    if (isPiece) {
      (active ? split.pieceActive : split.pieceNonActive).push(check);
    } else {
      (active ? split.cidActive : split.cidNonActive).push(check);
    }
  }

  return split;
}
