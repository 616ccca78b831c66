import { RetrievalType } from "../common/types.js";

/**
 * Retrieval URL for a unit on a provider: `/piece/<pieceCid>` for pieces,
 * `/ipfs/<cid>` for CIDs.
 */
export function buildProbeUrl(endpoint: string, retrievalType: RetrievalType, itemId: string): string {
  const base = endpoint.replace(/\/+$/, "");
  const route = retrievalType === RetrievalType.PIECE ? "piece" : "ipfs";
  return `${base}/${route}/${itemId}`;
}
