export enum RetrievalType {
  PIECE = "piece",
  CID = "cid",
}

export enum ProbeStatus {
  AVAILABLE = "available",
  UNAVAILABLE = "unavailable",
  ERROR = "error",
}

/** Status code recorded for a pair skipped because it has no active agreement. */
export const NO_ACTIVE_AGREEMENT_STATUS_CODE = -1;
export const NO_ACTIVE_AGREEMENT_MESSAGE = "No active agreement with this provider";

export interface ProviderEndpoint {
  id: string;
  name: string;
  /** Base URL; `/piece/<pieceCid>` or `/ipfs/<cid>` is appended. */
  retrievalEndpoint: string;
}

/**
 * A piece or a CID to probe. Immutable for the lifetime of a run.
 */
export interface ContentUnit {
  kind: RetrievalType;
  /** pieceCid for pieces, cid for CIDs. */
  id: string;
  pieceCid: string;
  preparationId: string;
  fileName: string | null;
  fileSize: number | null;
  fileType: string | null;
  /** Providers with any agreement for the unit's piece, active or not. */
  candidateProviders: ReadonlySet<string>;
}

/**
 * One recorded retrieval attempt for a (unit, provider) pair.
 */
export interface ProbeResult {
  retrievalType: RetrievalType;
  itemId: string;
  pieceCid: string;
  preparationId: string;
  providerId: string;
  providerName: string;
  url: string | null;
  status: ProbeStatus;
  /** -1 when skipped without an active agreement, null when no response arrived. */
  statusCode: number | null;
  contentLength: number | null;
  errorMessage: string | null;
  responseBody: string | null;
  responseTimeMs: number;
  timestamp: string;
  agreementState: string | null;
  dealId: string | null;
}
