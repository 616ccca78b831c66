import { DataIntegrityError } from "../common/errors.js";
import { type AgreementRecord, type RejectedAgreementRecord, validateAgreementRecord } from "./agreements.types.js";

const pairKey = (pieceCid: string, providerId: string): string => `${pieceCid}\u0000${providerId}`;

const isNewer = (candidate: AgreementRecord, current: AgreementRecord): boolean =>
  (candidate.updatedAt ?? "") > (current.updatedAt ?? "");

export const isActiveState = (state: string): boolean => state.toLowerCase() === "active";

/**
 * Lookup of (pieceCid, provider) pairs with an agreement currently in force.
 * Built from the authoritative agreement list only; flags carried on probe or
 * metadata records are never consulted.
 */
export class ActiveAgreementSet {
  private readonly activePairs = new Set<string>();
  private readonly latestActive = new Map<string, AgreementRecord>();
  private readonly latestAny = new Map<string, AgreementRecord>();
  private readonly providersByPiece = new Map<string, Set<string>>();
  private readonly activeProvidersByPiece = new Map<string, Set<string>>();

  static empty(): ActiveAgreementSet {
    return new ActiveAgreementSet();
  }

  /**
   * @throws DataIntegrityError when `records` is not an array
   */
  static fromRecords(
    records: unknown,
    source?: string,
  ): { agreements: ActiveAgreementSet; rejected: RejectedAgreementRecord[] } {
    if (!Array.isArray(records)) {
      throw new DataIntegrityError("Agreement records must be a JSON array", source);
    }

    const agreements = new ActiveAgreementSet();
    const rejected: RejectedAgreementRecord[] = [];
    records.forEach((value: unknown, index) => {
      try {
        agreements.add(validateAgreementRecord(value));
      } catch (error) {
        rejected.push({ index, reason: error instanceof Error ? error.message : String(error) });
      }
    });
    return { agreements, rejected };
  }

  private add(record: AgreementRecord): void {
    const key = pairKey(record.pieceCid, record.providerId);

    const providers = this.providersByPiece.get(record.pieceCid) ?? new Set<string>();
    providers.add(record.providerId);
    this.providersByPiece.set(record.pieceCid, providers);

    const current = this.latestAny.get(key);
    if (!current || isNewer(record, current)) {
      this.latestAny.set(key, record);
    }

    if (!isActiveState(record.state)) {
      return;
    }

    this.activePairs.add(key);
    const activeProviders = this.activeProvidersByPiece.get(record.pieceCid) ?? new Set<string>();
    activeProviders.add(record.providerId);
    this.activeProvidersByPiece.set(record.pieceCid, activeProviders);

    const currentActive = this.latestActive.get(key);
    if (!currentActive || isNewer(record, currentActive)) {
      this.latestActive.set(key, record);
    }
  }

  /** Number of active (pieceCid, provider) pairs. */
  get size(): number {
    return this.activePairs.size;
  }

  has(pieceCid: string, providerId: string): boolean {
    return this.activePairs.has(pairKey(pieceCid, providerId));
  }

  /**
   * Latest active agreement for the pair, else the latest agreement of any state.
   */
  getAgreement(pieceCid: string, providerId: string): AgreementRecord | undefined {
    const key = pairKey(pieceCid, providerId);
    return this.latestActive.get(key) ?? this.latestAny.get(key);
  }

  /** Providers with any agreement for the piece, active or not. */
  candidateProviders(pieceCid: string): ReadonlySet<string> {
    return this.providersByPiece.get(pieceCid) ?? new Set<string>();
  }

  get pieceCount(): number {
    return this.activeProvidersByPiece.size;
  }
}
