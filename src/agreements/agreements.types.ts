import Joi from "joi";

/**
 * Agreement row as found in the deals export. Only the fields the audit reads
 * are declared; everything else is carried through untouched.
 */
export type RawAgreementRecord = {
  pieceCid: string;
  provider?: string;
  providerid?: string;
  provider_id?: string;
  providerId?: string;
  state: string;
  dealId?: string | number | null;
  pieceSize?: number | null;
  startEpoch?: number | null;
  endEpoch?: number | null;
  updatedAt?: string | null;
  createdAt?: string | null;
};

/**
 * Normalized agreement for one (pieceCid, provider) pair.
 */
export type AgreementRecord = {
  pieceCid: string;
  providerId: string;
  state: string;
  dealId: string | null;
  pieceSize: number | null;
  startEpoch: number | null;
  endEpoch: number | null;
  /** updatedAt, falling back to createdAt. */
  updatedAt: string | null;
};

export type RejectedAgreementRecord = {
  index: number;
  reason: string;
};

const providerField = Joi.string().trim().allow("");

export const rawAgreementRecordSchema = Joi.object<RawAgreementRecord>({
  pieceCid: Joi.string().trim().min(1).required(),
  provider: providerField,
  providerid: providerField,
  provider_id: providerField,
  providerId: providerField,
  state: Joi.string().trim().min(1).required(),
  dealId: Joi.alternatives(Joi.string(), Joi.number()).allow(null),
  pieceSize: Joi.number().allow(null),
  startEpoch: Joi.number().allow(null),
  endEpoch: Joi.number().allow(null),
  updatedAt: Joi.string().allow(null, ""),
  createdAt: Joi.string().allow(null, ""),
})
  .unknown(true)
  .required();

/**
 * Validates one raw row and normalizes the provider and timestamp fields.
 *
 * @throws Error if a required field is missing or has the wrong type
 */
export function validateAgreementRecord(value: unknown): AgreementRecord {
  const { error, value: row } = rawAgreementRecordSchema.validate(value, { abortEarly: false });
  if (error) {
    throw new Error(`Invalid agreement record format: ${error.message}`);
  }

  const providerId = row.provider || row.providerid || row.provider_id || row.providerId;
  if (!providerId) {
    throw new Error("Invalid agreement record format: missing provider");
  }

  return {
    pieceCid: row.pieceCid,
    providerId,
    state: row.state,
    dealId: row.dealId === undefined || row.dealId === null ? null : String(row.dealId),
    pieceSize: row.pieceSize ?? null,
    startEpoch: row.startEpoch ?? null,
    endEpoch: row.endEpoch ?? null,
    updatedAt: row.updatedAt || row.createdAt || null,
  };
}
