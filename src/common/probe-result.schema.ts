import Joi from "joi";
import { ProbeStatus, type ProbeResult, RetrievalType } from "./types.js";

const nullableString = Joi.string().allow(null, "");

export const probeResultSchema = Joi.object<ProbeResult>({
  retrievalType: Joi.string()
    .valid(...Object.values(RetrievalType))
    .required(),
  itemId: Joi.string().min(1).required(),
  pieceCid: Joi.string().allow("").required(),
  preparationId: Joi.string().allow("").required(),
  providerId: Joi.string().min(1).required(),
  providerName: Joi.string().allow("").required(),
  url: nullableString.required(),
  status: Joi.string()
    .valid(...Object.values(ProbeStatus))
    .required(),
  statusCode: Joi.number().integer().allow(null).required(),
  contentLength: Joi.number().allow(null).required(),
  errorMessage: nullableString.required(),
  responseBody: nullableString.required(),
  responseTimeMs: Joi.number().required(),
  timestamp: Joi.string().isoDate().required(),
  agreementState: nullableString.required(),
  dealId: nullableString.required(),
});

/**
 * Validates one persisted probe result.
 *
 * @throws Error if validation fails
 */
export function validateProbeResult(value: unknown): ProbeResult {
  const { error, value: result } = probeResultSchema.validate(value, { abortEarly: false, convert: false });
  if (error) {
    throw new Error(`Invalid probe result format: ${error.message}`);
  }
  return result;
}

/** Identity of a probe across runs: one result per (type, item, provider). */
export function probeResultKey(retrievalType: RetrievalType, itemId: string, providerId: string): string {
  return `${retrievalType}\u0000${itemId}\u0000${providerId}`;
}
