import Joi from "joi";
import type { ProbeResult } from "../common/types.js";

export const CHECKPOINT_VERSION = 1;

export type CheckpointFile = {
  version: typeof CHECKPOINT_VERSION;
  updatedAt: string;
  entryCount: number;
  entries: ProbeResult[];
};

type CheckpointEnvelope = {
  version: number;
  updatedAt: string;
  entryCount: number;
  entries: unknown[];
};

/** Outer envelope; entries are validated one by one. */
export const checkpointEnvelopeSchema = Joi.object<CheckpointEnvelope>({
  version: Joi.number().valid(CHECKPOINT_VERSION).required(),
  updatedAt: Joi.string().isoDate().required(),
  entryCount: Joi.number().integer().min(0).required(),
  entries: Joi.array().required(),
})
  .unknown(false)
  .required();
