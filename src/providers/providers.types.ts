import Joi from "joi";
import type { ProviderEndpoint } from "../common/types.js";

type RawProviderEntry = {
  name: string;
  retrievalEndpoint: string;
};

const providersFileSchema = Joi.object<Record<string, RawProviderEntry>>()
  .pattern(
    Joi.string().trim().min(1),
    Joi.object<RawProviderEntry>({
      name: Joi.string().trim().min(1).required(),
      retrievalEndpoint: Joi.string()
        .trim()
        .uri({ scheme: ["http", "https"] })
        .required(),
    }).unknown(true),
  )
  .min(1)
  .required();

/**
 * Validates the provider endpoint configuration: `{ providerId: { name, retrievalEndpoint } }`.
 *
 * @throws Error if validation fails
 */
export function validateProvidersFile(value: unknown): ProviderEndpoint[] {
  const { error, value: entries } = providersFileSchema.validate(value, { abortEarly: false });
  if (error) {
    throw new Error(`Invalid providers file format: ${error.message}`);
  }
  return Object.entries(entries)
    .map(([id, entry]) => ({
      id,
      name: entry.name,
      retrievalEndpoint: entry.retrievalEndpoint.replace(/\/+$/, ""),
    }))
    .sort((left, right) => left.id.localeCompare(right.id));
}
