import * as Joi from "joi";
import { TokenRecord } from "./interfaces";

const digest = Joi.string().hex().length(64);

export const tokenRecordSchema = Joi.object<TokenRecord>({
  digest: digest.required(),
  userId: Joi.string().max(255).required(),
  scopes: Joi.array().items(Joi.string()).required(),
  kind: Joi.string().valid("access", "refresh").required(),
  issuedAt: Joi.number().integer().positive().required(),
  expiresAt: Joi.number().integer().greater(Joi.ref("issuedAt")).required(),
  linkedDigest: digest.optional(),
  generation: Joi.number().integer().min(1).required(),
  sessionId: Joi.string().required(),
});

/**
 * Checks a record read back from an external store
 * @throws Error when the value is not a TokenRecord
 */
export function parseTokenRecord(value: unknown): TokenRecord {
  const result = tokenRecordSchema.validate(value, { convert: false });

  if (result.error) {
    throw new Error(`Malformed token record: ${result.error.message}`);
  }

  return result.value;
}
