import { createHash, randomBytes } from "crypto";
import { ITokenCodec } from "./interfaces";

const SECRET_BYTES = 32;
const WELL_FORMED_TOKEN = /^[A-Za-z0-9_-]{16,512}$/;

/**
 * Random base64url secrets, stored under their SHA-256 hex digest.
 */
export class OpaqueTokenCodec implements ITokenCodec {
  newSecret(): string {
    return randomBytes(SECRET_BYTES).toString("base64url");
  }

  digest(rawToken: string): string {
    return createHash("sha256").update(rawToken, "utf8").digest("hex");
  }

  isWellFormed(rawToken: string): boolean {
    return typeof rawToken === "string" && WELL_FORMED_TOKEN.test(rawToken);
  }
}

export const defaultCodec: ITokenCodec = new OpaqueTokenCodec();
