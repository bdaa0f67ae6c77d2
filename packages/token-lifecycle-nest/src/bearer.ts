const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

/**
 * Token from an `Authorization: Bearer <token>` header value, or null
 */
export function extractBearerToken(
  header: string | string[] | undefined
): string | null {
  const value = Array.isArray(header) ? header[0] : header;
  if (!value) {
    return null;
  }

  const match = BEARER_PATTERN.exec(value);
  return match ? match[1] : null;
}
