import { ValidatedToken } from "./interfaces";

/**
 * Array or set of scope names. A plain string is not a scope list: iterating
 * it yields single characters.
 */
export type ScopeSet = readonly string[] | ReadonlySet<string>;

export type ScopeGate = (token: Pick<ValidatedToken, "scopes">) => boolean;

/**
 * True iff every required scope was granted. Exact string match only:
 * "storage.*" does not imply "storage.read".
 */
export function authorize(granted: ScopeSet, required: ScopeSet): boolean {
  const grantedSet = new Set(granted);

  for (const scope of required) {
    if (!grantedSet.has(scope)) {
      return false;
    }
  }

  return true;
}

/**
 * Builds a checker for the output of `TokenManager.validateToken`
 */
export function createScopeGate(required: ScopeSet): ScopeGate {
  const requiredScopes = Array.from(new Set(required));

  return (token) => authorize(token.scopes, requiredScopes);
}
