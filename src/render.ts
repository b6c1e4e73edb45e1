/**
 * Placeholder substitution for requirements files.
 *
 * Literal text replacement only: no escaping, no conditionals and no
 * recursive expansion. Line endings and line count are untouched.
 */

import type { SecretPair } from "./secrets.js";
import { placeholderFor } from "./validation.js";

/** Occurrences of each placeholder in a source text. */
export interface ReplacementCounts {
  username: number;
  token: number;
}

/**
 * Count occurrences of `${name}` in text.
 */
export function countPlaceholders(text: string, name: string): number {
  return text.split(placeholderFor(name)).length - 1;
}

/**
 * Replace every `${<username var>}` and `${<token var>}` in text.
 *
 * Username tokens are replaced first, then token tokens, and only within
 * the source segments: a substituted value is never scanned again, so a
 * secret containing "${GITHUB_PAT}" or "$&" is inserted verbatim.
 */
export function renderRequirements(text: string, secrets: SecretPair): string {
  const usernameToken = placeholderFor(secrets.names.username);
  const tokenToken = placeholderFor(secrets.names.token);

  return text
    .split(usernameToken)
    .map((segment) => segment.split(tokenToken).join(secrets.token))
    .join(secrets.username);
}

/**
 * Count the placeholders renderRequirements will replace.
 */
export function countReplacements(text: string, secrets: SecretPair): ReplacementCounts {
  return {
    username: countPlaceholders(text, secrets.names.username),
    token: text
      .split(placeholderFor(secrets.names.username))
      .reduce((sum, segment) => sum + countPlaceholders(segment, secrets.names.token), 0),
  };
}
