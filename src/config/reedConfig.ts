/**
 * Reed credential resolution
 *
 * Order: explicit value, then REED_API_KEY from the environment, then fail.
 */

import { REED_API_KEY_ENV, REED_API_KEY_PATTERN } from "@/constants";
import { ConfigurationError } from "./configurationError";

export type Env = Record<string, string | undefined>;

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Resolve the Reed API key
 *
 * @param explicit - Key passed by the caller (wins when non-blank)
 * @param env - Environment to fall back to (defaults to process.env)
 * @throws {ConfigurationError} When neither source yields a key
 */
export function resolveReedApiKey(
  explicit?: string,
  env: Env = process.env,
): string {
  const apiKey = nonBlank(explicit) ?? nonBlank(env[REED_API_KEY_ENV]);

  if (!apiKey) {
    throw new ConfigurationError(
      `Reed API key is required. Set ${REED_API_KEY_ENV} or pass apiKey. ` +
        `Keys are issued at https://www.reed.co.uk/developers`,
      REED_API_KEY_ENV,
    );
  }

  return apiKey;
}

/**
 * Soft format check: Reed keys are UUIDs. A mismatch is not fatal, the
 * vendor is the final judge.
 */
export function isValidReedApiKey(apiKey: string | undefined): boolean {
  return apiKey !== undefined && REED_API_KEY_PATTERN.test(apiKey);
}

/**
 * Basic auth header: the key is the username, the password is empty
 */
export function buildReedAuthHeader(apiKey: string): string {
  const encoded = Buffer.from(`${apiKey}:`, "utf-8").toString("base64");
  return `Basic ${encoded}`;
}
