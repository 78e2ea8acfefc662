/**
 * Search criteria from environment variables (CLI entry)
 *
 *   REED_KEYWORDS, REED_LOCATION, REED_DISTANCE, REED_REMOTE, REED_JOB_TYPE,
 *   REED_RESULTS_WANTED, REED_OFFSET, REED_HOURS_OLD
 */

import type { JobType, SearchCriteria } from "@/types";
import { ConfigurationError } from "./configurationError";
import type { Env } from "./reedConfig";

const JOB_TYPES: readonly JobType[] = ["fulltime", "parttime", "contract", "temporary"];

function readOptional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readNonNegativeInt(env: Env, name: string): number | undefined {
  const raw = readOptional(env, name);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}"`, name);
  }
  return value;
}

function readBoolean(env: Env, name: string): boolean | undefined {
  const raw = readOptional(env, name)?.toLowerCase();
  if (raw === undefined) {
    return undefined;
  }
  if (raw === "true" || raw === "1" || raw === "yes") {
    return true;
  }
  if (raw === "false" || raw === "0" || raw === "no") {
    return false;
  }
  throw new ConfigurationError(`${name} must be true or false, got "${raw}"`, name);
}

function readJobType(env: Env, name: string): JobType | undefined {
  const raw = readOptional(env, name)?.toLowerCase();
  if (raw === undefined) {
    return undefined;
  }
  const jobType = JOB_TYPES.find((candidate) => candidate === raw);
  if (!jobType) {
    throw new ConfigurationError(
      `${name} must be one of ${JOB_TYPES.join(", ")}, got "${raw}"`,
      name,
    );
  }
  return jobType;
}

/**
 * Build SearchCriteria from REED_* variables; unset variables stay undefined
 *
 * @throws {ConfigurationError} When a set variable cannot be parsed
 */
export function readSearchCriteriaFromEnv(env: Env = process.env): SearchCriteria {
  return {
    keywords: readOptional(env, "REED_KEYWORDS"),
    location: readOptional(env, "REED_LOCATION"),
    distance: readNonNegativeInt(env, "REED_DISTANCE"),
    isRemote: readBoolean(env, "REED_REMOTE"),
    jobType: readJobType(env, "REED_JOB_TYPE"),
    resultsWanted: readNonNegativeInt(env, "REED_RESULTS_WANTED"),
    offset: readNonNegativeInt(env, "REED_OFFSET"),
    hoursOld: readNonNegativeInt(env, "REED_HOURS_OLD"),
  };
}

/**
 * Comma-separated REED_PROXIES as a list (undefined when unset)
 */
export function readProxiesFromEnv(env: Env = process.env): string[] | undefined {
  const raw = readOptional(env, "REED_PROXIES");
  if (raw === undefined) {
    return undefined;
  }
  return raw
    .split(",")
    .map((proxy) => proxy.trim())
    .filter((proxy) => proxy.length > 0);
}
