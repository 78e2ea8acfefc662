/**
 * Reed client constants — base URLs, endpoint paths, vendor limits
 *
 * API documentation: https://www.reed.co.uk/developers/jobseeker
 */

import type { CompensationInterval, Country } from "@/types";

/**
 * Reed API base URL
 */
export const REED_BASE_URL = "https://www.reed.co.uk/api/1.0";

/**
 * Search endpoint path
 */
export const REED_SEARCH_ENDPOINT_PATH = "/search";

/**
 * Job detail endpoint path (use with jobId)
 */
export const REED_JOB_DETAILS_ENDPOINT_PATH = "/jobs";

/**
 * Public job page base; canonical posting URLs are `${REED_JOB_PAGE_BASE_URL}/{jobId}`
 */
export const REED_JOB_PAGE_BASE_URL = "https://www.reed.co.uk/jobs";

/**
 * Vendor hard limit on resultsToTake
 */
export const REED_MAX_RESULTS_PER_PAGE = 100;

/**
 * Vendor cap on distanceFromLocation (miles)
 */
export const REED_MAX_DISTANCE = 100;

export const REED_DEFAULT_DISTANCE = 10;

export const REED_DEFAULT_RESULTS_WANTED = 15;

/**
 * Request timeout for both endpoints
 */
export const REED_HTTP_TIMEOUT_MS = 30_000;

export const REED_DEFAULT_USER_AGENT = "reed-jobs-client/1.0";

/**
 * Environment variable holding the default API key
 */
export const REED_API_KEY_ENV = "REED_API_KEY";

/**
 * Reed keys are issued as UUIDs
 */
export const REED_API_KEY_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Reed only lists UK jobs and reports salaries annualized in GBP
 */
export const REED_COUNTRY: Country = "UK";
export const REED_CURRENCY = "GBP";
export const REED_COMPENSATION_INTERVAL: CompensationInterval = "yearly";

/**
 * Length of the title digest used in fallback URLs for records without a jobId
 */
export const REED_FALLBACK_ID_HASH_LENGTH = 16;

/**
 * Lower-case phrases in location or description text that mark a job as remote
 */
export const REED_REMOTE_PATTERNS = [
  "remote",
  "work from home",
  "wfh",
  "home based",
  "anywhere in uk",
  "location flexible",
] as const;
