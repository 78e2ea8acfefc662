/**
 * Reed raw API response types
 *
 * The vendor controls these payloads: any field may be absent, null or empty,
 * so records stay loosely typed and the mapper reads each field defensively.
 */

import type { JobType } from "./job_postings";

/**
 * One job record from /search results or the /jobs/{id} detail endpoint.
 * Known fields: jobId, jobTitle, employerName, locationName, minimumSalary,
 * maximumSalary, jobDescription, externalUrl.
 */
export type ReedRawJob = Record<string, unknown>;

/**
 * Parameters for one /search page request
 */
export type ReedSearchPageParams = {
  keywords?: string;
  locationName?: string;
  distance: number;
  take: number;
  skip: number;
  isRemote: boolean;
  jobType?: JobType;
  /** Accepted for interface parity; the vendor has no recency filter */
  hoursOld?: number;
};

/**
 * Query string sent to /search
 */
export type ReedSearchQuery = {
  resultsToTake: number;
  resultsToSkip: number;
  distanceFromLocation: number;
  keywords?: string;
  locationName?: string;
  fullTime?: boolean;
  permanent?: boolean;
  partTime?: boolean;
  contract?: boolean;
  temp?: boolean;
};
