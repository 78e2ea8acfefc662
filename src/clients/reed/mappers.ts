/**
 * Reed API payload mappers — convert Reed raw job records to JobPosting
 *
 * Reed's search response has no job type, posting date or remote flag, so
 * job types stay empty, datePosted stays absent and remote status is inferred
 * from free text.
 */

import { createHash } from "node:crypto";
import type { Compensation, JobLocation, JobPosting, Logger } from "@/types";
import type { ReedRawJob } from "@/types/clients/reed";
import {
  REED_COMPENSATION_INTERVAL,
  REED_COUNTRY,
  REED_CURRENCY,
  REED_FALLBACK_ID_HASH_LENGTH,
  REED_JOB_PAGE_BASE_URL,
  REED_REMOTE_PATTERNS,
} from "@/constants";
import { describeError, isRecord } from "@/utils";
import * as logger from "@/logger";

/**
 * Read a text field, trimmed; anything that is not a string reads as ""
 */
function readText(raw: ReedRawJob, field: string): string {
  const value = raw[field];
  return typeof value === "string" ? value.trim() : "";
}

function readJobId(raw: ReedRawJob): string {
  const value = raw.jobId;
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return typeof value === "string" ? value.trim() : "";
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/**
 * Parse a salary figure. Zero and blank read as absent; anything else that is
 * not a finite number is an error and fails the record.
 */
function readAmount(raw: ReedRawJob, field: string): number | undefined {
  const value = raw[field];
  if (!isPresent(value) || value === "" || value === 0) {
    return undefined;
  }

  const amount =
    typeof value === "number" ? value : typeof value === "string" ? Number(value.trim()) : NaN;

  if (!Number.isFinite(amount)) {
    throw new Error(`Invalid ${field}: ${JSON.stringify(value)}`);
  }
  return amount === 0 ? undefined : amount;
}

/**
 * Fallback identifier for records without a jobId: a truncated SHA-256 of the
 * title. Two postings with the same title collide, so it is not a dedup key.
 */
export function fallbackJobSlug(title: string): string {
  const digest = createHash("sha256").update(title, "utf8").digest("hex");
  return `unknown-${digest.substring(0, REED_FALLBACK_ID_HASH_LENGTH)}`;
}

/**
 * Extract the numeric Reed job id from a job page URL
 *
 * @example
 * extractJobIdFromUrl("https://www.reed.co.uk/jobs/data-analyst/51234567") // "51234567"
 */
export function extractJobIdFromUrl(jobUrl: string): string | null {
  const match = /\/jobs\/(?:[^/?#]+\/)*(\d+)(?:[/?#]|$)/.exec(jobUrl);
  return match ? match[1] : null;
}

/**
 * Split "City, County" into city and state; the country is always the UK
 */
export function parseLocation(locationName: string | undefined): JobLocation | undefined {
  const text = locationName?.trim();
  if (!text) {
    return undefined;
  }

  const comma = text.indexOf(",");
  if (comma === -1) {
    return { city: text, country: REED_COUNTRY };
  }

  const city = text.substring(0, comma).trim();
  const state = text.substring(comma + 1).trim();
  return {
    city,
    state: state || undefined,
    country: REED_COUNTRY,
  };
}

/**
 * Infer remote status from location and description text
 */
export function isJobRemote(
  locationName: string | undefined,
  description: string | undefined,
): boolean {
  const combined = [locationName, description]
    .filter((text): text is string => !!text)
    .map((text) => text.toLowerCase())
    .join(" ");

  if (!combined) {
    return false;
  }

  return REED_REMOTE_PATTERNS.some((pattern) => combined.includes(pattern));
}

function mapCompensation(raw: ReedRawJob): Compensation | undefined {
  if (!isPresent(raw.minimumSalary) && !isPresent(raw.maximumSalary)) {
    return undefined;
  }

  return {
    minAmount: readAmount(raw, "minimumSalary"),
    maxAmount: readAmount(raw, "maximumSalary"),
    currency: REED_CURRENCY,
    interval: REED_COMPENSATION_INTERVAL,
  };
}

function toPosting(raw: ReedRawJob): JobPosting | null {
  const title = readText(raw, "jobTitle");
  if (!title) {
    return null;
  }

  const jobId = readJobId(raw);
  const id = jobId || fallbackJobSlug(title);
  const jobUrl = `${REED_JOB_PAGE_BASE_URL}/${id}`;
  const externalUrl = readText(raw, "externalUrl");

  const locationName = readText(raw, "locationName");
  const description = readText(raw, "jobDescription");
  const companyName = readText(raw, "employerName");

  return {
    id,
    site: "reed",
    title,
    companyName: companyName || undefined,
    jobUrl,
    jobUrlDirect: externalUrl || jobUrl,
    location: parseLocation(locationName),
    description: description || undefined,
    compensation: mapCompensation(raw),
    jobType: [],
    isRemote: isJobRemote(locationName, description),
  };
}

/**
 * Map one Reed record to a normalized JobPosting
 *
 * @returns The posting, or null when the row is not an object, has no title
 *          or fails to map (the failure is logged; sibling records are unaffected)
 */
export function mapReedJobToPosting(
  raw: unknown,
  log: Logger = logger,
): JobPosting | null {
  if (!isRecord(raw)) {
    log.debug("Skipping non-object Reed row", { type: raw === null ? "null" : typeof raw });
    return null;
  }

  try {
    return toPosting(raw);
  } catch (error) {
    log.error("Error parsing Reed job", {
      jobId: readJobId(raw) || undefined,
      error: describeError(error),
    });
    return null;
  }
}
