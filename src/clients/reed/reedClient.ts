/**
 * ReedClient — API client for the Reed.co.uk job search API
 *
 * Implements the JobBoardClient interface for the "reed" site.
 */

import type { JobBoardClient } from "@/interfaces";
import type { HttpRequestFn, HttpSession, JobPosting, SearchCriteria, Site } from "@/types";
import type { ReedRawJob, ReedSearchPageParams } from "@/types/clients/reed";
import {
  httpRequest as defaultHttpRequest,
  HttpError,
  compactQuery,
  createHttpSession,
} from "@/clients/http";
import {
  buildReedAuthHeader,
  isValidReedApiKey,
  resolveReedApiKey,
  type Env,
} from "@/config";
import {
  REED_BASE_URL,
  REED_DEFAULT_DISTANCE,
  REED_DEFAULT_RESULTS_WANTED,
  REED_DEFAULT_USER_AGENT,
  REED_HTTP_TIMEOUT_MS,
  REED_JOB_DETAILS_ENDPOINT_PATH,
  REED_MAX_RESULTS_PER_PAGE,
  REED_SEARCH_ENDPOINT_PATH,
} from "@/constants";
import { describeError, isRecord } from "@/utils";
import { buildReedSearchQuery } from "./searchParams";
import { mapReedJobToPosting } from "./mappers";
import * as logger from "@/logger";

const log = logger.withContext({ site: "reed" });

export interface ReedClientConfig {
  /**
   * Reed API key. Defaults to REED_API_KEY from `env`
   */
  apiKey?: string;

  /**
   * Proxy URLs, rotated per request
   */
  proxies?: string[];

  /**
   * Path to a PEM CA bundle to trust
   */
  caCert?: string;

  userAgent?: string;

  /**
   * Environment used for credential fallback (defaults to process.env)
   */
  env?: Env;

  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
}

/**
 * Pull the job array out of a /search response
 * Accepts `{ results: [...] }` or a bare array; anything else is an empty page.
 * Rows are returned as sent so page length matches the vendor's count.
 */
function extractResults(data: unknown): unknown[] {
  let rows: unknown[];
  if (Array.isArray(data)) {
    rows = data;
  } else if (isRecord(data) && Array.isArray(data.results)) {
    rows = data.results;
  } else {
    log.warn("Unexpected Reed response format", {
      type: data === null ? "null" : Array.isArray(data) ? "array" : typeof data,
    });
    return [];
  }

  return rows;
}

/**
 * Reed implementation of JobBoardClient
 */
export class ReedClient implements JobBoardClient {
  readonly site: Site = "reed";

  private readonly headers: Record<string, string>;
  private readonly session: HttpSession;
  private readonly httpRequest: HttpRequestFn;

  constructor(config: ReedClientConfig = {}) {
    // Fails before any session or network setup when no key resolves
    const apiKey = resolveReedApiKey(config.apiKey, config.env);

    if (!isValidReedApiKey(apiKey)) {
      log.warn("Reed API key format appears invalid. Expected UUID format.");
    }

    this.session = createHttpSession({
      proxies: config.proxies,
      caCert: config.caCert,
    });

    this.headers = {
      Accept: "application/json",
      Authorization: buildReedAuthHeader(apiKey),
      "User-Agent": config.userAgent || REED_DEFAULT_USER_AGENT,
    };

    this.httpRequest = config.httpRequest ?? defaultHttpRequest;

    log.debug("ReedClient initialized", {
      proxies: config.proxies?.length ?? 0,
      customCa: !!config.caCert,
    });
  }

  /**
   * Search Reed and return up to `criteria.resultsWanted` normalized postings
   *
   * Pages through /search until enough postings are collected, a short page
   * marks the end of results, or a page fetch fails. Failures never throw;
   * whatever was collected so far is returned.
   */
  async scrape(criteria: SearchCriteria = {}): Promise<JobPosting[]> {
    const resultsWanted = criteria.resultsWanted ?? REED_DEFAULT_RESULTS_WANTED;
    let resultsToSkip = criteria.offset ?? 0;
    const postings: JobPosting[] = [];

    if (criteria.hoursOld !== undefined) {
      log.warn("Reed cannot filter by posting age, ignoring hoursOld", {
        hoursOld: criteria.hoursOld,
      });
    }

    while (postings.length < resultsWanted) {
      const pageSize = Math.min(REED_MAX_RESULTS_PER_PAGE, resultsWanted - postings.length);

      log.info("Fetching Reed jobs", { skip: resultsToSkip, take: pageSize });

      const batch = await this.fetchPage({
        keywords: criteria.keywords,
        locationName: criteria.location,
        distance: criteria.distance || REED_DEFAULT_DISTANCE,
        take: pageSize,
        skip: resultsToSkip,
        isRemote: criteria.isRemote ?? false,
        jobType: criteria.jobType,
        hoursOld: criteria.hoursOld,
      });

      if (!batch || batch.length === 0) {
        log.info("No more jobs found");
        break;
      }

      for (const raw of batch) {
        const posting = mapReedJobToPosting(raw, log);
        if (!posting) {
          continue;
        }
        postings.push(posting);
        if (postings.length >= resultsWanted) {
          break;
        }
      }

      if (batch.length < pageSize) {
        log.info("Reached end of available jobs", { fetched: batch.length, pageSize });
        break;
      }

      resultsToSkip += batch.length;
    }

    log.debug("Reed scrape completed", { postings: postings.length });
    return postings;
  }

  /**
   * Fetch one page of raw results from /search
   *
   * @returns The page's rows, unfiltered ([] for an empty or unrecognized page),
   *          or null when the request itself failed
   */
  async fetchPage(params: ReedSearchPageParams): Promise<unknown[] | null> {
    const url = `${REED_BASE_URL}${REED_SEARCH_ENDPOINT_PATH}`;
    const query = compactQuery(buildReedSearchQuery(params));

    log.debug("Reed API request", { url, query });

    try {
      const data = await this.httpRequest({
        method: "GET",
        url,
        headers: this.headers,
        query,
        timeoutMs: REED_HTTP_TIMEOUT_MS,
        dispatcher: this.session.nextDispatcher(),
      });

      const jobs = extractResults(data);
      log.info("Found jobs from Reed API", { count: jobs.length });
      return jobs;
    } catch (error) {
      this.logRequestFailure("Reed API request failed", error);
      return null;
    }
  }

  /**
   * Fetch the raw detail record for one job (not used by scrape)
   *
   * @returns The detail payload, or null on failure or a non-object response
   */
  async getJobDetails(jobId: string): Promise<ReedRawJob | null> {
    const url = `${REED_BASE_URL}${REED_JOB_DETAILS_ENDPOINT_PATH}/${encodeURIComponent(jobId)}`;

    try {
      const data = await this.httpRequest({
        method: "GET",
        url,
        headers: this.headers,
        timeoutMs: REED_HTTP_TIMEOUT_MS,
        dispatcher: this.session.nextDispatcher(),
      });

      if (!isRecord(data)) {
        log.warn("Unexpected Reed job detail format", { jobId });
        return null;
      }
      return data;
    } catch (error) {
      this.logRequestFailure("Error fetching Reed job details", error, { jobId });
      return null;
    }
  }

  /**
   * Release proxy / TLS connections held by the session
   */
  async close(): Promise<void> {
    await this.session.close();
  }

  private logRequestFailure(
    message: string,
    error: unknown,
    meta: Record<string, unknown> = {},
  ): void {
    if (error instanceof HttpError && error.isAuthError) {
      log.error(`${message}: authentication rejected, check REED_API_KEY`, {
        ...meta,
        status: error.status,
      });
      return;
    }

    log.error(message, {
      ...meta,
      status: error instanceof HttpError ? error.status : undefined,
      error: describeError(error),
    });
  }
}
