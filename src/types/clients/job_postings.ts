/**
 * Job posting type definitions — site-agnostic normalized types
 *
 * Every job-board client maps its vendor payloads onto these shapes, so
 * callers can merge results from several sites without per-site handling.
 */

/**
 * Supported job boards
 * String literal union with intersection to allow future sites without constant edits
 */
export type Site = "reed" | (string & {});

export type JobType = "fulltime" | "parttime" | "contract" | "temporary";

export type CompensationInterval = "yearly" | "monthly" | "weekly" | "daily" | "hourly";

/**
 * Country a posting is located in (ISO-like short code, e.g. "UK")
 */
export type Country = "UK" | (string & {});

export type JobLocation = {
  city: string;
  state?: string;
  country: Country;
};

export type Compensation = {
  minAmount?: number;
  maxAmount?: number;
  currency: string;
  interval: CompensationInterval;
};

/**
 * Normalized job posting
 *
 * `jobUrl` is the board's canonical page for the posting; `jobUrlDirect` is
 * where the candidate actually applies (same as `jobUrl` when the board gives
 * no external link).
 */
export type JobPosting = {
  id: string;
  site: Site;
  title: string;
  companyName?: string;
  jobUrl: string;
  jobUrlDirect: string;
  location?: JobLocation;
  description?: string;
  compensation?: Compensation;
  jobType: JobType[];
  isRemote: boolean;
  datePosted?: string;
};

/**
 * Search input for a single scrape call
 */
export type SearchCriteria = {
  keywords?: string;
  location?: string;
  /** Search radius in miles around `location` */
  distance?: number;
  isRemote?: boolean;
  jobType?: JobType;
  resultsWanted?: number;
  offset?: number;
  /** Maximum posting age in hours; see the client for whether it is honoured */
  hoursOld?: number;
};
