/**
 * JobBoardClient interface — site-agnostic contract for job board search clients
 *
 * Every board integration maps its vendor payloads onto JobPosting so the
 * caller can merge results from several sites.
 */

import type { JobPosting, SearchCriteria, Site } from "@/types";

export interface JobBoardClient {
  /**
   * Site identifier
   */
  readonly site: Site;

  /**
   * Search the board and return normalized postings
   *
   * @param criteria - Search filters plus the result count and offset
   * @returns Promise resolving to at most `criteria.resultsWanted` postings;
   *          partial results on failure rather than a rejection
   */
  scrape(criteria: SearchCriteria): Promise<JobPosting[]>;
}
