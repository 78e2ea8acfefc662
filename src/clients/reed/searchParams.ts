/**
 * Reed /search query builder
 */

import type { ReedSearchPageParams, ReedSearchQuery } from "@/types/clients/reed";
import { REED_MAX_DISTANCE, REED_MAX_RESULTS_PER_PAGE } from "@/constants";

/**
 * Map page parameters to the vendor's query string
 *
 * - Location and remote-only are exclusive: remote searches omit locationName.
 * - Full-time implies permanent in Reed's filters, so both flags are sent.
 * - hoursOld is ignored; Reed has no server-side recency filter.
 */
export function buildReedSearchQuery(params: ReedSearchPageParams): ReedSearchQuery {
  const query: ReedSearchQuery = {
    resultsToTake: Math.min(params.take, REED_MAX_RESULTS_PER_PAGE),
    resultsToSkip: params.skip,
    distanceFromLocation: Math.min(params.distance, REED_MAX_DISTANCE),
  };

  if (params.keywords) {
    query.keywords = params.keywords;
  }

  if (params.locationName && !params.isRemote) {
    query.locationName = params.locationName;
  }

  switch (params.jobType) {
    case "fulltime":
      query.fullTime = true;
      query.permanent = true;
      break;
    case "parttime":
      query.partTime = true;
      break;
    case "contract":
      query.contract = true;
      break;
    case "temporary":
      query.temp = true;
      break;
    case undefined:
      break;
  }

  return query;
}
