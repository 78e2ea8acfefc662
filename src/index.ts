/**
 * Public API
 */

export { ReedClient, type ReedClientConfig } from "./clients/reed";
export {
  mapReedJobToPosting,
  parseLocation,
  isJobRemote,
  extractJobIdFromUrl,
  buildReedSearchQuery,
} from "./clients/reed";
export { HttpError, createHttpSession, httpRequest } from "./clients/http";
export { ConfigurationError, resolveReedApiKey } from "./config";
export type { JobBoardClient } from "./interfaces";
export type {
  Site,
  JobType,
  JobPosting,
  JobLocation,
  Compensation,
  CompensationInterval,
  Country,
  SearchCriteria,
  HttpRequest,
  HttpRequestFn,
} from "./types";
export type { ReedRawJob, ReedSearchPageParams } from "./types/clients/reed";
