/**
 * Reed client public API
 */

export { ReedClient, type ReedClientConfig } from "./reedClient";
export {
  mapReedJobToPosting,
  parseLocation,
  isJobRemote,
  extractJobIdFromUrl,
  fallbackJobSlug,
} from "./mappers";
export { buildReedSearchQuery } from "./searchParams";
