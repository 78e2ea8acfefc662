/**
 * Configuration public API
 */

export { ConfigurationError } from "./configurationError";
export {
  resolveReedApiKey,
  isValidReedApiKey,
  buildReedAuthHeader,
  type Env,
} from "./reedConfig";
export { readSearchCriteriaFromEnv, readProxiesFromEnv } from "./searchEnv";
