/**
 * CLI entrypoint — runs one Reed search and prints the postings as JSON
 *
 * stdout carries only the JSON; every log line goes to stderr.
 *
 * Usage:
 *   REED_KEYWORDS="data engineer" REED_LOCATION=Leeds npm start
 *
 * Environment variables:
 *   - REED_API_KEY: Reed API key (required)
 *   - REED_KEYWORDS, REED_LOCATION, REED_DISTANCE, REED_REMOTE, REED_JOB_TYPE,
 *     REED_RESULTS_WANTED, REED_OFFSET, REED_HOURS_OLD: search criteria
 *   - REED_PROXIES: comma-separated proxy URLs (optional)
 *   - REED_CA_CERT: path to a PEM CA bundle (optional)
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 */

import "dotenv/config";
import { ReedClient } from "@/clients/reed";
import {
  ConfigurationError,
  readProxiesFromEnv,
  readSearchCriteriaFromEnv,
} from "@/config";
import * as logger from "@/logger";

logger.setLogDestination("stderr");

async function main(): Promise<void> {
  const criteria = readSearchCriteriaFromEnv();
  const client = new ReedClient({
    proxies: readProxiesFromEnv(),
    caCert: process.env.REED_CA_CERT || undefined,
  });

  try {
    const postings = await client.scrape(criteria);
    logger.info("Reed search finished", { postings: postings.length });
    process.stdout.write(JSON.stringify(postings, null, 2) + "\n");
  } finally {
    await client.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.error("Configuration error", { setting: error.setting, error: error.message });
  } else {
    logger.error("Fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
  }
  process.exit(1);
});
