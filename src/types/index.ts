export * from "./logger";
export * from "./clients/http";
export * from "./clients/job_postings";
// Reed raw types are intentionally NOT exported from the global barrel.
// Import directly from "@/types/clients/reed" within src/clients/reed/ and tests only.
