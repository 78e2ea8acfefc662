/**
 * Constants barrel exports
 */

export * from "./logger";
export * from "./clients/http";
export * from "./clients/reed";
