/**
 * Utils barrel exports
 */

export * from "./errors";
