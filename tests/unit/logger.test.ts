/**
 * Unit tests for the micro-logger helpers
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { formatMeta, info, resolveLogLevel, setLogDestination, withContext } from "@/logger";

describe("resolveLogLevel", () => {
  it("should accept known levels case-insensitively", () => {
    expect(resolveLogLevel("DEBUG")).toBe("debug");
    expect(resolveLogLevel(" warn ")).toBe("warn");
  });

  it("should fall back to info for unset or unknown values", () => {
    expect(resolveLogLevel(undefined)).toBe("info");
    expect(resolveLogLevel("verbose")).toBe("info");
  });
});

describe("formatMeta", () => {
  it("should render nothing for empty meta", () => {
    expect(formatMeta()).toBe("");
    expect(formatMeta({})).toBe("");
  });

  it("should render meta as JSON after a space", () => {
    expect(formatMeta({ site: "reed", count: 2 })).toBe(' {"site":"reed","count":2}');
  });
});

describe("withContext", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should merge bound context into each call", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    withContext({ site: "reed" }).error("Request failed", { status: 500 });

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toMatch(
      /^\[.+\] \[ERROR\] Request failed \{"site":"reed","status":500\}$/,
    );
  });
});

describe("setLogDestination", () => {
  afterEach(() => {
    setLogDestination("stdout");
    vi.restoreAllMocks();
  });

  it("should write info to stdout by default", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    info("Fetching Reed jobs", { skip: 0 });

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("should keep stdout free of log lines once routed to stderr", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    setLogDestination("stderr");
    info("Fetching Reed jobs", { skip: 0 });

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toMatch(
      /^\[.+\] \[INFO\] Fetching Reed jobs \{"skip":0\}$/,
    );
  });
});
