/**
 * Unit tests for Reed mappers
 *
 * Tests Reed payload → JobPosting mapping and the text heuristics behind it.
 * No HTTP - pure transformation testing
 */

import { describe, it, expect, vi } from "vitest";
import { createHash } from "node:crypto";
import {
  mapReedJobToPosting,
  parseLocation,
  isJobRemote,
  extractJobIdFromUrl,
  fallbackJobSlug,
} from "@/clients/reed/mappers";
import type { Logger } from "@/types";
import type { ReedRawJob } from "@/types/clients/reed";
import searchPage from "../fixtures/reed/search_page.json";

function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

const [dataEngineer, supportAdvisor, blankTitle, warehouseOperative, developer] =
  searchPage.results;

describe("mapReedJobToPosting", () => {
  describe("title validation", () => {
    it("should drop a record whose title is blank after trimming", () => {
      expect(mapReedJobToPosting(blankTitle)).toBe(null);
    });

    it("should drop a record with no title field", () => {
      expect(mapReedJobToPosting({ jobId: 1, employerName: "Acme" })).toBe(null);
    });

    it("should drop a record whose title is not a string", () => {
      expect(mapReedJobToPosting({ jobId: 1, jobTitle: null })).toBe(null);
    });

    it("should drop rows that are not objects without logging an error", () => {
      const log = createTestLogger();

      expect(mapReedJobToPosting(null, log)).toBe(null);
      expect(mapReedJobToPosting("stray", log)).toBe(null);
      expect(mapReedJobToPosting([{ jobTitle: "Chef" }], log)).toBe(null);
      expect(log.error).not.toHaveBeenCalled();
      expect(log.debug).toHaveBeenCalledWith("Skipping non-object Reed row", { type: "null" });
    });
  });

  describe("fixture mapping", () => {
    it("should map a full record", () => {
      const posting = mapReedJobToPosting(dataEngineer);

      expect(posting).toEqual({
        id: "50000001",
        site: "reed",
        title: "Senior Data Engineer",
        companyName: "Northwind Analytics",
        jobUrl: "https://www.reed.co.uk/jobs/50000001",
        jobUrlDirect: "https://www.reed.co.uk/jobs/50000001",
        location: {
          city: "Manchester",
          state: "Greater Manchester",
          country: "UK",
        },
        description: "Join our platform team building batch and streaming data pipelines.",
        compensation: {
          minAmount: 55000,
          maxAmount: 65000,
          currency: "GBP",
          interval: "yearly",
        },
        jobType: [],
        isRemote: false,
      });
    });

    it("should use the external URL as the direct apply link when present", () => {
      const posting = mapReedJobToPosting(supportAdvisor);

      expect(posting?.jobUrl).toBe("https://www.reed.co.uk/jobs/50000002");
      expect(posting?.jobUrlDirect).toBe("https://careers.brightline.example/apply/2");
    });

    it("should fall back to the canonical URL when externalUrl is empty", () => {
      const posting = mapReedJobToPosting(warehouseOperative);

      expect(posting?.jobUrlDirect).toBe("https://www.reed.co.uk/jobs/50000004");
    });

    it("should never set job types or a posting date", () => {
      const posting = mapReedJobToPosting(developer);

      expect(posting?.jobType).toEqual([]);
      expect(posting?.datePosted).toBeUndefined();
    });
  });

  describe("remote detection", () => {
    it("should mark 'Remote, UK' as remote", () => {
      const posting = mapReedJobToPosting({ jobId: 9, jobTitle: "Analyst", locationName: "Remote, UK" });

      expect(posting?.isRemote).toBe(true);
    });

    it("should not mark 'London, Greater London' as remote", () => {
      const posting = mapReedJobToPosting({
        jobId: 9,
        jobTitle: "Analyst",
        locationName: "London, Greater London",
      });

      expect(posting?.isRemote).toBe(false);
    });

    it("should detect remote phrases in the description", () => {
      expect(mapReedJobToPosting(developer)?.isRemote).toBe(true);
    });
  });

  describe("compensation", () => {
    it("should omit compensation when both salaries are absent", () => {
      expect(mapReedJobToPosting(warehouseOperative)?.compensation).toBeUndefined();
    });

    it("should keep a lone minimum salary", () => {
      const posting = mapReedJobToPosting({ jobId: 3, jobTitle: "Clerk", minimumSalary: 30000 });

      expect(posting?.compensation).toEqual({
        minAmount: 30000,
        maxAmount: undefined,
        currency: "GBP",
        interval: "yearly",
      });
    });

    it("should parse numeric strings as amounts", () => {
      const posting = mapReedJobToPosting({
        jobId: 3,
        jobTitle: "Clerk",
        minimumSalary: "28000.50",
        maximumSalary: "31000",
      });

      expect(posting?.compensation?.minAmount).toBe(28000.5);
      expect(posting?.compensation?.maxAmount).toBe(31000);
    });

    it("should drop the record and log when a salary is not numeric", () => {
      const log = createTestLogger();
      const raw: ReedRawJob = { jobId: 77, jobTitle: "Chef", minimumSalary: "competitive" };

      expect(mapReedJobToPosting(raw, log)).toBe(null);
      expect(log.error).toHaveBeenCalledWith("Error parsing Reed job", {
        jobId: "77",
        error: 'Invalid minimumSalary: "competitive"',
      });
    });
  });

  describe("fallback identifiers", () => {
    it("should derive id and URL from a title digest when jobId is missing", () => {
      const digest = createHash("sha256").update("Barista", "utf8").digest("hex");
      const expectedId = `unknown-${digest.substring(0, 16)}`;

      const posting = mapReedJobToPosting({ jobTitle: "Barista" });

      expect(posting?.id).toBe(expectedId);
      expect(posting?.jobUrl).toBe(`https://www.reed.co.uk/jobs/${expectedId}`);
    });

    it("should give identical titles the same fallback slug", () => {
      expect(fallbackJobSlug("Barista")).toBe(fallbackJobSlug("Barista"));
      expect(fallbackJobSlug("Barista")).not.toBe(fallbackJobSlug("Head Barista"));
    });
  });

  it("should leave companyName undefined when the employer is blank", () => {
    const posting = mapReedJobToPosting({ jobId: 5, jobTitle: "Porter", employerName: "  " });

    expect(posting?.companyName).toBeUndefined();
  });
});

describe("parseLocation", () => {
  it("should split city and county", () => {
    expect(parseLocation("Manchester, Greater Manchester")).toEqual({
      city: "Manchester",
      state: "Greater Manchester",
      country: "UK",
    });
  });

  it("should return a city without state when there is no comma", () => {
    const location = parseLocation("Manchester");

    expect(location).toEqual({ city: "Manchester", country: "UK" });
    expect(location?.state).toBeUndefined();
  });

  it("should split only on the first comma", () => {
    expect(parseLocation("Kensington, London, Greater London")).toEqual({
      city: "Kensington",
      state: "London, Greater London",
      country: "UK",
    });
  });

  it("should treat an empty region as absent", () => {
    expect(parseLocation("Leeds,")?.state).toBeUndefined();
  });

  it("should return undefined for missing or blank text", () => {
    expect(parseLocation(undefined)).toBeUndefined();
    expect(parseLocation("   ")).toBeUndefined();
  });
});

describe("isJobRemote", () => {
  it("should match phrases case-insensitively", () => {
    expect(isJobRemote("Leeds", "Work From Home on Fridays")).toBe(true);
    expect(isJobRemote("Anywhere in UK", undefined)).toBe(true);
  });

  it("should return false without any text", () => {
    expect(isJobRemote(undefined, undefined)).toBe(false);
    expect(isJobRemote("", "")).toBe(false);
  });

  it("should return false when no phrase matches", () => {
    expect(isJobRemote("Bristol", "Office based in the city centre.")).toBe(false);
  });
});

describe("extractJobIdFromUrl", () => {
  it("should extract the id from a short job URL", () => {
    expect(extractJobIdFromUrl("https://www.reed.co.uk/jobs/50000001")).toBe("50000001");
  });

  it("should extract the id after a title slug", () => {
    expect(
      extractJobIdFromUrl("https://www.reed.co.uk/jobs/senior-data-engineer/50000001?source=search"),
    ).toBe("50000001");
  });

  it("should return null when there is no numeric id", () => {
    expect(extractJobIdFromUrl("https://www.reed.co.uk/jobs/unknown-abc")).toBe(null);
    expect(extractJobIdFromUrl("https://www.reed.co.uk/about")).toBe(null);
  });
});
