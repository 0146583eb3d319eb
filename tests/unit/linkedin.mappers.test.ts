/**
 * Unit tests for parsed page → ListingDetail mapping
 */

import { describe, it, expect } from "vitest";
import { buildListingViewUrl, mapParsedPageToDetail } from "@/clients/linkedin";
import type { ParsedListingPage } from "@/types";

const scrapedAt = new Date(2024, 4, 6, 9, 5);

function page(overrides: Partial<ParsedListingPage> = {}): ParsedListingPage {
  return {
    title: "Backend Engineer",
    company: "Acme Corp",
    location: "Bangalore, Karnataka, India",
    salary: "",
    description: "Build APIs.",
    canonicalUrl: "https://in.linkedin.com/jobs/view/backend-engineer-3901",
    ...overrides,
  };
}

describe("mapParsedPageToDetail", () => {
  it("should map a complete page", () => {
    expect(mapParsedPageToDetail("3901", page({ salary: "₹10L/yr" }), scrapedAt)).toEqual({
      id: "3901",
      company: "Acme Corp",
      title: "Backend Engineer",
      location: "Bangalore, Karnataka, India",
      salary: "₹10L/yr",
      description: "Build APIs.",
      applyUrl: "https://in.linkedin.com/jobs/view/backend-engineer-3901",
      scrapedAt,
    });
  });

  it("should omit salary when empty", () => {
    const detail = mapParsedPageToDetail("3901", page(), scrapedAt);
    expect(detail).not.toBeNull();
    expect(detail && "salary" in detail).toBe(false);
  });

  it("should fall back to the public view URL without a canonical link", () => {
    expect(mapParsedPageToDetail("77", page({ canonicalUrl: null }), scrapedAt)?.applyUrl).toBe(
      "https://www.linkedin.com/jobs/view/77",
    );
  });

  it("should return null when company or title is missing", () => {
    expect(mapParsedPageToDetail("1", page({ company: "" }), scrapedAt)).toBeNull();
    expect(mapParsedPageToDetail("1", page({ title: "" }), scrapedAt)).toBeNull();
  });
});

describe("buildListingViewUrl", () => {
  it("should append the id to the view URL base", () => {
    expect(buildListingViewUrl("3901")).toBe("https://www.linkedin.com/jobs/view/3901");
  });
});
