/**
 * Unit tests for LinkedIn guest page parsers (HTML fixtures)
 */

import { describe, it, expect } from "vitest";
import {
  cleanCanonicalUrl,
  parseListingPage,
  parseSearchPage,
} from "@/clients/linkedin";
import { loadFixtureText } from "../helpers/mockHttp";

describe("parseSearchPage", () => {
  it("should extract entity URN ids in page order, repeats included", () => {
    expect(parseSearchPage(loadFixtureText("linkedin/search_page_urn.html"))).toEqual({
      ids: ["3901", "3902", "3903", "3901"],
      markup: "entity_urn",
    });
  });

  it("should fall back to data-job-id markup", () => {
    expect(parseSearchPage(loadFixtureText("linkedin/search_page_job_id.html"))).toEqual({
      ids: ["5501", "5502"],
      markup: "job_id",
    });
  });

  it("should report unrecognized markup with no ids", () => {
    expect(parseSearchPage(loadFixtureText("linkedin/search_page_empty.html"))).toEqual({
      ids: [],
      markup: "none",
    });
  });

  it("should prefer URN ids when both markups are present", () => {
    const html = `<div data-job-id="1"></div><div data-entity-urn="urn:li:jobPosting:2"></div>`;
    expect(parseSearchPage(html)).toEqual({ ids: ["2"], markup: "entity_urn" });
  });
});

describe("parseListingPage", () => {
  it("should parse every field of a full detail page", () => {
    expect(parseListingPage(loadFixtureText("linkedin/detail_full.html"))).toEqual({
      title: "Backend Engineer",
      company: "Acme & Co",
      location: "Bangalore, Karnataka, India",
      salary: "₹12,00,000/yr - ₹18,00,000/yr",
      description:
        "We are looking for a candidate with 1-2 years experience in backend systems. Python & Django Docker, Kubernetes Java",
      canonicalUrl: "https://in.linkedin.com/jobs/view/backend-engineer-at-acme-3901",
    });
  });

  it("should use fallback selectors and reject login-wall links", () => {
    expect(parseListingPage(loadFixtureText("linkedin/detail_fallbacks.html"))).toEqual({
      title: "Automation Engineer",
      company: "Globex Ltd",
      location: "Hyderabad, Telangana, India",
      salary: "",
      description: "Fresher role building n8n and Zapier workflows.",
      canonicalUrl: null,
    });
  });

  it("should read company, location and link from the alternate top card markup", () => {
    const html = [
      `<h2 class="top-card-layout__title"><a href="https://in.linkedin.com/jobs/view/data-analyst-88?trk=x">Data Analyst</a></h2>`,
      `<div class="topcard__flavor--metadata"><a href="/company/initech">Initech</a></div>`,
      `<div class="job-details-jobs-unified-top-card__primary-description-container"><span>Pune, Maharashtra, India</span></div>`,
    ].join("");

    const page = parseListingPage(html);

    expect(page.title).toBe("Data Analyst");
    expect(page.company).toBe("Initech");
    expect(page.location).toBe("Pune, Maharashtra, India");
    expect(page.canonicalUrl).toBe("https://in.linkedin.com/jobs/view/data-analyst-88");
  });

  it("should prefer the base card link as canonical URL", () => {
    const html = `<h1>Role</h1><a class="topcard__link" href="https://www.linkedin.com/jobs/view/2"></a><a class="base-card__full-link" href="https://www.linkedin.com/jobs/view/1"></a>`;
    expect(parseListingPage(html).canonicalUrl).toBe("https://www.linkedin.com/jobs/view/1");
  });

  it("should leave company empty when only the location flavor exists", () => {
    const page = parseListingPage(loadFixtureText("linkedin/detail_missing_company.html"));
    expect(page.title).toBe("Senior Platform Engineer");
    expect(page.company).toBe("");
    expect(page.description).toBe("Expired posting.");
  });
});

describe("cleanCanonicalUrl", () => {
  it("should strip query string and fragment", () => {
    expect(cleanCanonicalUrl("https://www.linkedin.com/jobs/view/x-42?trk=a#top")).toBe(
      "https://www.linkedin.com/jobs/view/x-42",
    );
  });

  it("should reject relative, empty and auth-wall links", () => {
    expect(cleanCanonicalUrl("/jobs/view/42")).toBeNull();
    expect(cleanCanonicalUrl(null)).toBeNull();
    expect(cleanCanonicalUrl("https://www.linkedin.com/authwall?trk=x")).toBeNull();
  });
});
