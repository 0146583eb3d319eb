/**
 * Unit tests for experience requirement extraction
 */

import { describe, it, expect } from "vitest";
import { extractExperience } from "@/extraction";

describe("extractExperience", () => {
  it("should extract a numeric range", () => {
    expect(
      extractExperience(
        "Looking for a candidate with 1-2 years experience in backend systems",
      ),
    ).toBe("1-2 years");
    expect(extractExperience("Requires 3 to 5 years in data teams")).toBe("3 to 5 years");
    expect(extractExperience("2–4 years building APIs")).toBe("2–4 years");
  });

  it("should extract a single amount with its trailing wording", () => {
    expect(extractExperience("5+ years of experience in Go")).toBe(
      "5+ years of experience",
    );
    expect(extractExperience("At least 3 years of exp required")).toBe("3 years of exp");
    expect(extractExperience("2 years in Python")).toBe("2 years");
  });

  it("should recognize entry-level wording", () => {
    expect(extractExperience("Freshers welcome, Fresher role")).toBe("Fresher");
    expect(extractExperience("This is an Entry-Level position")).toBe("Entry-Level");
  });

  it("should prefer a range over a single amount appearing earlier", () => {
    expect(extractExperience("3+ years total, of which 1-2 years in Go")).toBe(
      "1-2 years",
    );
  });

  it("should return undefined when no pattern matches", () => {
    expect(extractExperience("Great team, free lunch, hybrid work")).toBeUndefined();
    expect(extractExperience("")).toBeUndefined();
  });
});
