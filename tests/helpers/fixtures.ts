/**
 * Builders for domain fixtures
 */

import type { ListingDetail, OutputRow, RunConfig, SkillVocabulary } from "@/types";
import { compileSkillVocabulary } from "@/extraction";

export function buildVocabulary(skills: string[]): SkillVocabulary {
  return compileSkillVocabulary({ version: "test", skills });
}

export function buildDetail(overrides: Partial<ListingDetail> = {}): ListingDetail {
  return {
    id: "101",
    company: "Acme Corp",
    title: "Backend Engineer",
    location: "Bangalore, Karnataka, India",
    description: "Build APIs in Go and Python. 2+ years of experience.",
    applyUrl: "https://www.linkedin.com/jobs/view/backend-engineer-101",
    scrapedAt: new Date(2024, 4, 6, 9, 5),
    ...overrides,
  };
}

export function buildOutputRow(overrides: Partial<OutputRow> = {}): OutputRow {
  return {
    ...buildDetail(),
    experience: "2+ years of experience",
    skills: ["Python", "Go"],
    ...overrides,
  };
}

export function buildRunConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    queries: [{ keyword: "software developer", location: "Bangalore, Karnataka" }],
    pagesPerQuery: 3,
    experienceLevels: ["entry", "associate"],
    vocabulary: buildVocabulary(["Python", "Go", "Docker"]),
    maxSkills: 10,
    previewLength: 500,
    progressInterval: 10,
    searchPageDelayMs: 0,
    detailDelayMs: 0,
    httpTimeoutMs: 15_000,
    credentials: { keysFile: "/nonexistent/keys.json", tokenFile: "/nonexistent/token.json" },
    sheetTitlePrefix: "Job Listings",
    ...overrides,
  };
}
