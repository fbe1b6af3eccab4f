import { describe, expect, it } from "vitest";
import { DEFAULT_EXTENSIONS, LinkFilter } from "../src/config";
import { buildCandidates, LinkContext } from "../src/crawl/candidates";
import { extractLinks } from "../src/crawl/htmlParser";
import { applyLinkFilter } from "../src/crawl/linkFilters";
import { filterPageLinks } from "../src/crawl/strategies/listing";
import { quietLogger, readFixture, RUN_DATE } from "./helpers";

const PAGE_URL = "https://data.example.gov/agency/page.html";

function filter(overrides: Partial<LinkFilter> = {}): LinkFilter {
  return {
    selector: "a[href]",
    extensions: DEFAULT_EXTENSIONS,
    regexFilters: [],
    exclude: [],
    periodLayout: "none",
    ...overrides,
  };
}

function contexts(urls: string[]): LinkContext[] {
  return urls.map((url) => ({ link: { url, text: "" }, sourcePageUrl: PAGE_URL }));
}

describe("extractLinks", () => {
  it("resolves relative links and drops fragments, mailto and duplicates", () => {
    const links = extractLinks(readFixture("listing.html"), PAGE_URL);

    expect(links.map((link) => link.url)).toEqual([
      "https://data.example.gov/",
      "https://data.example.gov/files/LCA_Disclosure_Data_FY2026_Q1.xlsx",
      "https://data.example.gov/files/PERM_Disclosure_Data_FY2025.xlsx",
      "https://data.example.gov/files/LCA_Record_Layout_FY2026.pdf",
      "https://data.example.gov/files/report-2019-03.pdf",
      "https://cdn.example.gov/docs/summary-2026-08.csv",
      "https://data.example.gov/about.html",
    ]);
    expect(links[1].text).toBe("LCA Disclosure Data FY2026 Q1");
  });

  it("honours a narrower selector", () => {
    const links = extractLinks(readFixture("listing.html"), PAGE_URL, "nav a[href]");
    expect(links).toEqual([{ url: "https://data.example.gov/", text: "Home" }]);
  });
});

describe("applyLinkFilter", () => {
  const links = extractLinks(readFixture("listing.html"), PAGE_URL);

  it("keeps only downloadable extensions by default", () => {
    const kept = applyLinkFilter(links, filter(), quietLogger());
    expect(kept).toHaveLength(5);
    expect(kept.some((link) => link.url.endsWith("about.html"))).toBe(false);
  });

  it("applies include patterns to url and text, then excludes", () => {
    const kept = applyLinkFilter(links, filter({ regexFilters: ["lca"], exclude: ["Record_Layout"] }), quietLogger());
    expect(kept.map((link) => link.url)).toEqual(["https://data.example.gov/files/LCA_Disclosure_Data_FY2026_Q1.xlsx"]);
  });

  it("matches the plain pattern case-insensitively", () => {
    const kept = applyLinkFilter(links, filter({ pattern: "perm" }), quietLogger());
    expect(kept.map((link) => link.url)).toEqual(["https://data.example.gov/files/PERM_Disclosure_Data_FY2025.xlsx"]);
  });

  it("ignores an invalid regex instead of failing", () => {
    const kept = applyLinkFilter(links, filter({ regexFilters: ["([", "PERM"] }), quietLogger());
    expect(kept.map((link) => link.url)).toEqual(["https://data.example.gov/files/PERM_Disclosure_Data_FY2025.xlsx"]);
  });
});

describe("buildCandidates", () => {
  const page = filterPageLinks(readFixture("listing.html"), PAGE_URL, filter(), { logger: quietLogger() });

  it("drops stale and undated links and files by fiscal year", () => {
    const candidates = buildCandidates(page.links, {
      group: "DOL/LCA",
      filter: { withinMonths: 12, periodLayout: "fiscal_year" },
      now: RUN_DATE,
    });

    expect(candidates.map((candidate) => candidate.destinationPath)).toEqual([
      "DOL/LCA/FY2026/LCA_Disclosure_Data_FY2026_Q1.xlsx",
      "DOL/LCA/FY2026/LCA_Record_Layout_FY2026.pdf",
      "DOL/LCA/FY2026/summary-2026-08.csv",
    ]);
    expect(candidates[2]).toMatchObject({
      remoteLocator: "https://cdn.example.gov/docs/summary-2026-08.csv",
      title: "Summary August 2026",
      period: { year: 2026, month: 8, day: 1 },
      sourcePageUrl: PAGE_URL,
    });
  });

  it("keeps the most recent links under a limit, in discovery order", () => {
    const candidates = buildCandidates(page.links, {
      group: "DOL/LCA",
      filter: { withinMonths: 12, limit: 2, periodLayout: "none" },
      now: RUN_DATE,
    });

    expect(candidates.map((candidate) => candidate.destinationPath)).toEqual([
      "DOL/LCA/LCA_Record_Layout_FY2026.pdf",
      "DOL/LCA/summary-2026-08.csv",
    ]);
  });

  it("ranks undated links last", () => {
    const candidates = buildCandidates(
      contexts(["https://a.example.gov/notes.pdf", "https://a.example.gov/r-2026-01.pdf"]),
      { group: "G", filter: { limit: 1, periodLayout: "none" }, now: RUN_DATE },
    );
    expect(candidates.map((candidate) => candidate.remoteLocator)).toEqual(["https://a.example.gov/r-2026-01.pdf"]);
  });

  it("derives the destination from the file name alone", () => {
    const candidates = buildCandidates(contexts(["https://a.example.gov/x/data.csv", "https://a.example.gov/y/data.csv"]), {
      group: "G",
      filter: { periodLayout: "none" },
      now: RUN_DATE,
    });

    expect(candidates.map((candidate) => candidate.destinationPath)).toEqual(["G/data.csv", "G/data.csv"]);
  });

  it("inherits the parent period when the link carries none", () => {
    const [candidate] = buildCandidates(
      [
        {
          link: { url: "https://a.example.gov/docs/march.pdf", text: "printable bulletin" },
          sourcePageUrl: PAGE_URL,
          inheritedPeriod: { year: 2026, month: 3, day: 1 },
        },
      ],
      { group: "DOS/Visa_Bulletin", filter: { periodLayout: "year" }, now: RUN_DATE },
    );
    expect(candidate.destinationPath).toBe("DOS/Visa_Bulletin/2026/march.pdf");
  });

  it("reports pages that are not HTML", () => {
    const result = filterPageLinks("%PDF-1.4", PAGE_URL, filter(), { logger: quietLogger() });
    expect(result).toEqual({ links: [], warning: `unrecognized page format at ${PAGE_URL}` });
  });
});
