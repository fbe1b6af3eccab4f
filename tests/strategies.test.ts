import crypto from "node:crypto";
import { describe, expect, it } from "vitest";
import { SourceDescriptorSchema } from "../src/config";
import { ChallengeTimeoutError } from "../src/core/errors";
import { buildPageUrl, discoverCandidates } from "../src/crawl";
import { discoveryContext, readFixture, StaticPages, StubRenderer, testConfig } from "./helpers";

const PAGE_URL = "https://data.example.gov/agency/page.html";
const config = testConfig("/tmp/delta-harvester-unused");

function page(...hrefs: string[]): string {
  return `<html><body><ul>${hrefs.map((href) => `<li><a href="${href}">${href}</a></li>`).join("")}</ul></body></html>`;
}

describe("direct strategy", () => {
  it("yields exactly one candidate without fetching anything", async () => {
    const pages = new StaticPages({});
    const source = SourceDescriptorSchema.parse({
      name: "h1b_export",
      group: "USCIS/H1B",
      strategy: "direct",
      url: "https://data.example.gov/export/h1b-2024.csv",
      period: "2024",
    });

    const result = await discoverCandidates(source, discoveryContext(config, pages));

    expect(result.candidates).toEqual([
      {
        remoteLocator: "https://data.example.gov/export/h1b-2024.csv",
        destinationPath: "USCIS/H1B/2024/h1b-2024.csv",
        title: "h1b_export",
        period: { year: 2024, month: 1, day: 1 },
      },
    ]);
    expect(result.pagesVisited).toBe(0);
    expect(pages.requested).toEqual([]);
  });
});

describe("listing strategy", () => {
  it("scans every index page and survives one that fails", async () => {
    const missing = "https://data.example.gov/missing.html";
    const pages = new StaticPages({ [PAGE_URL]: readFixture("listing.html") });
    const source = SourceDescriptorSchema.parse({
      name: "lca",
      group: "DOL/LCA",
      strategy: "listing",
      pageUrls: [missing, PAGE_URL],
      regexFilters: ["LCA"],
      exclude: ["Record_Layout"],
    });

    const result = await discoverCandidates(source, discoveryContext(config, pages));

    expect(result.candidates.map((candidate) => candidate.destinationPath)).toEqual([
      "DOL/LCA/LCA_Disclosure_Data_FY2026_Q1.xlsx",
    ]);
    expect(result.warnings).toEqual([`failed to fetch ${missing}: HTTP 404 for ${missing}`]);
    expect(result.pagesVisited).toBe(1);
  });

  it("reports an unrecognized page as zero candidates plus a warning", async () => {
    const pages = new StaticPages({ [PAGE_URL]: "%PDF-1.4 binary" });
    const source = SourceDescriptorSchema.parse({ name: "odd", group: "DOL", strategy: "listing", pageUrl: PAGE_URL });

    const result = await discoverCandidates(source, discoveryContext(config, pages));

    expect(result.candidates).toEqual([]);
    expect(result.warnings).toEqual([`unrecognized page format at ${PAGE_URL}`]);
  });
});

describe("paginated strategy", () => {
  const base = "https://data.example.gov/warn";

  it("builds page URLs from a query parameter or a template", () => {
    expect(buildPageUrl({ pageUrl: `${base}?sort=desc`, pageParam: "p" }, 2)).toBe(`${base}?sort=desc&p=2`);
    expect(
      buildPageUrl({ pageUrl: base, pageParam: "page", pageUrlTemplate: "https://data.example.gov/warn/p{page}.html" }, 3),
    ).toBe("https://data.example.gov/warn/p3.html");
  });

  it("stops after two consecutive pages without new links", async () => {
    const pages = new StaticPages({
      [`${base}?page=1`]: page("/n/a.pdf"),
      [`${base}?page=2`]: page("/n/b.pdf"),
      [`${base}?page=3`]: page("/n/b.pdf"),
      [`${base}?page=4`]: page("/n/b.pdf"),
      [`${base}?page=5`]: page("/n/c.pdf"),
    });
    const source = SourceDescriptorSchema.parse({ name: "warn", group: "WARN/TX", strategy: "paginated", pageUrl: base });

    const result = await discoverCandidates(source, discoveryContext(config, pages));

    expect(result.candidates.map((candidate) => candidate.remoteLocator)).toEqual([
      "https://data.example.gov/n/a.pdf",
      "https://data.example.gov/n/b.pdf",
    ]);
    expect(pages.requested).toHaveLength(4);
    expect(result.pagesVisited).toBe(4);
  });

  it("stops at the page cap even when every page has new links", async () => {
    const pages = new StaticPages({
      [`${base}?page=1`]: page("/n/a.pdf"),
      [`${base}?page=2`]: page("/n/b.pdf"),
      [`${base}?page=3`]: page("/n/c.pdf"),
      [`${base}?page=4`]: page("/n/d.pdf"),
    });
    const source = SourceDescriptorSchema.parse({
      name: "warn",
      group: "WARN/TX",
      strategy: "paginated",
      pageUrl: base,
      maxPages: 3,
    });

    const result = await discoverCandidates(source, discoveryContext(config, pages));

    expect(result.candidates).toHaveLength(3);
    expect(pages.requested).toEqual([`${base}?page=1`, `${base}?page=2`, `${base}?page=3`]);
  });

  it("keeps what it found when a later page fails", async () => {
    const pages = new StaticPages({ [`${base}?page=0`]: page("/n/a.pdf") });
    const source = SourceDescriptorSchema.parse({
      name: "warn",
      group: "WARN/TX",
      strategy: "paginated",
      pageUrl: base,
      startPage: 0,
    });

    const result = await discoverCandidates(source, discoveryContext(config, pages));

    expect(result.candidates.map((candidate) => candidate.destinationPath)).toEqual(["WARN/TX/a.pdf"]);
    expect(result.warnings).toEqual([`failed to fetch ${base}?page=1: HTTP 404 for ${base}?page=1`]);
  });
});

describe("hierarchical strategy", () => {
  const hub = "https://bulletins.example.gov/bulletins/index.html";
  const branch = (month: string) => `https://bulletins.example.gov/bulletins/2026/bulletin-for-${month}-2026.html`;
  const source = SourceDescriptorSchema.parse({
    name: "bulletins",
    group: "DOS/Visa_Bulletin",
    strategy: "hierarchical",
    pageUrl: hub,
    levels: [{ pattern: "bulletin-for-[a-z]+-\\d{4}", yearRange: { from: 2025, to: 2026 } }],
    periodLayout: "month",
  });

  it("isolates a malformed period page from its siblings", async () => {
    const pages = new StaticPages({
      [hub]: readFixture("hierarchical/hub.html"),
      [branch("january")]: readFixture("hierarchical/january.html"),
      [branch("february")]: readFixture("hierarchical/broken.txt"),
      [branch("march")]: readFixture("hierarchical/march.html"),
    });

    const result = await discoverCandidates(source, discoveryContext(config, pages));

    expect(result.candidates.map((candidate) => [candidate.remoteLocator, candidate.destinationPath])).toEqual([
      ["https://bulletins.example.gov/docs/bulletin-january-2026.pdf", "DOS/Visa_Bulletin/2026-01/bulletin-january-2026.pdf"],
      ["https://bulletins.example.gov/docs/march.pdf", "DOS/Visa_Bulletin/2026-03/march.pdf"],
    ]);
    expect(result.warnings).toEqual([`unrecognized page format at ${branch("february")}`]);
    expect(result.pagesVisited).toBe(4);
    expect(pages.requested).not.toContain("https://bulletins.example.gov/bulletins/2014/bulletin-for-may-2014.html");
  });

  it("skips a period page that cannot be fetched", async () => {
    const pages = new StaticPages({
      [hub]: readFixture("hierarchical/hub.html"),
      [branch("march")]: readFixture("hierarchical/march.html"),
    });

    const result = await discoverCandidates(source, discoveryContext(config, pages));

    expect(result.candidates.map((candidate) => candidate.destinationPath)).toEqual(["DOS/Visa_Bulletin/2026-03/march.pdf"]);
    expect(result.warnings).toHaveLength(2);
  });

  it("yields nothing when the hub is unreachable", async () => {
    const result = await discoverCandidates(source, discoveryContext(config, new StaticPages({})));

    expect(result.candidates).toEqual([]);
    expect(result.warnings).toEqual([`failed to fetch ${hub}: HTTP 404 for ${hub}`]);
  });
});

describe("rendered strategy", () => {
  const source = SourceDescriptorSchema.parse({
    name: "protected",
    group: "DOL/PERM",
    strategy: "rendered",
    pageUrl: PAGE_URL,
    waitForSelector: "ul.files",
    regexFilters: ["PERM"],
  });

  it("extracts links from the rendered DOM", async () => {
    const renderer = new StubRenderer(readFixture("listing.html"));

    const result = await discoverCandidates(source, discoveryContext(config, new StaticPages({}), renderer));

    expect(result.candidates.map((candidate) => candidate.destinationPath)).toEqual([
      "DOL/PERM/PERM_Disclosure_Data_FY2025.xlsx",
    ]);
    expect(renderer.calls).toEqual([{ url: PAGE_URL, options: { timeoutMs: 45_000, waitForSelector: "ul.files" } }]);
  });

  it("degrades to zero candidates when the challenge never clears", async () => {
    const renderer = new StubRenderer(new ChallengeTimeoutError(PAGE_URL, 45_000));

    const result = await discoverCandidates(source, discoveryContext(config, new StaticPages({}), renderer));

    expect(result.candidates).toEqual([]);
    expect(result.warnings).toEqual([
      `render failed for ${PAGE_URL}: Challenge on ${PAGE_URL} not resolved within 45000ms`,
    ]);
  });
});

describe("manual strategy", () => {
  it("reports the page as unavailable instead of producing candidates", async () => {
    const source = SourceDescriptorSchema.parse({
      name: "portal",
      group: "DOL/FLAG",
      strategy: "manual",
      pageUrl: "https://portal.example.gov/",
    });

    const result = await discoverCandidates(source, discoveryContext(config, new StaticPages({})));

    expect(result.candidates).toEqual([]);
    expect(result.unavailable).toEqual([
      { remoteLocator: "https://portal.example.gov/", reason: "Requires authentication; manual download needed" },
    ]);
  });
});

describe("api strategy", () => {
  const endpoint = "https://api.example.gov/timeseries/";
  const source = SourceDescriptorSchema.parse({
    name: "bls_ces",
    group: "BLS/CES",
    strategy: "api",
    endpoint,
    body: { seriesid: ["CES0000000001"], startyear: "{previousYear}", endyear: "{year}" },
    apiKeyEnv: "TEST_API_KEY",
    filename: "ces_{year}.json",
    period: "{year}",
  });
  const digest = crypto
    .createHash("sha256")
    .update('{"endyear":"2026","seriesid":["CES0000000001"],"startyear":"2025"}')
    .digest("hex")
    .slice(0, 12);

  it("builds one POST candidate keyed by the endpoint and a hash of the body", async () => {
    const pages = new StaticPages({});
    const ctx = { ...discoveryContext(config, pages), env: { TEST_API_KEY: "test-key" } };

    const result = await discoverCandidates(source, ctx);

    expect(result.candidates).toEqual([
      {
        remoteLocator: `${endpoint}#${digest}`,
        destinationPath: "BLS/CES/2026/ces_2026.json",
        title: "bls_ces",
        period: { year: 2026, month: 1, day: 1 },
        request: {
          url: endpoint,
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify({
            seriesid: ["CES0000000001"],
            startyear: "2025",
            endyear: "2026",
            registrationkey: "test-key",
          }),
        },
      },
    ]);
    expect(pages.requested).toEqual([]);
  });

  it("keeps the locator stable across key order and API keys", async () => {
    const reordered = SourceDescriptorSchema.parse({
      ...source,
      body: { endyear: "{year}", startyear: "{previousYear}", seriesid: ["CES0000000001"] },
    });

    const withKey = await discoverCandidates(source, { ...discoveryContext(config, new StaticPages({})), env: { TEST_API_KEY: "test-key" } });
    const withoutKey = await discoverCandidates(reordered, { ...discoveryContext(config, new StaticPages({})), env: {} });

    expect(withoutKey.candidates[0].remoteLocator).toBe(withKey.candidates[0].remoteLocator);
    expect(withoutKey.candidates[0].request?.body).toBe('{"endyear":"2026","startyear":"2025","seriesid":["CES0000000001"]}');
  });

  it("passes the key as a query parameter on GET", async () => {
    const get = SourceDescriptorSchema.parse({
      name: "acs",
      group: "Census/ACS",
      strategy: "api",
      method: "GET",
      endpoint: "https://api.example.gov/acs?get=NAME",
      apiKeyEnv: "TEST_API_KEY",
      apiKeyField: "key",
      filename: "acs1_{previousYear}.json",
    });

    const result = await discoverCandidates(get, { ...discoveryContext(config, new StaticPages({})), env: { TEST_API_KEY: "test-key" } });

    expect(result.candidates[0]).toMatchObject({
      remoteLocator: "https://api.example.gov/acs?get=NAME",
      destinationPath: "Census/ACS/acs1_2025.json",
      request: { url: "https://api.example.gov/acs?get=NAME&key=test-key", method: "GET", headers: {} },
    });
    expect(result.candidates[0].request?.body).toBeUndefined();
  });
});
