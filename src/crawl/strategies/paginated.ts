import { PaginatedSource } from "../../config";
import { errorMessage } from "../../observability";
import { buildCandidates, LinkContext } from "../candidates";
import { DiscoveryStrategy } from "../types";
import { filterPageLinks } from "./listing";

const EMPTY_PAGES_BEFORE_STOP = 2;

export function buildPageUrl(source: Pick<PaginatedSource, "pageUrl" | "pageParam" | "pageUrlTemplate">, page: number): string {
  if (source.pageUrlTemplate) {
    return source.pageUrlTemplate.split("{page}").join(String(page));
  }
  const url = new URL(source.pageUrl);
  url.searchParams.set(source.pageParam, String(page));
  return url.toString();
}

/**
 * Walks `startPage, startPage + 1, ...` until two consecutive pages add no new
 * matching links or the page cap is hit. Servers that echo the last page for
 * any out-of-range number therefore terminate after two extra requests.
 */
export const discoverPaginated: DiscoveryStrategy<PaginatedSource> = async (source, ctx) => {
  const pageCap = source.maxPages ?? ctx.config.maxPages;
  const seen = new Set<string>();
  const collected: LinkContext[] = [];
  const warnings: string[] = [];
  let consecutiveEmpty = 0;
  let pagesVisited = 0;

  for (let offset = 0; offset < pageCap; offset += 1) {
    const pageNumber = source.startPage + offset;
    const pageUrl = buildPageUrl(source, pageNumber);

    let html: string;
    try {
      html = await ctx.pages.fetchText(pageUrl);
    } catch (error) {
      const message = errorMessage(error);
      ctx.logger.warn("discovery_page_failed", { source: source.name, pageUrl, attempt: pageNumber, error: message });
      warnings.push(`failed to fetch ${pageUrl}: ${message}`);
      break;
    }
    pagesVisited += 1;

    const page = filterPageLinks(html, pageUrl, source, ctx);
    if (page.warning) {
      ctx.logger.warn("discovery_page_unrecognized", { source: source.name, pageUrl });
      warnings.push(page.warning);
    }

    const fresh = page.links.filter((item) => !seen.has(item.link.url));
    for (const item of fresh) {
      seen.add(item.link.url);
    }
    collected.push(...fresh);
    ctx.logger.debug("discovery_page_links", { source: source.name, pageUrl, fresh: fresh.length });

    consecutiveEmpty = fresh.length === 0 ? consecutiveEmpty + 1 : 0;
    if (consecutiveEmpty >= EMPTY_PAGES_BEFORE_STOP) {
      break;
    }
    if (offset + 1 >= pageCap) {
      ctx.logger.warn("discovery_max_pages_reached", { source: source.name, maxPages: pageCap });
    }
  }

  return {
    candidates: buildCandidates(collected, { group: source.group, filter: source, now: ctx.now }),
    warnings,
    pagesVisited,
  };
};
