import { LinkFilter, ListingSource } from "../../config";
import { errorMessage } from "../../observability";
import { buildCandidates, LinkContext } from "../candidates";
import { extractLinks, looksLikeHtml } from "../htmlParser";
import { applyLinkFilter } from "../linkFilters";
import { DiscoveryContext, DiscoveryResult, DiscoveryStrategy } from "../types";

export interface FilteredPage {
  links: LinkContext[];
  warning?: string;
}

/** Link extraction shared by every listing-like strategy, whether the HTML came over HTTP or from a renderer. */
export function filterPageLinks(
  html: string,
  pageUrl: string,
  filter: LinkFilter,
  ctx: Pick<DiscoveryContext, "logger">,
): FilteredPage {
  if (!looksLikeHtml(html)) {
    return { links: [], warning: `unrecognized page format at ${pageUrl}` };
  }

  const links = applyLinkFilter(extractLinks(html, pageUrl, filter.selector), filter, ctx.logger);
  return {
    links: links.map((link) => ({ link, sourcePageUrl: pageUrl })),
  };
}

export function discoverFromHtml(
  html: string,
  pageUrl: string,
  source: { group: string } & LinkFilter,
  ctx: DiscoveryContext,
): DiscoveryResult {
  const page = filterPageLinks(html, pageUrl, source, ctx);
  if (page.warning) {
    ctx.logger.warn("discovery_page_unrecognized", { pageUrl });
  }
  return {
    candidates: buildCandidates(page.links, { group: source.group, filter: source, now: ctx.now }),
    warnings: page.warning ? [page.warning] : [],
    pagesVisited: 1,
  };
}

export const discoverListing: DiscoveryStrategy<ListingSource> = async (source, ctx) => {
  const pageUrls = [...(source.pageUrl ? [source.pageUrl] : []), ...(source.pageUrls ?? [])];
  const collected: LinkContext[] = [];
  const warnings: string[] = [];
  let pagesVisited = 0;

  for (const pageUrl of pageUrls) {
    try {
      const html = await ctx.pages.fetchText(pageUrl);
      pagesVisited += 1;
      const page = filterPageLinks(html, pageUrl, source, ctx);
      if (page.warning) {
        ctx.logger.warn("discovery_page_unrecognized", { source: source.name, pageUrl });
        warnings.push(page.warning);
      }
      ctx.logger.debug("discovery_page_links", { source: source.name, pageUrl, matched: page.links.length });
      collected.push(...page.links);
    } catch (error) {
      const message = errorMessage(error);
      ctx.logger.warn("discovery_page_failed", { source: source.name, pageUrl, error: message });
      warnings.push(`failed to fetch ${pageUrl}: ${message}`);
    }
  }

  return {
    candidates: buildCandidates(collected, { group: source.group, filter: source, now: ctx.now }),
    warnings,
    pagesVisited,
  };
};
