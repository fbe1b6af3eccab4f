import { HierarchicalSource, TraversalLevel } from "../../config";
import { errorMessage } from "../../observability";
import { buildCandidates, LinkContext } from "../candidates";
import { extractLinks, looksLikeHtml, ParsedLink } from "../htmlParser";
import { compilePatterns } from "../linkFilters";
import { detectPeriod, Period } from "../periods";
import { DiscoveryContext, DiscoveryStrategy } from "../types";
import { filterPageLinks } from "./listing";

interface Branch {
  url: string;
  label: string;
  period?: Period;
}

interface WalkState {
  source: HierarchicalSource;
  ctx: DiscoveryContext;
  visited: Set<string>;
  collected: LinkContext[];
  warnings: string[];
  pagesVisited: number;
}

function linkYear(link: ParsedLink): number | undefined {
  const match = `${link.url} ${link.text}`.match(/\b(19\d{2}|20\d{2})\b/);
  return match ? Number.parseInt(match[1], 10) : undefined;
}

function selectBranches(html: string, pageUrl: string, level: TraversalLevel, ctx: DiscoveryContext, parent?: Period): Branch[] {
  const [pattern] = compilePatterns([level.pattern], ctx.logger);
  if (!pattern) {
    return [];
  }

  const branches: Branch[] = [];
  for (const link of extractLinks(html, pageUrl, level.selector)) {
    if (!pattern.test(`${link.url} ${link.text}`)) {
      continue;
    }
    if (level.yearRange) {
      const year = linkYear(link);
      if (year === undefined || year < level.yearRange.from || year > level.yearRange.to) {
        continue;
      }
    }
    branches.push({
      url: link.url,
      label: link.text,
      period: detectPeriod(link.url) ?? detectPeriod(link.text) ?? parent,
    });
  }
  return branches;
}

async function fetchLevel(state: WalkState, pageUrl: string): Promise<string | undefined> {
  const { source, ctx } = state;
  try {
    const html = await ctx.pages.fetchText(pageUrl);
    state.pagesVisited += 1;
    if (!looksLikeHtml(html)) {
      ctx.logger.warn("discovery_page_unrecognized", { source: source.name, pageUrl });
      state.warnings.push(`unrecognized page format at ${pageUrl}`);
      return undefined;
    }
    return html;
  } catch (error) {
    const message = errorMessage(error);
    ctx.logger.warn("discovery_page_failed", { source: source.name, pageUrl, error: message });
    state.warnings.push(`failed to fetch ${pageUrl}: ${message}`);
    return undefined;
  }
}

async function walk(state: WalkState, branch: Branch, depth: number): Promise<void> {
  const { source, ctx } = state;
  if (state.visited.has(branch.url)) {
    return;
  }
  state.visited.add(branch.url);

  const html = await fetchLevel(state, branch.url);
  if (html === undefined) {
    return;
  }

  if (depth === source.levels.length) {
    const page = filterPageLinks(html, branch.url, source, ctx);
    ctx.logger.debug("discovery_leaf_links", { source: source.name, pageUrl: branch.url, matched: page.links.length });
    state.collected.push(
      ...page.links.map((item) => ({ ...item, inheritedPeriod: branch.period, contextText: branch.label })),
    );
    return;
  }

  const level = source.levels[depth];
  const children = selectBranches(html, branch.url, level, ctx, branch.period);
  if (children.length === 0) {
    ctx.logger.warn("discovery_level_empty", { source: source.name, pageUrl: branch.url, depth });
    state.warnings.push(`no level-${depth + 1} links matched on ${branch.url}`);
    return;
  }

  // Each branch is isolated: a broken period page costs only its own candidates.
  for (const child of children) {
    try {
      await walk(state, child, depth + 1);
    } catch (error) {
      const message = errorMessage(error);
      ctx.logger.warn("discovery_branch_failed", { source: source.name, pageUrl: child.url, error: message });
      state.warnings.push(`branch ${child.url} failed: ${message}`);
    }
  }
}

/**
 * Hub → (optional year/period index) → terminal documents. Depth is fixed by the
 * number of declared levels.
 */
export const discoverHierarchical: DiscoveryStrategy<HierarchicalSource> = async (source, ctx) => {
  const state: WalkState = {
    source,
    ctx,
    visited: new Set<string>(),
    collected: [],
    warnings: [],
    pagesVisited: 0,
  };

  await walk(state, { url: source.pageUrl, label: source.name }, 0);

  return {
    candidates: buildCandidates(state.collected, { group: source.group, filter: source, now: ctx.now }),
    warnings: state.warnings,
    pagesVisited: state.pagesVisited,
  };
};
