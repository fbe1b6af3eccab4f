import { SourceDescriptor } from "../config";
import { discoverApi } from "./strategies/api";
import { discoverDirect } from "./strategies/direct";
import { discoverHierarchical } from "./strategies/hierarchical";
import { discoverListing } from "./strategies/listing";
import { discoverManual } from "./strategies/manual";
import { discoverPaginated } from "./strategies/paginated";
import { discoverRendered } from "./strategies/rendered";
import { DiscoveryContext, DiscoveryResult } from "./types";

/** Dispatches a source to the strategy named by its `strategy` tag. */
export function discoverCandidates(source: SourceDescriptor, ctx: DiscoveryContext): Promise<DiscoveryResult> {
  switch (source.strategy) {
    case "direct":
      return discoverDirect(source, ctx);
    case "listing":
      return discoverListing(source, ctx);
    case "paginated":
      return discoverPaginated(source, ctx);
    case "hierarchical":
      return discoverHierarchical(source, ctx);
    case "rendered":
      return discoverRendered(source, ctx);
    case "manual":
      return discoverManual(source, ctx);
    case "api":
      return discoverApi(source, ctx);
    default: {
      const unreachable: never = source;
      throw new Error(`Unsupported discovery strategy: ${JSON.stringify(unreachable)}`);
    }
  }
}

export { buildCandidates } from "./candidates";
export { extractLinks, looksLikeHtml } from "./htmlParser";
export type { ParsedLink } from "./htmlParser";
export { applyLinkFilter, hasAllowedExtension } from "./linkFilters";
export { detectFiscalYear, detectPeriod, isWithinMonths, periodSegment } from "./periods";
export type { Period } from "./periods";
export { PlaywrightRenderer } from "./renderer";
export { buildPageUrl } from "./strategies/paginated";
export { apiLocator } from "./strategies/api";
export type {
  ArtifactRequest,
  Candidate,
  DiscoveryContext,
  DiscoveryResult,
  DiscoveryStrategy,
  PageSource,
  Renderer,
  RenderOptions,
  UnavailableArtifact,
} from "./types";
