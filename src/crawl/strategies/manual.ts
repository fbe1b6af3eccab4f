import { ManualSource } from "../../config";
import { DiscoveryStrategy } from "../types";

export const discoverManual: DiscoveryStrategy<ManualSource> = async (source, ctx) => {
  ctx.logger.info("discovery_manual_source", { source: source.name, pageUrl: source.pageUrl });
  return {
    candidates: [],
    warnings: [],
    pagesVisited: 0,
    unavailable: [{ remoteLocator: source.pageUrl, reason: source.reason }],
  };
};
