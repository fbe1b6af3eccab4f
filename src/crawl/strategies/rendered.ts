import { RenderedSource } from "../../config";
import { errorMessage } from "../../observability";
import { DiscoveryStrategy } from "../types";
import { discoverFromHtml } from "./listing";

/**
 * Same link extraction as a single listing page, but the DOM comes from a
 * headless browser once any interstitial challenge has cleared. Any failure,
 * including an unsolved challenge, degrades to zero candidates.
 */
export const discoverRendered: DiscoveryStrategy<RenderedSource> = async (source, ctx) => {
  const stopTimer = ctx.metrics.startTimer("render_ms");
  let html: string;
  try {
    html = await ctx.renderer.render(source.pageUrl, {
      timeoutMs: ctx.config.renderTimeoutMs,
      waitForSelector: source.waitForSelector,
    });
  } catch (error) {
    const message = errorMessage(error);
    ctx.logger.warn("discovery_render_failed", {
      source: source.name,
      pageUrl: source.pageUrl,
      durationMs: stopTimer(),
      error: message,
    });
    return { candidates: [], warnings: [`render failed for ${source.pageUrl}: ${message}`], pagesVisited: 0 };
  }

  ctx.logger.info("discovery_render_complete", { source: source.name, pageUrl: source.pageUrl, durationMs: stopTimer() });
  ctx.metrics.incrementCounter("pages_fetched", 1);
  return discoverFromHtml(html, source.pageUrl, source, ctx);
};
