import { LinkFilter } from "../config";
import { buildDestinationPath, fallbackFilename, filenameFromUrl } from "../core/paths";
import { ParsedLink } from "./htmlParser";
import { Period, comparePeriods, detectPeriod, isWithinMonths, periodSegment } from "./periods";
import { Candidate } from "./types";

export interface LinkContext {
  link: ParsedLink;
  sourcePageUrl: string;
  /** Period inherited from a parent traversal level. */
  inheritedPeriod?: Period;
  /** Extra text (e.g. the parent link label) consulted for fiscal-year folders. */
  contextText?: string;
}

export interface CandidateBuildOptions {
  group: string;
  filter: Pick<LinkFilter, "withinMonths" | "limit" | "periodLayout">;
  now: Date;
}

interface Dated {
  candidate: Candidate;
  period?: Period;
  order: number;
}

function linkPeriod(item: LinkContext): Period | undefined {
  const filename = filenameFromUrl(item.link.url) ?? "";
  return detectPeriod(filename) ?? detectPeriod(item.link.text) ?? detectPeriod(item.link.url) ?? item.inheritedPeriod;
}

/**
 * Maps filtered links to candidates in discovery order. Destination paths come
 * only from the group, the detected period and the URL file name; two locators
 * may share one here and are told apart when the driver assigns destinations.
 */
export function buildCandidates(items: LinkContext[], options: CandidateBuildOptions): Candidate[] {
  const seen = new Set<string>();
  let dated: Dated[] = [];

  items.forEach((item, order) => {
    if (seen.has(item.link.url)) {
      return;
    }
    const period = linkPeriod(item);
    if (options.filter.withinMonths !== undefined && (!period || !isWithinMonths(period, options.now, options.filter.withinMonths))) {
      return;
    }

    seen.add(item.link.url);
    const filename = filenameFromUrl(item.link.url) ?? fallbackFilename(options.group, item.link.url, period);
    const segment = periodSegment(
      options.filter.periodLayout,
      period,
      `${filename} ${item.link.text} ${item.contextText ?? ""}`,
    );
    const destinationPath = buildDestinationPath(options.group, segment, filename);

    dated.push({
      order,
      period,
      candidate: {
        remoteLocator: item.link.url,
        destinationPath,
        title: item.link.text || filename,
        period,
        sourcePageUrl: item.sourcePageUrl,
      },
    });
  });

  if (options.filter.limit !== undefined && dated.length > options.filter.limit) {
    // Keep the most recent; undated links rank last. Survivors stay in discovery order.
    const keep = new Set(
      [...dated]
        .sort((a, b) => {
          if (a.period && b.period) {
            return comparePeriods(b.period, a.period) || a.order - b.order;
          }
          if (a.period) {
            return -1;
          }
          if (b.period) {
            return 1;
          }
          return a.order - b.order;
        })
        .slice(0, options.filter.limit)
        .map((entry) => entry.order),
    );
    dated = dated.filter((entry) => keep.has(entry.order));
  }

  return dated.map((entry) => entry.candidate);
}
