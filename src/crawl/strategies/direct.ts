import { DirectSource } from "../../config";
import { buildDestinationPath, fallbackFilename, filenameFromUrl } from "../../core/paths";
import { detectPeriod } from "../periods";
import { DiscoveryStrategy } from "../types";

export const discoverDirect: DiscoveryStrategy<DirectSource> = async (source) => {
  const period = source.period ? detectPeriod(source.period) : undefined;
  const filename = source.filename ?? filenameFromUrl(source.url) ?? fallbackFilename(source.group, source.url, period);

  return {
    candidates: [
      {
        remoteLocator: source.url,
        destinationPath: buildDestinationPath(source.group, source.period, filename),
        title: source.name,
        period,
      },
    ],
    warnings: [],
    pagesVisited: 0,
  };
};
