import { LinkFilter } from "../config";
import { extensionFromUrl } from "../core/paths";
import { Logger } from "../observability";
import { ParsedLink } from "./htmlParser";

export function compilePatterns(patterns: string[], logger: Logger): RegExp[] {
  const compiled: RegExp[] = [];
  for (const pattern of patterns) {
    try {
      compiled.push(new RegExp(pattern, "i"));
    } catch (error) {
      logger.warn("link_filter_invalid_regex", {
        pattern,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return compiled;
}

export function hasAllowedExtension(url: string, extensions: string[]): boolean {
  const ext = extensionFromUrl(url);
  if (!ext) {
    return false;
  }
  return extensions.some((allowed) => allowed.toLowerCase() === ext || `.${allowed.toLowerCase()}` === ext);
}

export function applyLinkFilter(links: ParsedLink[], filter: LinkFilter, logger: Logger): ParsedLink[] {
  const include = compilePatterns(filter.regexFilters, logger);
  const exclude = compilePatterns(filter.exclude, logger);
  const pattern = filter.pattern?.toLowerCase();

  return links.filter((link) => {
    if (!hasAllowedExtension(link.url, filter.extensions)) {
      return false;
    }

    const combined = `${link.url} ${link.text}`;
    if (filter.regexFilters.length > 0 && !include.some((regex) => regex.test(combined))) {
      return false;
    }
    if (pattern && !combined.toLowerCase().includes(pattern)) {
      return false;
    }
    return !exclude.some((regex) => regex.test(combined));
  });
}
