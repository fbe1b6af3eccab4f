import { load } from "cheerio";

export interface ParsedLink {
  url: string;
  text: string;
}

function sanitizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function normalizeUrl(baseUrl: string, href: string): string | undefined {
  try {
    const url = new URL(href, baseUrl);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return undefined;
    }
    url.hash = "";
    return url.toString();
  } catch {
    return undefined;
  }
}

/** True when the payload looks like an HTML document at all. */
export function looksLikeHtml(html: string): boolean {
  return /<(html|body|a|div|table|ul)\b/i.test(html);
}

export function extractLinks(html: string, pageUrl: string, selector = "a[href]"): ParsedLink[] {
  const $ = load(html);
  const links: ParsedLink[] = [];
  const seen = new Set<string>();

  $(selector).each((_, element) => {
    const href = $(element).attr("href") ?? $(element).find("a[href]").first().attr("href");
    if (!href || href.startsWith("#")) {
      return;
    }

    const normalizedUrl = normalizeUrl(pageUrl, href.trim());
    if (!normalizedUrl || seen.has(normalizedUrl)) {
      return;
    }

    seen.add(normalizedUrl);
    links.push({
      url: normalizedUrl,
      text: sanitizeText($(element).text() || $(element).attr("title") || ""),
    });
  });

  return links;
}
