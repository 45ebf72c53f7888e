import * as cheerio from "cheerio";

export function loadCheerio(html: string): cheerio.CheerioAPI {
  return cheerio.load(html);
}

export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Resolves an anchor href against the page URL. Fragment-only, `javascript:`
 * and non-HTTP(S) targets resolve to null.
 */
export function resolveHref(href: string, baseUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;
  if (trimmed.toLowerCase().startsWith("javascript:")) return null;

  try {
    const resolved = new URL(trimmed, baseUrl);
    if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
      return null;
    }
    return resolved.toString();
  } catch {
    return null;
  }
}
