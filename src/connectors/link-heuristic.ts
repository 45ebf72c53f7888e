import { logger } from "../logger";
import type { CandidatePosting } from "../types";
import type { PostingExtractor } from "./extractors";
import { cleanText, loadCheerio, resolveHref } from "./html";

export const TITLE_KEYWORDS = ["job", "career", "openings", "position"];
export const URL_KEYWORDS = ["job", "career", "posting", "requisition"];

export const UNTITLED_LINK = "(No Title Text)";

export function looksLikePosting(title: string, url: string): boolean {
  const lowerTitle = title.toLowerCase();
  const lowerUrl = url.toLowerCase();
  return (
    TITLE_KEYWORDS.some((kw) => lowerTitle.includes(kw)) ||
    URL_KEYWORDS.some((kw) => lowerUrl.includes(kw))
  );
}

/**
 * Site-agnostic fallback: every link whose text or URL mentions jobs is a
 * candidate. Noisy by nature; targets with known markup should configure
 * selectors instead.
 */
export class LinkHeuristicExtractor implements PostingExtractor {
  readonly name = "link-heuristic";

  extract(html: string, baseUrl: string): CandidatePosting[] {
    const $ = loadCheerio(html);
    const links = $("a[href]");
    const candidates: CandidatePosting[] = [];
    const seenUrls = new Set<string>();

    logger.debug(`Scanning ${links.length} links on ${baseUrl}`);

    links.each((_i, el) => {
      const href = $(el).attr("href") ?? "";
      const url = resolveHref(href, baseUrl);
      const title = cleanText($(el).text()) || UNTITLED_LINK;

      if (!url) {
        logger.debug(`Skipping link without usable target: ${href}`);
        return;
      }
      if (!looksLikePosting(title, url)) {
        logger.debug(`Skipping link (no job keywords): ${title} - ${url}`);
        return;
      }
      if (seenUrls.has(url)) {
        return;
      }
      seenUrls.add(url);

      candidates.push({
        title,
        url,
        location: null,
        description: null,
        postedAt: null,
      });
    });

    if (links.length === 0) {
      logger.warn(
        `No links found at all on ${baseUrl}. Page might be empty, need JavaScript, or have unexpected structure.`,
      );
    } else if (candidates.length === 0) {
      logger.warn(
        `No potential postings among ${links.length} links on ${baseUrl}. Review the target's markup or configure selectors.`,
      );
    }

    return candidates;
  }
}
