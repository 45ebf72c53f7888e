import { logger } from "../logger";
import type { CandidatePosting } from "../types";
import type { TargetSelectors } from "../config";
import type { PostingExtractor } from "./extractors";
import { cleanText, loadCheerio, resolveHref } from "./html";

/** Extracts one candidate per listing container using per-target CSS selectors. */
export class SelectorExtractor implements PostingExtractor {
  readonly name = "selector";

  constructor(private readonly selectors: TargetSelectors) {}

  extract(html: string, baseUrl: string): CandidatePosting[] {
    const $ = loadCheerio(html);
    const candidates: CandidatePosting[] = [];
    const seenUrls = new Set<string>();
    const containers = $(this.selectors.container);

    containers.each((_i, el) => {
      const $job = $(el);

      const title = cleanText($job.find(this.selectors.title).first().text());
      if (!title) return;

      const $link = $job.is(this.selectors.link)
        ? $job
        : $job.find(this.selectors.link).first();
      const url = resolveHref($link.attr("href") ?? "", baseUrl);
      if (!url || seenUrls.has(url)) return;
      seenUrls.add(url);

      const location = this.selectors.location
        ? cleanText($job.find(this.selectors.location).first().text())
        : "";
      const description = this.selectors.description
        ? cleanText($job.find(this.selectors.description).first().text())
        : "";

      candidates.push({
        title,
        url,
        location: location || null,
        description: description || null,
        postedAt: null,
      });
    });

    if (containers.length === 0) {
      logger.warn(
        `Selector "${this.selectors.container}" matched nothing on ${baseUrl}. The page layout may have changed.`,
      );
    }

    return candidates;
  }
}
