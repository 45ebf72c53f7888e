import type { CandidatePosting } from "../types";
import type { Target } from "../config";
import { LinkHeuristicExtractor } from "./link-heuristic";
import { SelectorExtractor } from "./selector";

/** Turns one career page into candidate postings. */
export interface PostingExtractor {
  readonly name: string;
  extract(html: string, baseUrl: string): CandidatePosting[];
}

export type ExtractorResolver = (target: Target) => PostingExtractor;

const defaultExtractor = new LinkHeuristicExtractor();

export const resolveExtractor: ExtractorResolver = (target) =>
  target.selectors ? new SelectorExtractor(target.selectors) : defaultExtractor;
