import type { Preferences } from "../config";
import type { CandidatePosting, RejectionReason } from "../types";

const ANY = "any";
const EXCLUDE_PREFIX = "exclude:";

type FilterInput = Pick<CandidatePosting, "title" | "description" | "location">;

function lowerAll(values: readonly string[]): string[] {
  return values.map((v) => v.toLowerCase());
}

/** True for the `["any"]` sentinel that switches a check off. */
export function isAnySentinel(values: readonly string[]): boolean {
  return values.length === 1 && values[0].trim().toLowerCase() === ANY;
}

function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((kw) => text.includes(kw));
}

export function splitLocationPreferences(values: readonly string[]): {
  include: string[];
  exclude: string[];
} {
  const include: string[] = [];
  const exclude: string[] = [];

  for (const value of lowerAll(values)) {
    if (value.startsWith(EXCLUDE_PREFIX)) {
      const stripped = value.slice(EXCLUDE_PREFIX.length).trim();
      if (stripped) exclude.push(stripped);
    } else {
      include.push(value);
    }
  }

  return { include, exclude };
}

/**
 * Returns the first check that rejects the candidate, or null when it passes
 * them all. Checks run in a fixed order: exclusion, title, location, seniority.
 * Department preferences are accepted but not enforced.
 */
export function explainRejection(
  candidate: FilterInput,
  preferences: Preferences,
): RejectionReason | null {
  const title = candidate.title.toLowerCase();
  const description = (candidate.description ?? "").toLowerCase();
  const location = (candidate.location ?? "").toLowerCase();

  // 1. Exclusions over title + description
  if (containsAny(`${title} ${description}`, lowerAll(preferences.exclusions))) {
    return "exclusion";
  }

  // 2. Titles (empty list accepts every title)
  const titles = lowerAll(preferences.titles);
  if (titles.length > 0 && !containsAny(title, titles)) {
    return "title";
  }

  // 3. Location
  if (!isAnySentinel(preferences.location)) {
    const { include, exclude } = splitLocationPreferences(preferences.location);
    if (containsAny(location, exclude)) {
      return "location";
    }
    if (include.length > 0 && !containsAny(location, include)) {
      return "location";
    }
  }

  // 4. Seniority, matched against the title
  if (!isAnySentinel(preferences.seniority)) {
    const seniority = lowerAll(preferences.seniority);
    if (seniority.length > 0 && !containsAny(title, seniority)) {
      return "seniority";
    }
  }

  // 5. Department: no reliable signal in scraped listings yet

  return null;
}

export function accepts(
  candidate: FilterInput,
  preferences: Preferences,
): boolean {
  return explainRejection(candidate, preferences) === null;
}
