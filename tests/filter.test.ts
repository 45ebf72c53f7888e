import { describe, it, expect } from "vitest";
import {
  accepts,
  explainRejection,
  isAnySentinel,
  splitLocationPreferences,
} from "../src/filter";
import { makePreferences } from "./helpers";

function candidate(
  title: string,
  extra: { location?: string | null; description?: string | null } = {},
) {
  return {
    title,
    location: extra.location ?? null,
    description: extra.description ?? null,
  };
}

describe("preference filter", () => {
  describe("basic title and exclusion rules", () => {
    const prefs = makePreferences({ titles: ["engineer"], exclusions: ["intern"] });

    it("accepts a title that matches and has no exclusion", () => {
      expect(accepts(candidate("Senior Backend Engineer"), prefs)).toBe(true);
    });

    it("rejects when an exclusion keyword appears in the title", () => {
      expect(explainRejection(candidate("Backend Engineering Internship"), prefs)).toBe(
        "exclusion",
      );
    });

    it("rejects when no title keyword matches", () => {
      expect(explainRejection(candidate("Product Designer"), prefs)).toBe("title");
    });

    it("checks exclusions before titles", () => {
      expect(explainRejection(candidate("Design Intern"), prefs)).toBe("exclusion");
    });

    it("matches case-insensitively", () => {
      expect(accepts(candidate("STAFF ENGINEER"), prefs)).toBe(true);
      expect(accepts(candidate("Engineer"), makePreferences({ titles: ["ENGINEER"] }))).toBe(
        true,
      );
    });

    it("scans the description for exclusions", () => {
      const c = candidate("Backend Engineer", { description: "Paid INTERNship track" });
      expect(explainRejection(c, prefs)).toBe("exclusion");
    });

    it("accepts every title when the title list is empty", () => {
      expect(accepts(candidate("Anything at all"), makePreferences())).toBe(true);
    });
  });

  describe("location", () => {
    it("skips the check for the any sentinel", () => {
      const prefs = makePreferences({ location: ["Any"] });
      expect(accepts(candidate("Engineer", { location: null }), prefs)).toBe(true);
    });

    it("requires an include keyword in the location", () => {
      const prefs = makePreferences({ location: ["remote", "berlin"] });
      expect(accepts(candidate("Engineer", { location: "Berlin, DE" }), prefs)).toBe(true);
      expect(explainRejection(candidate("Engineer", { location: "Paris" }), prefs)).toBe(
        "location",
      );
    });

    it("rejects an unknown location when include keywords are set", () => {
      const prefs = makePreferences({ location: ["remote"] });
      expect(explainRejection(candidate("Engineer"), prefs)).toBe("location");
    });

    it("rejects excluded locations even when an include keyword matches", () => {
      const prefs = makePreferences({ location: ["remote", "exclude:us only"] });
      const c = candidate("Engineer", { location: "Remote (US only)" });
      expect(explainRejection(c, prefs)).toBe("location");
    });

    it("accepts anything not excluded when only exclude entries are given", () => {
      const prefs = makePreferences({ location: ["exclude:onsite"] });
      expect(accepts(candidate("Engineer", { location: "Lisbon" }), prefs)).toBe(true);
      expect(accepts(candidate("Engineer"), prefs)).toBe(true);
      expect(explainRejection(candidate("Engineer", { location: "Onsite, NYC" }), prefs)).toBe(
        "location",
      );
    });
  });

  describe("seniority", () => {
    it("requires a seniority keyword in the title", () => {
      const prefs = makePreferences({ seniority: ["senior", "staff"] });
      expect(accepts(candidate("Staff Engineer"), prefs)).toBe(true);
      expect(explainRejection(candidate("Junior Engineer"), prefs)).toBe("seniority");
    });

    it("passes an empty seniority list", () => {
      expect(accepts(candidate("Engineer"), makePreferences({ seniority: [] }))).toBe(true);
    });
  });

  it("does not enforce department preferences", () => {
    const prefs = makePreferences({ department: ["finance"] });
    expect(accepts(candidate("Backend Engineer"), prefs)).toBe(true);
  });
});

describe("isAnySentinel", () => {
  it("is true only for a single any entry", () => {
    expect(isAnySentinel(["any"])).toBe(true);
    expect(isAnySentinel([" ANY "])).toBe(true);
    expect(isAnySentinel(["any", "remote"])).toBe(false);
    expect(isAnySentinel([])).toBe(false);
  });
});

describe("splitLocationPreferences", () => {
  it("separates include and exclude entries", () => {
    expect(splitLocationPreferences(["Remote", "exclude: Onsite", "exclude:"])).toEqual({
      include: ["remote"],
      exclude: ["onsite"],
    });
  });
});
