import { describe, it, expect } from "vitest";
import {
  errorPlaceholder,
  extractFinalRating,
  extractUpdatedRating,
  resolveMajority,
} from "@/lib/consensus/debate-parser";

// ---------------------------------------------------------------------------
// Markers
// ---------------------------------------------------------------------------

describe("extractUpdatedRating", () => {
  it("reads the UPDATED RATING marker", () => {
    const text = `Beta's point about free cash flow is convincing.

UPDATED RATING: Bad`;
    expect(extractUpdatedRating(text)).toBe("Bad");
  });

  it("is case-insensitive and tolerates bold markdown", () => {
    expect(extractUpdatedRating("updated rating: **excellent**")).toBe("Excellent");
  });

  it("rejects words outside the scale", () => {
    expect(extractUpdatedRating("UPDATED RATING: Terrible")).toBeNull();
  });

  it("returns null without a marker", () => {
    expect(extractUpdatedRating("I keep my rating of Good.")).toBeNull();
    expect(extractUpdatedRating("")).toBeNull();
  });
});

describe("extractFinalRating", () => {
  it("reads the FINAL RATING marker", () => {
    expect(extractFinalRating("After all rounds I settle here.\nFINAL RATING: Neutral.")).toBe(
      "Neutral"
    );
  });

  it("does not read an UPDATED RATING marker", () => {
    expect(extractFinalRating("UPDATED RATING: Good")).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// resolveMajority
// ---------------------------------------------------------------------------

describe("resolveMajority", () => {
  it("returns the rating two participants share", () => {
    expect(resolveMajority(["Good", "Good", "Bad"])).toBe("Good");
    expect(resolveMajority(["good", "GOOD", "Bad"])).toBe("Good");
  });

  it("returns COMPLEX when all votes differ", () => {
    expect(resolveMajority(["Good", "Bad", "Neutral"])).toBe("COMPLEX");
  });

  it("returns COMPLEX for a tie between two pairs", () => {
    expect(resolveMajority(["Good", "Good", "Bad", "Bad"])).toBe("COMPLEX");
  });

  it("returns COMPLEX with a single vote or none", () => {
    expect(resolveMajority(["Good"])).toBe("COMPLEX");
    expect(resolveMajority([])).toBe("COMPLEX");
  });

  it("accepts a two-vote quorum", () => {
    expect(resolveMajority(["Bad", "Bad"])).toBe("Bad");
  });
});

describe("errorPlaceholder", () => {
  it("wraps the error message", () => {
    expect(errorPlaceholder(new Error("rate limited"))).toBe("[Error: rate limited]");
    expect(errorPlaceholder("boom")).toBe("[Error: boom]");
  });
});
