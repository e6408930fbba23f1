import { describe, it, expect } from "vitest";
import {
  calculateAgreement,
  calculateAgreementFromScores,
  classifyDebateLevel,
  findMetricDisagreements,
  formatMetricComparison,
  getMetricComparison,
} from "@/lib/consensus/agreement";
import { makeAnalysis } from "./fixtures";

describe("classifyDebateLevel", () => {
  it("classifies by spread", () => {
    expect(classifyDebateLevel(0)).toBe("none");
    expect(classifyDebateLevel(1)).toBe("none");
    expect(classifyDebateLevel(2)).toBe("small");
    expect(classifyDebateLevel(3)).toBe("large");
  });
});

// ---------------------------------------------------------------------------
// calculateAgreement
// ---------------------------------------------------------------------------

describe("calculateAgreement", () => {
  it("computes spread from the X/8 scores", () => {
    const info = calculateAgreement([
      makeAnalysis({}, { financialStrength: "7/8" }),
      makeAnalysis({}, { financialStrength: "7/8" }),
      makeAnalysis({}, { financialStrength: "6/8" }),
    ]);

    expect(info).toEqual({
      debateLevel: "none",
      scoreSpread: 1,
      scores: [7, 7, 6],
      metricDisagreements: [],
      missingData: false,
    });
  });

  it("excludes unparseable scores and flags missing data", () => {
    const info = calculateAgreement([
      makeAnalysis({}, { financialStrength: "5/8" }),
      makeAnalysis({}, { financialStrength: "Not enough information" }),
      makeAnalysis({}, { financialStrength: "8/8" }),
    ]);

    expect(info.scores).toEqual([5, 8]);
    expect(info.scoreSpread).toBe(3);
    expect(info.debateLevel).toBe("large");
    expect(info.missingData).toBe(true);
  });

  it("reports zero spread and missing data with a single score", () => {
    const info = calculateAgreement([makeAnalysis({}, { financialStrength: "4/8" })]);
    expect(info.scoreSpread).toBe(0);
    expect(info.debateLevel).toBe("none");
    expect(info.missingData).toBe(true);
  });
});

describe("findMetricDisagreements", () => {
  it("flags metrics spanning two or more steps", () => {
    const analyses = [
      makeAnalysis({ revenue: "Excellent", net_income: "Good" }),
      makeAnalysis({ revenue: "Neutral", net_income: "Excellent" }),
      makeAnalysis({ revenue: "Good", net_income: "Good" }),
    ];
    expect(findMetricDisagreements(analyses)).toEqual(["revenue"]);
  });

  it("skips missing ratings", () => {
    const analyses = [
      makeAnalysis({ cash_flow: "Excellent" }),
      makeAnalysis({ cash_flow: "Not enough information" }),
      makeAnalysis({ cash_flow: "Excellent" }),
    ];
    expect(findMetricDisagreements(analyses)).toEqual([]);
  });
});

describe("calculateAgreementFromScores", () => {
  it("works on recalculated 0–8 scores", () => {
    expect(calculateAgreementFromScores([8, 3, 5])).toEqual({
      debateLevel: "large",
      scoreSpread: 5,
      scores: [8, 3, 5],
      metricDisagreements: [],
      missingData: false,
    });
  });

  it("flags fewer than two scores", () => {
    expect(calculateAgreementFromScores([6]).missingData).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Metric comparison
// ---------------------------------------------------------------------------

describe("getMetricComparison", () => {
  it("lists each analyst's parsed rating and the spread", () => {
    const rows = getMetricComparison([
      makeAnalysis({ revenue: "excellent", total_debt: "Bad" }),
      makeAnalysis({ revenue: "Not enough information", total_debt: "not enough information" }),
      makeAnalysis({ revenue: "Good", total_debt: "Not enough information" }),
    ]);

    expect(rows[0]).toEqual({
      metric: "revenue",
      ratings: ["Excellent", null, "Good"],
      spread: 1,
    });
    expect(rows[7]).toEqual({
      metric: "total_debt",
      ratings: ["Bad", null, null],
      spread: null,
    });
  });
});

describe("formatMetricComparison", () => {
  it("renders a header and one row per metric", () => {
    const rows = getMetricComparison([
      makeAnalysis({ revenue: "Excellent" }),
      makeAnalysis({ revenue: "Not enough information" }),
    ]);
    const lines = formatMetricComparison(rows, ["alpha", "beta"]).split("\n");

    expect(lines).toHaveLength(9);
    expect(lines[0]).toBe("metric | alpha | beta");
    expect(lines[1]).toBe("revenue | Excellent | -");
    expect(lines[2]).toBe("net_income | Good | Good");
  });
});
