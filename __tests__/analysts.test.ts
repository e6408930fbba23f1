import { describe, it, expect } from "vitest";
import { collectAnalyses, createLlmAnalyst } from "@/lib/consensus/analysts";
import { AllAnalystsFailedError, AnalysisParseError } from "@/lib/consensus/errors";
import { SessionLog } from "@/lib/consensus/session-log";
import type { Analyst, ConsensusEvent } from "@/lib/consensus/types";
import { analystJson, fakeCapability, makeAnalysis } from "./fixtures";

function analyst(name: string, result: () => Promise<ReturnType<typeof makeAnalysis>>): Analyst {
  return { name, analyze: result };
}

// ---------------------------------------------------------------------------
// createLlmAnalyst
// ---------------------------------------------------------------------------

describe("createLlmAnalyst", () => {
  it("prompts the capability and parses its reply", async () => {
    const capability = fakeCapability("alpha", () => analystJson({ revenue: "Excellent" }, "7/8"));
    const llmAnalyst = createLlmAnalyst(capability, { timeoutMs: 1000 });

    const analysis = await llmAnalyst.analyze("ACME", "Revenue rose 12%.");

    expect(llmAnalyst.name).toBe("alpha");
    expect(analysis.ratings.revenue).toBe("Excellent");
    expect(analysis.financialStrength).toBe("7/8");
    expect(capability.calls[0].prompt).toContain("Analyze ACME's quarterly financial performance.");
    expect(capability.calls[0].conversationId.startsWith("analysis_ACME_alpha_")).toBe(true);
  });

  it("releases its one-shot conversation, even when the call fails", async () => {
    const ok = fakeCapability("alpha", () => analystJson());
    const broken = fakeCapability("beta", () => {
      throw new Error("bad gateway");
    });

    await createLlmAnalyst(ok, { timeoutMs: 1000 }).analyze("ACME", "");
    await expect(createLlmAnalyst(broken, { timeoutMs: 1000 }).analyze("ACME", "")).rejects.toThrow(
      "bad gateway"
    );

    expect(ok.released).toEqual([ok.calls[0].conversationId]);
    expect(broken.released).toEqual([broken.calls[0].conversationId]);
  });

  it("throws AnalysisParseError on an unusable reply", async () => {
    const llmAnalyst = createLlmAnalyst(
      fakeCapability("alpha", () => "Sorry, I can't rate this company."),
      { timeoutMs: 1000 }
    );

    const error = await llmAnalyst.analyze("ACME", "").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AnalysisParseError);
    expect(error).toHaveProperty(
      "message",
      "alpha returned invalid data: no JSON object found in response"
    );
  });
});

// ---------------------------------------------------------------------------
// collectAnalyses
// ---------------------------------------------------------------------------

describe("collectAnalyses", () => {
  it("keeps the successful analyses when one analyst fails", async () => {
    const events: ConsensusEvent[] = [];

    const collected = await collectAnalyses(
      "ACME",
      "context",
      [
        analyst("alpha", async () => makeAnalysis({}, { financialStrength: "7/8" })),
        analyst("beta", async () => {
          throw new Error("quota exceeded");
        }),
        analyst("gamma", async () => makeAnalysis({}, { financialStrength: "6/8" })),
      ],
      { log: new SessionLog("ACME", { quiet: true }), emit: (e) => events.push(e) }
    );

    expect(collected.results.map((r) => r.analyst)).toEqual(["alpha", "gamma"]);
    expect(collected.results[1].analysis.financialStrength).toBe("6/8");
    expect(collected.failures).toEqual([{ analyst: "beta", error: "quota exceeded" }]);
    expect(events.map((e) => e.type)).toEqual([
      "analysts_start",
      "analyst_complete",
      "analyst_failed",
      "analyst_complete",
    ]);
    expect(events[1].message).toBe("alpha says: 7/8");
  });

  it("measures each analyst's response time", async () => {
    const collected = await collectAnalyses("ACME", "", [
      analyst("alpha", async () => makeAnalysis()),
    ]);

    expect(collected.results[0].responseTimeMs).toBeGreaterThanOrEqual(0);
  });

  it("throws AllAnalystsFailedError when every analyst fails", async () => {
    const failing = (name: string) =>
      analyst(name, async () => {
        throw new Error(`${name} offline`);
      });

    const error = await collectAnalyses("ACME", "", [failing("alpha"), failing("beta")], {
      log: new SessionLog("ACME", { quiet: true }),
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AllAnalystsFailedError);
    expect(error).toHaveProperty("message", "All 2 analyst calls failed for ACME.");
    expect(error).toHaveProperty("failures", [
      { analyst: "alpha", error: "alpha offline" },
      { analyst: "beta", error: "beta offline" },
    ]);
  });
});
