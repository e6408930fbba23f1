import { describe, it, expect, vi, afterEach } from "vitest";
import { SessionLog } from "@/lib/consensus/session-log";

const NOW = new Date("2026-01-15T09:30:00Z");

afterEach(() => {
  vi.restoreAllMocks();
});

describe("SessionLog", () => {
  it("prints tagged lines per level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = new SessionLog("ACME", { now: () => NOW });

    log.info("debate", "Starting debate on revenue");
    log.warn("analysts", "beta failed: quota exceeded");
    log.error("persistence", "Failed to archive session: db down");

    expect(info).toHaveBeenCalledWith("[consensus:ACME] debate: Starting debate on revenue");
    expect(warn).toHaveBeenCalledWith("[consensus:ACME] analysts: beta failed: quota exceeded");
    expect(error).toHaveBeenCalledWith(
      "[consensus:ACME] persistence: Failed to archive session: db down"
    );
  });

  it("keeps structured entries", () => {
    const log = new SessionLog("ACME", { now: () => NOW, quiet: true });

    log.info("agreement", "Score spread 1", { scoreSpread: 1 });
    log.warn("debate", "gamma failed");

    expect(log.getEntries()).toEqual([
      {
        at: "2026-01-15T09:30:00.000Z",
        level: "info",
        stage: "agreement",
        message: "Score spread 1",
        data: { scoreSpread: 1 },
      },
      {
        at: "2026-01-15T09:30:00.000Z",
        level: "warn",
        stage: "debate",
        message: "gamma failed",
      },
    ]);
  });

  it("prints nothing when quiet", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const log = new SessionLog("ACME", { quiet: true });

    log.info("score", "done");

    expect(info).not.toHaveBeenCalled();
  });

  it("returns a copy of the entries", () => {
    const log = new SessionLog("ACME", { quiet: true });
    log.info("score", "done");

    log.getEntries().pop();

    expect(log.getEntries()).toHaveLength(1);
  });

  it("generates a session id unless given one", () => {
    expect(new SessionLog("ACME", { sessionId: "s-1" }).sessionId).toBe("s-1");
    expect(new SessionLog("ACME").sessionId).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/
    );
  });

  it("records when the session started", () => {
    expect(new SessionLog("ACME", { now: () => NOW }).startedAt).toEqual(NOW);
  });
});
