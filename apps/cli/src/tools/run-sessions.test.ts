import { describe, it, expect, vi, beforeEach } from "vitest";
import type { SessionReport } from "./report";
import { runSessions } from "./run-sessions";

const reportFor = (session: string): SessionReport => ({
  session,
  turns: 1,
  unresolvedTurns: 0,
  detectedLanguages: 0,
  transcriptIssues: 0,
  candidates: 1,
  counts: { kept: 1, dropped: 0, queued: 0, unresolved: 0 },
  dropReasons: {},
  durations: { candidates: 100, kept: 100, dropped: 0, queued: 0 },
});

describe("runSessions", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("should wait for every session and record failures", async () => {
    const worker = vi.fn(async (key: string) => {
      if (key === "38-2015-002") {
        throw new Error("transcript not found");
      }
      return reportFor(key);
    });

    const outcomes = await runSessions(["38-2015-001", "38-2015-002", "38-2015-003"], worker, 2);

    expect(outcomes).toEqual([
      { session: "38-2015-001", status: "completed", report: reportFor("38-2015-001") },
      { session: "38-2015-002", status: "failed", error: "transcript not found" },
      { session: "38-2015-003", status: "completed", report: reportFor("38-2015-003") },
    ]);
    expect(worker).toHaveBeenCalledTimes(3);
    expect(console.error).toHaveBeenCalledWith(
      "[Session Error]",
      expect.objectContaining({ session: "38-2015-002", error: "transcript not found" })
    );
  });
});
