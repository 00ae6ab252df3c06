import {
  formatSeconds,
  type LabelCounts,
  type SegmentDecision,
} from "@plenary-corpus/core";

/** Summed segment durations in centiseconds, by final state. */
export interface DurationStats {
  candidates: number;
  kept: number;
  dropped: number;
  queued: number;
}

const emptyDurations = (): DurationStats => ({ candidates: 0, kept: 0, dropped: 0, queued: 0 });

export function summarizeDurations(decisions: SegmentDecision[]): DurationStats {
  const stats = emptyDurations();
  for (const decision of decisions) {
    const { start, end } = decision.result.candidate;
    const duration = Math.max(0, end - start);
    stats.candidates += duration;
    stats[decision.state] += duration;
  }
  return stats;
}

export function countDropReasons(decisions: SegmentDecision[]): Record<string, number> {
  const reasons: Record<string, number> = {};
  for (const decision of decisions) {
    if (decision.state === "dropped") {
      reasons[decision.reason] = (reasons[decision.reason] ?? 0) + 1;
    }
  }
  return reasons;
}

export interface SessionReport {
  session: string;
  turns: number;
  unresolvedTurns: number;
  detectedLanguages: number;
  transcriptIssues: number;
  candidates: number;
  counts: LabelCounts;
  dropReasons: Record<string, number>;
  durations: DurationStats;
}

export type SessionOutcome =
  | { session: string; status: "completed"; report: SessionReport }
  | { session: string; status: "failed"; error: string };

export interface RunSummary {
  sessions: number;
  completed: number;
  failed: Array<{ session: string; error: string }>;
  counts: LabelCounts;
  durations: DurationStats;
}

/** Totals over every completed session; failed sessions are listed. */
export function summarizeRun(outcomes: SessionOutcome[]): RunSummary {
  const counts: LabelCounts = { kept: 0, dropped: 0, queued: 0, unresolved: 0 };
  const durations = emptyDurations();
  const failed: RunSummary["failed"] = [];

  for (const outcome of outcomes) {
    if (outcome.status === "failed") {
      failed.push({ session: outcome.session, error: outcome.error });
      continue;
    }
    const { report } = outcome;
    counts.kept += report.counts.kept;
    counts.dropped += report.counts.dropped;
    counts.queued += report.counts.queued;
    counts.unresolved += report.counts.unresolved;
    durations.candidates += report.durations.candidates;
    durations.kept += report.durations.kept;
    durations.dropped += report.durations.dropped;
    durations.queued += report.durations.queued;
  }

  return {
    sessions: outcomes.length,
    completed: outcomes.length - failed.length,
    failed,
    counts,
    durations,
  };
}

const hours = (centiseconds: number) => (centiseconds / 360000).toFixed(2);

export function formatSummary(summary: RunSummary): string[] {
  const { counts, durations } = summary;
  const lines = [
    `Sessions: ${summary.completed}/${summary.sessions} completed`,
    `Kept: ${counts.kept}, dropped: ${counts.dropped}, queued: ${counts.queued}, unresolved speaker: ${counts.unresolved}`,
    `Candidate audio: ${formatSeconds(durations.candidates)} s (${hours(durations.candidates)} h)`,
    `Kept audio: ${formatSeconds(durations.kept)} s (${hours(durations.kept)} h)`,
    `Dropped audio: ${formatSeconds(durations.dropped)} s, queued audio: ${formatSeconds(durations.queued)} s`,
  ];
  for (const { session, error } of summary.failed) {
    lines.push(`Failed ${session}: ${error}`);
  }
  return lines;
}
