import {
  AccurateMatch,
  RealignmentMatch,
  ReconciliationResult,
} from "../types/segment";
import { CorpusRecord } from "../types/corpus";
import { UNRESOLVED_SPEAKER_ID } from "../types/speaker";
import { formatSessionKey, formatUtteranceId } from "../utils/session-id";
import { joinWords } from "../utils/words";
import { RetryEntry } from "./retry-list";

export interface LabelerOptions {
  // Seconds
  minDuration: number;
  maxDuration: number;
  keepUnresolvedSpeakers: boolean;
}

export const DEFAULT_LABELER_OPTIONS: LabelerOptions = {
  minDuration: 0.5,
  maxDuration: 30,
  keepUnresolvedSpeakers: false,
};

export type DropReason =
  | "duplicate-boundary"
  | "invalid-boundary"
  | "unrecoverable"
  | "language"
  | "duration"
  | "multiple-speakers"
  | "unresolved-speaker";

export type SegmentDecision =
  | { state: "kept"; result: AccurateMatch; record: CorpusRecord }
  | { state: "queued"; result: RealignmentMatch }
  | { state: "dropped"; result: ReconciliationResult; reason: DropReason };

export interface DroppedSegment {
  session: string;
  start: number;
  end: number;
  reason: DropReason;
  hypothesis: string;
}

export interface LabelCounts {
  kept: number;
  dropped: number;
  queued: number;
  // Segments whose span belongs to no known speaker, whatever their state
  unresolved: number;
}

export interface SessionLabels {
  decisions: SegmentDecision[];
  records: CorpusRecord[];
  dropped: DroppedSegment[];
  retry: RetryEntry[];
  counts: LabelCounts;
}

const boundaryKey = (result: ReconciliationResult) =>
  `${result.candidate.start}:${result.candidate.end}`;

const isUnresolvedSpan = (result: ReconciliationResult) =>
  result.reference?.speaker.kind === "single" &&
  result.reference.speaker.speakerId === UNRESOLVED_SPEAKER_ID;

/**
 * Decide the fate of one reconciled segment. Every segment ends in exactly
 * one state; the first rule that applies wins.
 */
export function labelSegment(
  result: ReconciliationResult,
  options: LabelerOptions,
  seenBoundaries: Set<string>
): SegmentDecision {
  const { candidate } = result;
  const key = boundaryKey(result);
  if (seenBoundaries.has(key)) {
    return { state: "dropped", result, reason: "duplicate-boundary" };
  }
  seenBoundaries.add(key);

  if (candidate.start >= candidate.end) {
    return { state: "dropped", result, reason: "invalid-boundary" };
  }
  if (result.kind === "unrecoverable") {
    return { state: "dropped", result, reason: "unrecoverable" };
  }
  if (result.kind === "needs-realignment") {
    return { state: "queued", result };
  }

  const { reference } = result;
  if (reference.language !== "majority") {
    return { state: "dropped", result, reason: "language" };
  }

  const duration = (candidate.end - candidate.start) / 100;
  if (duration < options.minDuration || duration > options.maxDuration) {
    return { state: "dropped", result, reason: "duration" };
  }

  if (reference.speaker.kind === "multiple") {
    return { state: "dropped", result, reason: "multiple-speakers" };
  }
  if (
    reference.speaker.speakerId === UNRESOLVED_SPEAKER_ID &&
    !options.keepUnresolvedSpeakers
  ) {
    return { state: "dropped", result, reason: "unresolved-speaker" };
  }

  return {
    state: "kept",
    result,
    record: {
      uttId: formatUtteranceId(candidate.session, candidate.start, candidate.end),
      session: formatSessionKey(candidate.session),
      start: candidate.start,
      end: candidate.end,
      speakerId: reference.speaker.speakerId,
      text: joinWords(reference.words),
    },
  };
}

export function labelSession(
  results: ReconciliationResult[],
  options: Partial<LabelerOptions> = {}
): SessionLabels {
  const settings = { ...DEFAULT_LABELER_OPTIONS, ...options };
  const seenBoundaries = new Set<string>();
  const decisions = results.map((result) =>
    labelSegment(result, settings, seenBoundaries)
  );

  const records: CorpusRecord[] = [];
  const dropped: DroppedSegment[] = [];
  const retry: RetryEntry[] = [];

  for (const decision of decisions) {
    const { candidate } = decision.result;
    switch (decision.state) {
      case "kept":
        records.push(decision.record);
        break;
      case "queued":
        retry.push({
          session: formatSessionKey(candidate.session),
          start: candidate.start,
          end: candidate.end,
        });
        break;
      case "dropped":
        dropped.push({
          session: formatSessionKey(candidate.session),
          start: candidate.start,
          end: candidate.end,
          reason: decision.reason,
          hypothesis: candidate.hypothesis,
        });
        break;
    }
  }

  records.sort((left, right) => left.start - right.start || left.end - right.end);

  return {
    decisions,
    records,
    dropped,
    retry,
    counts: {
      kept: records.length,
      dropped: dropped.length,
      queued: retry.length,
      unresolved: decisions.filter((decision) => isUnresolvedSpan(decision.result))
        .length,
    },
  };
}
