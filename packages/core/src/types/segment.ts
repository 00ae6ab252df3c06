import { LanguageLabel } from "./language";
import { SessionId } from "./session";

/** Decoder output; times are centiseconds from the start of the session audio. */
export interface CandidateSegment {
  session: SessionId;
  start: number;
  end: number;
  hypothesis: string;
  reference?: string;
}

export type WordEdit =
  | { type: "unchanged"; hypothesis: string; reference: string }
  | { type: "substitution"; hypothesis: string; reference: string }
  | { type: "insertion"; hypothesis: string }
  | { type: "deletion"; reference: string };

export type SpanSpeaker =
  | { kind: "single"; speakerId: number }
  | { kind: "multiple"; speakerIds: number[] };

export interface ReferenceSpan {
  // Word offsets into the session reference, end exclusive
  startWord: number;
  endWord: number;
  words: string[];
  turns: number[];
  speaker: SpanSpeaker;
  language: LanguageLabel;
}

interface ReconciliationBase {
  candidate: CandidateSegment;
}

export interface AccurateMatch extends ReconciliationBase {
  kind: "accurate";
  editRate: 0;
  reference: ReferenceSpan;
  edits: WordEdit[];
}

export interface RealignmentMatch extends ReconciliationBase {
  kind: "needs-realignment";
  editRate: number;
  reference: ReferenceSpan;
  edits: WordEdit[];
}

export interface UnrecoverableMatch extends ReconciliationBase {
  kind: "unrecoverable";
  reason: "no-reference" | "edit-rate" | "empty-hypothesis";
  editRate?: number;
  reference?: ReferenceSpan;
}

export type ReconciliationResult =
  | AccurateMatch
  | RealignmentMatch
  | UnrecoverableMatch;
