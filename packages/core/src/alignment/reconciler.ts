import { combineLabels } from "../language/language-labels";
import { normalizeText } from "../transcript/text-normalizer";
import {
  CandidateSegment,
  ReconciliationResult,
  ReferenceSpan,
  SpanSpeaker,
} from "../types/segment";
import { UNRESOLVED_SPEAKER_ID } from "../types/speaker";
import { SpeechTurn } from "../types/transcript";
import { countEdits, diffWords } from "../utils/diff-words";
import { formatSessionKey, isSameSession } from "../utils/session-id";
import { splitWords } from "../utils/words";
import { findBestSpan } from "./span-search";

export interface ReconcilerOptions {
  // Highest edit rate still worth a second alignment pass
  thresholdRealign: number;
  // Words searched ahead of the previous match
  searchWindowWords: number;
  // Words searched behind the previous match
  backtrackWords: number;
  // Unresolved-speaker words tolerated inside another speaker's span
  minSpeakerWords: number;
}

export const DEFAULT_RECONCILER_OPTIONS: ReconcilerOptions = {
  thresholdRealign: 0.5,
  searchWindowWords: 2000,
  backtrackWords: 200,
  minSpeakerWords: 2,
};

export interface SessionReference {
  words: string[];
  // Index into the turn list for every reference word
  turnOf: number[];
}

export function buildReference(turns: SpeechTurn[]): SessionReference {
  const words: string[] = [];
  const turnOf: number[] = [];
  turns.forEach((turn, turnIndex) => {
    for (const word of splitWords(turn.text)) {
      words.push(word);
      turnOf.push(turnIndex);
    }
  });
  return { words, turnOf };
}

const describeSpeaker = (
  wordTurns: number[],
  turns: SpeechTurn[],
  minSpeakerWords: number
): SpanSpeaker => {
  const wordsBySpeaker = new Map<number, number>();
  for (const turnIndex of wordTurns) {
    const speakerId = turns[turnIndex].speakerId;
    wordsBySpeaker.set(speakerId, (wordsBySpeaker.get(speakerId) ?? 0) + 1);
  }

  const unresolvedWords = wordsBySpeaker.get(UNRESOLVED_SPEAKER_ID) ?? 0;
  const resolved = [...wordsBySpeaker.keys()]
    .filter((id) => id !== UNRESOLVED_SPEAKER_ID)
    .sort((left, right) => left - right);

  if (resolved.length === 0) {
    return { kind: "single", speakerId: UNRESOLVED_SPEAKER_ID };
  }
  if (resolved.length === 1 && unresolvedWords < minSpeakerWords) {
    return { kind: "single", speakerId: resolved[0] };
  }
  return {
    kind: "multiple",
    speakerIds:
      unresolvedWords >= minSpeakerWords
        ? [UNRESOLVED_SPEAKER_ID, ...resolved]
        : resolved,
  };
};

const describeSpan = (
  reference: SessionReference,
  turns: SpeechTurn[],
  startWord: number,
  endWord: number,
  minSpeakerWords: number
): ReferenceSpan => {
  const wordTurns = reference.turnOf.slice(startWord, endWord);
  const coveredTurns = [...new Set(wordTurns)];
  return {
    startWord,
    endWord,
    words: reference.words.slice(startWord, endWord),
    turns: coveredTurns.map((turnIndex) => turns[turnIndex].index),
    speaker: describeSpeaker(wordTurns, turns, minSpeakerWords),
    language: combineLabels(coveredTurns.map((turnIndex) => turns[turnIndex].language)),
  };
};

const byTime = (left: CandidateSegment, right: CandidateSegment) =>
  left.start - right.start || left.end - right.end;

/**
 * Match every decoder candidate of one session against the session's
 * canonical transcript and classify it. Candidates are visited in time
 * order; each match moves the search cursor so later candidates prefer
 * later transcript positions. Holds no state beyond the call.
 */
export function reconcileSession(
  turns: SpeechTurn[],
  candidates: CandidateSegment[],
  options: Partial<ReconcilerOptions> = {},
  normalize: (text: string) => string = normalizeText
): ReconciliationResult[] {
  const settings = { ...DEFAULT_RECONCILER_OPTIONS, ...options };
  const reference = buildReference(turns);
  const session = turns[0]?.session;
  let cursor = 0;

  return [...candidates].sort(byTime).map((candidate): ReconciliationResult => {
    if (session && !isSameSession(session, candidate.session)) {
      throw new Error(
        `Candidate from ${formatSessionKey(candidate.session)} passed to ${formatSessionKey(session)}`
      );
    }

    const hypothesis = splitWords(normalize(candidate.hypothesis));
    if (hypothesis.length === 0) {
      return { kind: "unrecoverable", reason: "empty-hypothesis", candidate };
    }

    const match = findBestSpan(
      hypothesis,
      reference.words,
      {
        from: cursor - settings.backtrackWords,
        to: cursor + settings.searchWindowWords + hypothesis.length,
      },
      cursor
    );
    if (!match) {
      return { kind: "unrecoverable", reason: "no-reference", candidate };
    }

    const span = describeSpan(
      reference,
      turns,
      match.start,
      match.end,
      settings.minSpeakerWords
    );
    const edits = diffWords(hypothesis, span.words);
    const editCount = countEdits(edits);

    if (editCount === 0) {
      cursor = match.end;
      return { kind: "accurate", candidate, editRate: 0, reference: span, edits };
    }

    const editRate = editCount / span.words.length;
    if (editRate <= settings.thresholdRealign) {
      cursor = match.end;
      return { kind: "needs-realignment", candidate, editRate, reference: span, edits };
    }

    return {
      kind: "unrecoverable",
      reason: "edit-rate",
      candidate,
      editRate,
      reference: span,
    };
  });
}
