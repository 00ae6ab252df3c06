import { CandidateSegment } from "../types/segment";
import { formatSessionKey, formatSeconds, parseSeconds } from "../utils/session-id";

/** A segment queued for a second alignment pass. Times in centiseconds. */
export interface RetryEntry {
  session: string;
  start: number;
  end: number;
}

export function formatRetryLine(entry: RetryEntry): string {
  return `${entry.session} ${formatSeconds(entry.start)} ${formatSeconds(entry.end)}`;
}

export function parseRetryLine(line: string): RetryEntry {
  const fields = line.trim().split(/\s+/);
  if (fields.length !== 3) {
    throw new Error(`Invalid retry line "${line}", expected <session> <start> <end>`);
  }
  return {
    session: fields[0],
    start: parseSeconds(fields[1]),
    end: parseSeconds(fields[2]),
  };
}

export function parseRetryList(content: string): RetryEntry[] {
  return content
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map(parseRetryLine);
}

const overlapsEntry = (candidate: CandidateSegment, entries: RetryEntry[]) => {
  const session = formatSessionKey(candidate.session);
  return entries.some(
    (entry) =>
      entry.session === session && candidate.start < entry.end && entry.start < candidate.end
  );
};

/**
 * Keep the results of candidates that overlap a queued segment of the same
 * session. Results must come from reconciling the whole session, so each
 * candidate is searched from the same cursor position as in the first pass.
 */
export function selectRetryResults<T extends { candidate: CandidateSegment }>(
  results: T[],
  entries: RetryEntry[]
): T[] {
  return results.filter((result) => overlapsEntry(result.candidate, entries));
}
