import {
  AudioPathResolver,
  CorpusRecord,
  CorpusTables,
  MergeConflict,
  RejectedRecord,
  SourcedRecord,
} from "../types/corpus";
import { fillSessionTemplate, parseSessionKey } from "../utils/session-id";
import { compareStrings } from "../utils/words";
import { buildCorpusTables, compareRecords } from "./tables";

export interface AssembleInput {
  // Where the records came from, for reports
  source: string;
  records: CorpusRecord[];
}

export interface AssembleResult {
  tables: CorpusTables;
  conflicts: MergeConflict[];
  rejected: RejectedRecord[];
}

const isSameRecord = (left: CorpusRecord, right: CorpusRecord) =>
  left.uttId === right.uttId &&
  left.session === right.session &&
  left.start === right.start &&
  left.end === right.end &&
  left.speakerId === right.speakerId &&
  left.text === right.text;

const compareSourced = (left: SourcedRecord, right: SourcedRecord) =>
  compareStrings(left.record.uttId, right.record.uttId) ||
  compareStrings(left.source, right.source) ||
  compareStrings(left.record.text, right.record.text) ||
  left.record.start - right.record.start ||
  left.record.end - right.record.end ||
  left.record.speakerId - right.record.speakerId;

/**
 * Merge lists already sorted by utterance id, grouping every record that
 * shares an id.
 */
function* mergeSorted(lists: SourcedRecord[][]): Generator<SourcedRecord[]> {
  const heads = lists.map(() => 0);
  for (;;) {
    let next: string | undefined;
    for (const [index, list] of lists.entries()) {
      const head = list[heads[index]];
      if (head && (next === undefined || compareStrings(head.record.uttId, next) < 0)) {
        next = head.record.uttId;
      }
    }
    if (next === undefined) return;

    const group: SourcedRecord[] = [];
    for (const [index, list] of lists.entries()) {
      while (heads[index] < list.length && list[heads[index]].record.uttId === next) {
        group.push(list[heads[index]]);
        heads[index]++;
      }
    }
    yield group;
  }
}

/**
 * Merge kept records from any number of inputs into the corpus tables.
 * Identical records collapse; records sharing an id but differing in any
 * field are all excluded and reported as a conflict. The result does not
 * depend on input order, and feeding the output back in changes nothing.
 */
export function assembleCorpus(
  inputs: AssembleInput[],
  resolveAudioPath: AudioPathResolver
): AssembleResult {
  const rejected: RejectedRecord[] = [];
  const audioPaths = new Map<string, string>();

  const lists = inputs.map((input) => {
    const accepted: SourcedRecord[] = [];
    for (const record of input.records) {
      const sourced = { source: input.source, record };
      if (record.start >= record.end) {
        rejected.push({ ...sourced, reason: "invalid-boundary" });
        continue;
      }
      const path = audioPaths.get(record.session) ?? resolveAudioPath(record.session);
      if (path === undefined) {
        rejected.push({ ...sourced, reason: "missing-audio-path" });
        continue;
      }
      audioPaths.set(record.session, path);
      accepted.push(sourced);
    }
    return accepted.sort(compareSourced);
  });

  const records: CorpusRecord[] = [];
  const conflicts: MergeConflict[] = [];
  for (const group of mergeSorted(lists)) {
    const [first] = group;
    if (group.every((entry) => isSameRecord(entry.record, first.record))) {
      records.push(first.record);
    } else {
      conflicts.push({ uttId: first.record.uttId, versions: group.sort(compareSourced) });
    }
  }

  const survivingSessions = new Set(records.map((record) => record.session));
  for (const session of audioPaths.keys()) {
    if (!survivingSessions.has(session)) audioPaths.delete(session);
  }

  return {
    tables: buildCorpusTables(records.sort(compareRecords), audioPaths),
    conflicts,
    rejected: rejected.sort(compareSourced),
  };
}

/**
 * Audio paths from a template with `{root}`, `{session}`, `{term}`, `{year}`
 * and `{number}` placeholders. Session keys that do not parse have no path.
 */
export function createTemplateAudioPathResolver(
  template: string,
  root: string
): AudioPathResolver {
  return (session) => {
    try {
      return fillSessionTemplate(template, parseSessionKey(session), { root });
    } catch {
      return undefined;
    }
  };
}

/** Use the first resolver that knows the session. */
export function chainAudioPathResolvers(
  ...resolvers: AudioPathResolver[]
): AudioPathResolver {
  return (session) => {
    for (const resolve of resolvers) {
      const path = resolve(session);
      if (path !== undefined) return path;
    }
    return undefined;
  };
}

export function audioPathsFromTables(tables: CorpusTables): AudioPathResolver {
  const paths = new Map(tables.audioPaths.map((entry) => [entry.session, entry.path]));
  return (session) => paths.get(session);
}
