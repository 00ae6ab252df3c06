import {
  AudioPathEntry,
  CorpusRecord,
  CorpusTables,
  SpeakerIndexEntry,
} from "../types/corpus";
import { formatSeconds, parseSeconds } from "../utils/session-id";
import { compareStrings } from "../utils/words";

/** File names of the corpus tables inside a corpus directory. */
export const CORPUS_TABLE_FILES = {
  segments: "segments",
  text: "text",
  audioPaths: "wav.scp",
  speakerIndex: "spk2utt",
} as const;

export type CorpusTableName = keyof typeof CORPUS_TABLE_FILES;

export type RenderedTables = Record<CorpusTableName, string>;

export const formatSpeakerId = (speakerId: number) =>
  speakerId.toString().padStart(5, "0");

export const compareRecords = (left: CorpusRecord, right: CorpusRecord) =>
  compareStrings(left.uttId, right.uttId);

const toLines = (lines: string[]) =>
  lines.length ? `${lines.join("\n")}\n` : "";

const contentLines = (content: string) =>
  content.split("\n").filter((line) => line.trim().length > 0);

/** Per-session kept-record line: `utt_id session start end speaker text`, centiseconds. */
export function formatRecordLine(record: CorpusRecord): string {
  return [
    record.uttId,
    record.session,
    record.start,
    record.end,
    record.speakerId,
    record.text,
  ].join(" ");
}

const parseInteger = (value: string, line: string) => {
  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid number "${value}" in record line "${line}"`);
  }
  return Number.parseInt(value, 10);
};

export function parseRecordLine(line: string): CorpusRecord {
  const [uttId, session, start, end, speakerId, ...words] = line.trim().split(/\s+/);
  if (speakerId === undefined) {
    throw new Error(`Invalid record line "${line}"`);
  }
  return {
    uttId,
    session,
    start: parseInteger(start, line),
    end: parseInteger(end, line),
    speakerId: parseInteger(speakerId, line),
    text: words.join(" "),
  };
}

export function parseRecordLines(content: string): CorpusRecord[] {
  return contentLines(content).map(parseRecordLine);
}

export function formatSegmentLine(record: CorpusRecord): string {
  return `${record.uttId} ${record.session} ${formatSeconds(record.start)} ${formatSeconds(record.end)}`;
}

export function formatTextLine(record: CorpusRecord): string {
  return `${record.uttId} ${record.text}`;
}

/**
 * Build the tables from records that have already been merged. Every
 * record's session must have an entry in `audioPaths`.
 */
export function buildCorpusTables(
  records: CorpusRecord[],
  audioPaths: ReadonlyMap<string, string>
): CorpusTables {
  const sorted = [...records].sort(compareRecords);

  const sessions = new Map<string, AudioPathEntry>();
  const speakers = new Map<number, string[]>();
  for (const record of sorted) {
    const path = audioPaths.get(record.session);
    if (path === undefined) {
      throw new Error(`No audio path for session ${record.session}`);
    }
    sessions.set(record.session, { session: record.session, path });

    const uttIds = speakers.get(record.speakerId) ?? [];
    uttIds.push(record.uttId);
    speakers.set(record.speakerId, uttIds);
  }

  const speakerIndex: SpeakerIndexEntry[] = [...speakers.entries()]
    .sort(([left], [right]) => left - right)
    .map(([speakerId, uttIds]) => ({ speakerId, uttIds }));

  return {
    records: sorted,
    audioPaths: [...sessions.values()].sort((left, right) =>
      compareStrings(left.session, right.session)
    ),
    speakerIndex,
  };
}

/** Rebuild all tables from the records that pass `keep`. */
export function retainRecords(
  tables: CorpusTables,
  keep: (record: CorpusRecord) => boolean
): CorpusTables {
  const audioPaths = new Map(
    tables.audioPaths.map((entry) => [entry.session, entry.path])
  );
  return buildCorpusTables(tables.records.filter(keep), audioPaths);
}

export function renderCorpusTables(tables: CorpusTables): RenderedTables {
  return {
    segments: toLines(tables.records.map(formatSegmentLine)),
    text: toLines(tables.records.map(formatTextLine)),
    audioPaths: toLines(
      tables.audioPaths.map((entry) => `${entry.session} ${entry.path}`)
    ),
    speakerIndex: toLines(
      tables.speakerIndex.map(
        (entry) => `${formatSpeakerId(entry.speakerId)} ${entry.uttIds.join(" ")}`
      )
    ),
  };
}

const splitFirst = (line: string): [string, string] => {
  const trimmed = line.trim();
  const space = trimmed.search(/\s/);
  if (space < 0) return [trimmed, ""];
  return [trimmed.slice(0, space), trimmed.slice(space).trim()];
};

/**
 * Read a merged corpus back from its tables. Any utterance missing from one
 * of the id-bearing tables makes the corpus unreadable, as does one that
 * only the text or speaker table still lists.
 */
export function parseCorpusTables(files: RenderedTables): CorpusTables {
  const texts = new Map(contentLines(files.text).map(splitFirst));

  const speakerOf = new Map<string, number>();
  for (const line of contentLines(files.speakerIndex)) {
    const [speaker, ...uttIds] = line.trim().split(/\s+/);
    const speakerId = Number.parseInt(speaker, 10);
    if (Number.isNaN(speakerId)) {
      throw new Error(`Invalid speaker index line "${line}"`);
    }
    for (const uttId of uttIds) {
      speakerOf.set(uttId, speakerId);
    }
  }

  const audioPaths = new Map(contentLines(files.audioPaths).map(splitFirst));

  const records = contentLines(files.segments).map((line): CorpusRecord => {
    const fields = line.trim().split(/\s+/);
    if (fields.length !== 4) {
      throw new Error(`Invalid segment line "${line}"`);
    }
    const [uttId, session, start, end] = fields;
    const text = texts.get(uttId);
    const speakerId = speakerOf.get(uttId);
    if (text === undefined || speakerId === undefined) {
      throw new Error(`Utterance ${uttId} is missing from the text or speaker table`);
    }
    return {
      uttId,
      session,
      start: parseSeconds(start),
      end: parseSeconds(end),
      speakerId,
      text,
    };
  });

  const segmentIds = new Set(records.map((record) => record.uttId));
  for (const uttId of [...texts.keys(), ...speakerOf.keys()]) {
    if (!segmentIds.has(uttId)) {
      throw new Error(`Utterance ${uttId} is missing from the segment table`);
    }
  }

  return buildCorpusTables(records, audioPaths);
}
