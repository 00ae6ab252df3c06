export interface CorpusRecord {
  uttId: string;
  session: string;
  // Centiseconds
  start: number;
  end: number;
  speakerId: number;
  text: string;
}

export interface AudioPathEntry {
  session: string;
  path: string;
}

export interface SpeakerIndexEntry {
  speakerId: number;
  uttIds: string[];
}

/**
 * The four corpus tables. `records` backs both the segment table and the
 * text table; all collections are sorted by their key.
 */
export interface CorpusTables {
  records: CorpusRecord[];
  audioPaths: AudioPathEntry[];
  speakerIndex: SpeakerIndexEntry[];
}

export interface SourcedRecord {
  source: string;
  record: CorpusRecord;
}

export interface MergeConflict {
  uttId: string;
  versions: SourcedRecord[];
}

export interface RejectedRecord extends SourcedRecord {
  reason: "invalid-boundary" | "missing-audio-path";
}

export type AudioPathResolver = (session: string) => string | undefined;
