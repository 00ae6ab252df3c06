import { LanguageLabel } from "./language";
import { SessionId } from "./session";

export type TurnFlag = "missing-speaker" | "needs-language" | "embedded";

export interface TranscriptTurn {
  session: SessionId;
  index: number;
  speakerName: string;
  declaredSpeakerId?: number;
  rawText: string;
  // Declared language code, absent when the transcript leaves it out
  language?: string;
  flags: TurnFlag[];
}

export interface TurnIssue {
  session: SessionId;
  subsection: string;
  statement: number;
  reason: string;
}

export interface ParsedTranscript {
  session: SessionId;
  turns: TranscriptTurn[];
  issues: TurnIssue[];
}

export interface SpeechTurn {
  session: SessionId;
  index: number;
  speakerName: string;
  speakerId: number;
  speakerResolved: boolean;
  rawText: string;
  text: string;
  language: LanguageLabel;
  languageSource: "declared" | "detected";
  flags: TurnFlag[];
}
