import { SessionId } from "./session";

/** Real speaker ids are positive integers, so 0 never collides with one. */
export const UNRESOLVED_SPEAKER_ID = 0;

export interface ResolvedSpeaker {
  status: "resolved";
  speakerId: number;
}

export interface UnresolvedSpeaker {
  status: "unresolved";
  speakerId: typeof UNRESOLVED_SPEAKER_ID;
  name: string;
}

export type SpeakerResolution = ResolvedSpeaker | UnresolvedSpeaker;

export interface SpeakerEntry {
  id: number;
  names: string[];
}

/** Read-only name lookup; keys are already normalised names. */
export interface SpeakerLookup {
  get(normalizedName: string): number | undefined;
  entries(): Iterable<[string, number]>;
}

export interface SpeakerResolver {
  resolve(
    rawName: string,
    session: SessionId,
    declaredId?: number
  ): SpeakerResolution;
}
