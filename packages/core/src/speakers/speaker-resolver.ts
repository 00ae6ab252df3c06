import { SessionId } from "../types/session";
import {
  SpeakerEntry,
  SpeakerLookup,
  SpeakerResolution,
  SpeakerResolver,
  UNRESOLVED_SPEAKER_ID,
} from "../types/speaker";
import {
  NameNormalizationOptions,
  normalizeSpeakerName,
  splitName,
} from "./speaker-names";

class MapSpeakerLookup implements SpeakerLookup {
  constructor(private readonly names: ReadonlyMap<string, number>) {}

  get(normalizedName: string): number | undefined {
    return this.names.get(normalizedName);
  }

  entries(): Iterable<[string, number]> {
    return this.names.entries();
  }
}

/**
 * Build a lookup from table entries. Name variants are normalised the same
 * way printed names are. A variant claimed by two different ids is dropped
 * rather than guessed.
 */
export function createSpeakerLookup(
  entries: SpeakerEntry[],
  options: NameNormalizationOptions = {}
): SpeakerLookup {
  const names = new Map<string, number>();
  const ambiguous = new Set<string>();

  for (const entry of entries) {
    if (!Number.isInteger(entry.id) || entry.id <= 0) {
      throw new Error(`Speaker id must be a positive integer, got ${entry.id}`);
    }
    for (const variant of entry.names) {
      const key = normalizeSpeakerName(variant, options);
      if (!key) continue;
      const existing = names.get(key);
      if (existing !== undefined && existing !== entry.id) {
        ambiguous.add(key);
      }
      names.set(key, entry.id);
    }
  }

  for (const key of ambiguous) {
    names.delete(key);
  }

  return new MapSpeakerLookup(names);
}

export interface SpeakerResolverOptions extends NameNormalizationOptions {
  onUnresolved?: (name: string, session: SessionId) => void;
}

/**
 * Resolve printed names against an injected lookup. Unknown or ambiguous
 * names resolve to the unresolved sentinel instead of a default speaker.
 */
export function createSpeakerResolver(
  lookup: SpeakerLookup,
  options: SpeakerResolverOptions = {}
): SpeakerResolver {
  const byLastName = new Map<string, Array<{ first: string; id: number }>>();
  for (const [name, id] of lookup.entries()) {
    const parts = splitName(name);
    if (!parts) continue;
    const list = byLastName.get(parts.last) ?? [];
    list.push({ first: parts.first, id });
    byLastName.set(parts.last, list);
  }

  const matchAbbreviated = (normalized: string): number | undefined => {
    const parts = splitName(normalized);
    // Only "j virtanen" style names, a single letter before the last name
    if (!parts || parts.first.length !== 1) return undefined;
    const ids = new Set(
      (byLastName.get(parts.last) ?? [])
        .filter((candidate) => candidate.first.startsWith(parts.first))
        .map((candidate) => candidate.id)
    );
    return ids.size === 1 ? [...ids][0] : undefined;
  };

  return {
    resolve(rawName, session, declaredId): SpeakerResolution {
      if (declaredId !== undefined && declaredId > 0) {
        return { status: "resolved", speakerId: declaredId };
      }

      const normalized = normalizeSpeakerName(rawName, options);
      const speakerId = normalized
        ? lookup.get(normalized) ?? matchAbbreviated(normalized)
        : undefined;

      if (speakerId !== undefined) {
        return { status: "resolved", speakerId };
      }

      options.onUnresolved?.(rawName, session);
      return {
        status: "unresolved",
        speakerId: UNRESOLVED_SPEAKER_ID,
        name: rawName,
      };
    },
  };
}
