import { compareStrings } from "../utils/words";

/** Distinct normalised words of one session. */
export class Vocabulary {
  private readonly words = new Set<string>();

  add(words: Iterable<string>): void {
    for (const word of words) {
      if (word) this.words.add(word);
    }
  }

  has(word: string): boolean {
    return this.words.has(word);
  }

  get size(): number {
    return this.words.size;
  }

  toSortedArray(): string[] {
    return [...this.words].sort(compareStrings);
  }
}

/**
 * Merge per-session word lists into one sorted, deduplicated list with the
 * stoplist subtracted.
 */
export function mergeVocabularies(
  lists: Iterable<Iterable<string>>,
  stoplist: ReadonlySet<string> = new Set()
): string[] {
  const merged = new Vocabulary();
  for (const list of lists) {
    merged.add(list);
  }
  return merged.toSortedArray().filter((word) => !stoplist.has(word));
}
