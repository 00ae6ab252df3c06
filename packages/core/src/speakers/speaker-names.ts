const DEFAULT_TITLES = [
  "puhemies",
  "ensimmäinen varapuhemies",
  "toinen varapuhemies",
  "varapuhemies",
  "pääministeri",
  "ministeri",
  "oikeuskansleri",
  "edustaja",
  "ed",
  "talman",
  "minister",
  "dr",
  "mr",
  "mrs",
  "ms",
];

export interface NameNormalizationOptions {
  titles?: string[];
}

const foldDiacritics = (text: string) =>
  text
    .normalize("NFD")
    // Keep the Nordic vowels, they are separate letters
    .replace(/a\u030A/g, "\u00E5")
    .replace(/a\u0308/g, "\u00E4")
    .replace(/o\u0308/g, "\u00F6")
    .replace(/[\u0300-\u036f]/g, "");

/**
 * Normalise a printed speaker name for lookup: lower-case, diacritics
 * folded, punctuation removed, leading titles dropped.
 */
export function normalizeSpeakerName(
  name: string,
  options: NameNormalizationOptions = {}
): string {
  const titles = [...(options.titles ?? DEFAULT_TITLES)].sort(
    (left, right) => right.length - left.length
  );

  let normalized = foldDiacritics(name.toLowerCase())
    .replace(/[^\p{L}\s.-]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();

  let stripped = true;
  while (stripped) {
    stripped = false;
    for (const title of titles) {
      const prefix = new RegExp(`^${title.replace(/\./g, "\\.")}\\.?\\s+`);
      if (prefix.test(normalized)) {
        normalized = normalized.replace(prefix, "");
        stripped = true;
        break;
      }
    }
  }

  return normalized
    .replace(/\./g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export interface NameParts {
  first: string;
  last: string;
}

export function splitName(normalizedName: string): NameParts | null {
  const parts = normalizedName.split(" ").filter(Boolean);
  if (parts.length < 2) return null;
  return {
    first: parts.slice(0, -1).join(" "),
    last: parts[parts.length - 1],
  };
}
