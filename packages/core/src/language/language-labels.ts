import { LanguageLabel, LanguagePair } from "../types/language";

const splitCode = (code: string) =>
  code
    .toLowerCase()
    .replace(/\.p$/, "")
    .split(/[+,\s]+/)
    .filter(Boolean);

/**
 * Map a declared language code onto the corpus labels. A code naming both
 * languages (`fi+sv`) is mixed; any other non-majority code counts as
 * minority.
 */
export function labelFromCode(code: string, languages: LanguagePair): LanguageLabel {
  const parts = splitCode(code);
  if (parts.length === 0) return "majority";

  const hasMajority = parts.includes(languages.majority);
  const hasOther = parts.some((part) => part !== languages.majority);

  if (hasMajority && hasOther) return "mixed";
  if (hasMajority) return "majority";
  return "minority";
}

/**
 * Map a classifier label. Codes outside the language pair are ignored, and a
 * label with nothing recognisable reads as the majority language.
 */
export function labelFromGuess(code: string, languages: LanguagePair): LanguageLabel {
  const known = splitCode(code).filter(
    (part) => part === languages.majority || part === languages.minority
  );
  return known.length ? labelFromCode(known.join("+"), languages) : "majority";
}

export function combineLabels(labels: Iterable<LanguageLabel>): LanguageLabel {
  let majority = false;
  let minority = false;
  for (const label of labels) {
    if (label === "mixed") return "mixed";
    if (label === "majority") majority = true;
    if (label === "minority") minority = true;
  }
  if (majority && minority) return "mixed";
  return minority ? "minority" : "majority";
}
