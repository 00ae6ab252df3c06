import { splitWords } from "../utils/words";
import { finnishRecipe, NormalizationRecipe } from "./recipe";
import { Vocabulary } from "./vocabulary";

/**
 * Convert raw transcript text to canonical form. Normalising canonical text
 * again returns it unchanged.
 */
export function normalizeText(
  raw: string,
  recipe: NormalizationRecipe = finnishRecipe
): string {
  let text = raw;
  for (const { pattern, replacement } of recipe.rules) {
    text =
      typeof replacement === "string"
        ? text.replace(pattern, replacement)
        : text.replace(pattern, replacement);
  }

  text = [...text.toLowerCase()]
    .map((char) => recipe.translations[char] ?? char)
    .join("");

  const words = splitWords(text.replace(recipe.unacceptedChar, " "));
  return words.map((word) => recipe.wordExpansions[word] ?? word).join(" ");
}

export interface NormalizeOptions {
  collectVocabulary?: boolean;
}

/**
 * Per-session normaliser. Collected words stay with the instance; sessions
 * never share one.
 */
export class TextNormalizer {
  readonly vocabulary = new Vocabulary();

  constructor(private readonly recipe: NormalizationRecipe = finnishRecipe) {}

  normalize(raw: string, options: NormalizeOptions = {}): string {
    const text = normalizeText(raw, this.recipe);
    if (options.collectVocabulary) {
      this.vocabulary.add(splitWords(text));
    }
    return text;
  }
}
