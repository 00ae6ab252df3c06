import {
  LanguageClassifier,
  LanguageGuess,
  LanguagePair,
} from "../types/language";
import { measureStopwordDensity } from "./stopword-density";

export interface StopwordClassifierOptions {
  languages: LanguagePair;
  stoplist: ReadonlySet<string>;
  // Density at or above which a text is read as the minority language
  minorityDensity?: number;
  // Density at or above which a text is read as mixed
  mixedDensity?: number;
}

/**
 * Offline fallback for language identification: counts minority-language
 * function words.
 */
export class StopwordLanguageClassifier implements LanguageClassifier {
  private readonly minorityDensity: number;
  private readonly mixedDensity: number;

  constructor(private readonly options: StopwordClassifierOptions) {
    this.minorityDensity = options.minorityDensity ?? 0.25;
    this.mixedDensity = options.mixedDensity ?? 0.1;
  }

  async classify(text: string): Promise<LanguageGuess> {
    const { majority, minority } = this.options.languages;
    const { density } = measureStopwordDensity(text, this.options.stoplist);

    if (density >= this.minorityDensity) {
      return { label: minority, confidence: Math.min(1, density / this.minorityDensity / 2 + 0.5) };
    }
    if (density >= this.mixedDensity) {
      return { label: `${majority}+${minority}`, confidence: 0.5 };
    }
    return { label: majority, confidence: 1 - density };
  }
}
