export type LanguageLabel = "majority" | "minority" | "mixed";

export interface LanguagePair {
  majority: string;
  minority: string;
}

export interface LanguageGuess {
  label: string;
  confidence: number;
}

/**
 * Black-box language identification. Labels are language codes; anything the
 * pipeline does not recognise is read as the majority language.
 */
export interface LanguageClassifier {
  classify(text: string): Promise<LanguageGuess>;
}
