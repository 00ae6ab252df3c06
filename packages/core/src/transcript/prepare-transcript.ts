import { labelFromCode, labelFromGuess } from "../language/language-labels";
import { LanguageClassifier, LanguagePair } from "../types/language";
import { SpeakerResolver } from "../types/speaker";
import { ParsedTranscript, SpeechTurn } from "../types/transcript";
import { splitWords } from "../utils/words";
import { TextNormalizer } from "./text-normalizer";

export interface PrepareTranscriptDeps {
  resolver: SpeakerResolver;
  classifier: LanguageClassifier;
  normalizer: TextNormalizer;
  languages: LanguagePair;
}

export interface PreparedTranscript {
  turns: SpeechTurn[];
  unresolvedTurns: number;
  detectedLanguages: number;
  vocabulary: string[];
}

/**
 * Complete parsed turns: resolve speakers, classify turns without a declared
 * language and normalise text. Only majority-language turns contribute to
 * the vocabulary.
 */
export async function prepareTranscript(
  transcript: ParsedTranscript,
  deps: PrepareTranscriptDeps
): Promise<PreparedTranscript> {
  const turns: SpeechTurn[] = [];
  let unresolvedTurns = 0;
  let detectedLanguages = 0;

  for (const turn of transcript.turns) {
    const speaker = deps.resolver.resolve(
      turn.speakerName,
      turn.session,
      turn.declaredSpeakerId
    );
    if (speaker.status === "unresolved") unresolvedTurns++;

    let language = labelFromCode(turn.language ?? "", deps.languages);
    let languageSource: SpeechTurn["languageSource"] = "declared";
    if (!turn.language) {
      const guess = await deps.classifier.classify(turn.rawText);
      language = labelFromGuess(guess.label, deps.languages);
      languageSource = "detected";
      detectedLanguages++;
    }

    const text = deps.normalizer.normalize(turn.rawText, {
      collectVocabulary: language === "majority",
    });
    if (splitWords(text).length === 0) continue;

    turns.push({
      session: turn.session,
      index: turn.index,
      speakerName: turn.speakerName,
      speakerId: speaker.speakerId,
      speakerResolved: speaker.status === "resolved",
      rawText: turn.rawText,
      text,
      language,
      languageSource,
      flags: turn.flags,
    });
  }

  return {
    turns,
    unresolvedTurns,
    detectedLanguages,
    vocabulary: deps.normalizer.vocabulary.toSortedArray(),
  };
}
