import {
  createLanguageIdGenerator,
  LlmLanguageClassifier,
} from "@plenary-corpus/ai";
import {
  StopwordLanguageClassifier,
  type LanguageClassifier,
} from "@plenary-corpus/core";
import type { PipelineConfig } from "../config";

/**
 * LLM language identification when an API key is configured, with the
 * stopword classifier behind it; the stopword classifier alone otherwise.
 */
export function createLanguageClassifier(
  config: PipelineConfig,
  stoplist: ReadonlySet<string>
): LanguageClassifier {
  const stopwords = new StopwordLanguageClassifier({
    languages: config.languages,
    stoplist,
  });
  if (!config.languageId.apiKey) {
    return stopwords;
  }
  return new LlmLanguageClassifier({
    languages: config.languages,
    generate: createLanguageIdGenerator({
      provider: config.languageId.provider,
      model: config.languageId.model,
      apiKey: config.languageId.apiKey,
    }),
    fallback: stopwords,
    model: config.languageId.model,
  });
}
