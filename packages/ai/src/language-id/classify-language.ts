import { generateObject } from "ai";
import { z } from "zod";
import type {
  LanguageClassifier,
  LanguageGuess,
  LanguagePair,
} from "@plenary-corpus/core";
import { createGeminiClient, createOpenAIClient } from "../lib/ai-clients";
import { defaultLanguageIdConfig, LanguageIdConfig } from "./config";

const languageSchema = z.object({
  label: z
    .string()
    .describe(
      "ISO 639-1 code of the language, or two codes joined with + when both languages are spoken"
    ),
  confidence: z.number().min(0).max(1).describe("Confidence between 0 and 1"),
});

export type LanguageIdResult = z.infer<typeof languageSchema>;

export interface LanguageIdRequest {
  system: string;
  text: string;
}

export type LanguageIdGenerator = (
  request: LanguageIdRequest
) => Promise<LanguageIdResult>;

const buildSystemPrompt = ({ majority, minority }: LanguagePair) =>
  `You identify the language of parliamentary speech transcripts.
The speech is in "${majority}", in "${minority}", or switches between them.

Rules
1. Answer "${majority}" or "${minority}" when the text is in one language.
2. Answer "${majority}+${minority}" when both languages carry whole sentences.
3. Names, titles and single quoted words do not change the language.
4. For any other language, answer its ISO 639-1 code.`;

/** Language identification through a structured-output LLM call. */
export function createLanguageIdGenerator(
  config: LanguageIdConfig = defaultLanguageIdConfig()
): LanguageIdGenerator {
  const client =
    config.provider === "openai"
      ? createOpenAIClient({ apiKey: config.apiKey })
      : createGeminiClient({ apiKey: config.apiKey });
  const model = client(config.model);

  return async ({ system, text }) => {
    const { object } = await generateObject({
      model,
      schema: languageSchema,
      messages: [
        { role: "system", content: system },
        { role: "user", content: text },
      ],
      temperature: 0,
      maxRetries: 2,
    });
    return object;
  };
}

export interface LlmLanguageClassifierOptions {
  languages: LanguagePair;
  generate?: LanguageIdGenerator;
  // Used when the LLM call fails; without one the error propagates
  fallback?: LanguageClassifier;
  model?: string;
}

export class LlmLanguageClassifier implements LanguageClassifier {
  private readonly generate: LanguageIdGenerator;
  private readonly systemPrompt: string;

  constructor(private readonly options: LlmLanguageClassifierOptions) {
    this.generate = options.generate ?? createLanguageIdGenerator();
    this.systemPrompt = buildSystemPrompt(options.languages);
  }

  async classify(text: string): Promise<LanguageGuess> {
    console.log("[Language Request]", {
      model: this.options.model ?? defaultLanguageIdConfig().model,
      characters: text.length,
      timestamp: new Date().toISOString(),
    });

    try {
      const result = await this.generate({ system: this.systemPrompt, text });
      const guess = {
        label: result.label.trim().toLowerCase(),
        confidence: result.confidence,
      };

      console.log("[Language Response]", {
        ...guess,
        timestamp: new Date().toISOString(),
      });

      return guess;
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : "Unknown language identification error";

      console.error("[Language Error]", {
        error: errorMessage,
        fallback: Boolean(this.options.fallback),
        timestamp: new Date().toISOString(),
      });

      if (!this.options.fallback) throw error;
      return this.options.fallback.classify(text);
    }
  }
}
