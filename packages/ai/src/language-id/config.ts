export type LanguageIdProvider = "gemini" | "openai";

export const LANGUAGE_ID_PROVIDER: LanguageIdProvider =
  process.env.LANGUAGE_ID_PROVIDER === "openai" ? "openai" : "gemini";
export const LANGUAGE_ID_MODEL =
  process.env.LANGUAGE_ID_MODEL ?? "gemini-2.5-flash";

export interface LanguageIdConfig {
  provider: LanguageIdProvider;
  model: string;
  apiKey?: string;
}

export const defaultLanguageIdConfig = (): LanguageIdConfig => ({
  provider: LANGUAGE_ID_PROVIDER,
  model: LANGUAGE_ID_MODEL,
});
