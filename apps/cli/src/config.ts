import { fileURLToPath } from "node:url";
import { z } from "zod";
import {
  DEFAULT_LABELER_OPTIONS,
  DEFAULT_LANGUAGE_FILTER_OPTIONS,
  DEFAULT_RECONCILER_OPTIONS,
} from "@plenary-corpus/core";

const DEFAULT_STOPLIST = fileURLToPath(
  new URL("../data/minority-stopwords.txt", import.meta.url)
);

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const envSchema = z
  .object({
    CORPUS_ROOT: z.string().default("corpus"),
    TRANSCRIPT_PATH_TEMPLATE: z
      .string()
      .default("{root}/{year}/session-{number}-{year}.json"),
    DECODER_PATH_TEMPLATE: z
      .string()
      .default("generated/decoded/session-{number}-{year}.json"),
    AUDIO_PATH_TEMPLATE: z
      .string()
      .default("{root}/{year}/session-{number}-{year}.wav"),
    SESSION_OUTPUT_DIR: z.string().default("generated/sessions"),
    CORPUS_OUTPUT_DIR: z.string().default("generated/corpus"),
    SPEAKER_TABLE: z.string().default("generated/speakers.json"),
    MINORITY_STOPLIST: z.string().default(DEFAULT_STOPLIST),
    MAJORITY_LANGUAGE: z.string().default("fi"),
    MINORITY_LANGUAGE: z.string().default("sv"),
    THRESHOLD_REALIGN: z.coerce
      .number()
      .min(0)
      .max(1)
      .default(DEFAULT_RECONCILER_OPTIONS.thresholdRealign),
    MIN_DURATION: z.coerce
      .number()
      .nonnegative()
      .default(DEFAULT_LABELER_OPTIONS.minDuration),
    MAX_DURATION: z.coerce
      .number()
      .positive()
      .default(DEFAULT_LABELER_OPTIONS.maxDuration),
    SEARCH_WINDOW_WORDS: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_RECONCILER_OPTIONS.searchWindowWords),
    BACKTRACK_WORDS: z.coerce
      .number()
      .int()
      .nonnegative()
      .default(DEFAULT_RECONCILER_OPTIONS.backtrackWords),
    STOPWORD_DENSITY: z.coerce
      .number()
      .min(0)
      .max(1)
      .default(DEFAULT_LANGUAGE_FILTER_OPTIONS.minDensity),
    STOPWORD_MIN_HITS: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_LANGUAGE_FILTER_OPTIONS.minHits),
    KEEP_UNRESOLVED_SPEAKERS: flag.default("false"),
    SESSION_CONCURRENCY: z.coerce.number().int().positive().default(4),
    DEFAULT_TERM: z.coerce.number().int().positive().default(38),
    LANGUAGE_ID_PROVIDER: z.enum(["gemini", "openai"]).default("gemini"),
    LANGUAGE_ID_MODEL: z.string().default("gemini-2.5-flash"),
    GOOGLE_GENERATIVE_AI_API_KEY: z.string().optional(),
    OPENAI_API_KEY: z.string().optional(),
  })
  .refine((env) => env.MIN_DURATION < env.MAX_DURATION, {
    message: "MIN_DURATION must be below MAX_DURATION",
    path: ["MIN_DURATION"],
  });

const parseEnv = (env: NodeJS.ProcessEnv) => {
  // Unset and empty variables both take the default
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  return envSchema.parse(defined);
};

export type PipelineConfig = ReturnType<typeof toPipelineConfig>;

const toPipelineConfig = (env: z.infer<typeof envSchema>) => ({
  paths: {
    corpusRoot: env.CORPUS_ROOT,
    transcriptTemplate: env.TRANSCRIPT_PATH_TEMPLATE,
    decoderTemplate: env.DECODER_PATH_TEMPLATE,
    audioTemplate: env.AUDIO_PATH_TEMPLATE,
    sessionOutputDir: env.SESSION_OUTPUT_DIR,
    corpusOutputDir: env.CORPUS_OUTPUT_DIR,
    speakerTable: env.SPEAKER_TABLE,
    minorityStoplist: env.MINORITY_STOPLIST,
  },
  languages: {
    majority: env.MAJORITY_LANGUAGE,
    minority: env.MINORITY_LANGUAGE,
  },
  reconciler: {
    thresholdRealign: env.THRESHOLD_REALIGN,
    searchWindowWords: env.SEARCH_WINDOW_WORDS,
    backtrackWords: env.BACKTRACK_WORDS,
  },
  labeler: {
    minDuration: env.MIN_DURATION,
    maxDuration: env.MAX_DURATION,
    keepUnresolvedSpeakers: env.KEEP_UNRESOLVED_SPEAKERS,
  },
  filter: {
    minDensity: env.STOPWORD_DENSITY,
    minHits: env.STOPWORD_MIN_HITS,
  },
  concurrency: env.SESSION_CONCURRENCY,
  defaultTerm: env.DEFAULT_TERM,
  languageId: {
    provider: env.LANGUAGE_ID_PROVIDER,
    model: env.LANGUAGE_ID_MODEL,
    apiKey:
      env.LANGUAGE_ID_PROVIDER === "openai"
        ? env.OPENAI_API_KEY
        : env.GOOGLE_GENERATIVE_AI_API_KEY,
  },
});

/** Read the pipeline configuration from the environment. */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env) =>
  toPipelineConfig(parseEnv(env));
