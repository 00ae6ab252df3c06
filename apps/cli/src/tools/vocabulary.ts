import path from "node:path";
import { mergeVocabularies } from "@plenary-corpus/core";
import type { PipelineConfig } from "../config";
import { loadStoplist } from "../lib/stoplist";
import { listFiles, readLines, writeLines } from "../utils/file";

export const VOCABULARY_FILE = "vocabulary.txt";

/** Merge per-session word lists into the corpus vocabulary. */
export async function buildVocabulary(config: PipelineConfig): Promise<string[]> {
  const files = await listFiles(config.paths.sessionOutputDir, ".words");
  const lists = await Promise.all(files.map(async (file) => (await readLines(file)) ?? []));
  const stoplist = await loadStoplist(config.paths.minorityStoplist);

  const words = mergeVocabularies(
    lists.map((lines) => lines.map((line) => line.trim())),
    stoplist
  );
  await writeLines(path.join(config.paths.corpusOutputDir, VOCABULARY_FILE), words);

  console.log("[Vocabulary]", {
    sessions: files.length,
    words: words.length,
    timestamp: new Date().toISOString(),
  });

  return words;
}
