import path from "node:path";
import {
  compareStrings,
  filterMinorityLanguage,
  formatSegmentLine,
  formatTextLine,
  type LanguageFilterResult,
} from "@plenary-corpus/core";
import type { PipelineConfig } from "../config";
import { readCorpusTables, writeCorpusTables } from "../lib/corpus-files";
import { loadStoplist } from "../lib/stoplist";
import { readLines, writeLines } from "../utils/file";

export const FILTERED_TEXT_FILE = "filtered_minority.text";
export const FILTERED_SEGMENTS_FILE = "filtered_minority.segments";

const utteranceIdOf = (line: string) => line.trim().split(/\s+/, 1)[0];

/** Lines from earlier runs stay; a line for the same utterance is replaced. */
async function appendRemoved(filePath: string, lines: string[]) {
  const byId = new Map<string, string>();
  for (const line of [...((await readLines(filePath)) ?? []), ...lines]) {
    byId.set(utteranceIdOf(line), line);
  }
  const merged = [...byId.entries()]
    .sort(([left], [right]) => compareStrings(left, right))
    .map(([, line]) => line);
  await writeLines(filePath, merged);
}

/** Utterance ids removed by every filter run so far. */
export async function readFilteredIds(outputDir: string): Promise<Set<string>> {
  const lines = (await readLines(path.join(outputDir, FILTERED_TEXT_FILE))) ?? [];
  return new Set(lines.map(utteranceIdOf));
}

/**
 * Remove minority-language utterances from the assembled corpus. The removed
 * utterances are added to the filtered lists, which incremental assembly
 * keeps out of the corpus.
 */
export async function filterCorpus(config: PipelineConfig): Promise<LanguageFilterResult> {
  const outputDir = config.paths.corpusOutputDir;
  const tables = await readCorpusTables(outputDir);
  if (!tables) {
    throw new Error(`No corpus tables in ${outputDir}; run assemble first`);
  }

  const stoplist = await loadStoplist(config.paths.minorityStoplist);
  const result = filterMinorityLanguage(tables, { stoplist, ...config.filter });

  await appendRemoved(path.join(outputDir, FILTERED_TEXT_FILE), result.removed.map(formatTextLine));
  await appendRemoved(
    path.join(outputDir, FILTERED_SEGMENTS_FILE),
    result.removed.map(formatSegmentLine)
  );
  await writeCorpusTables(outputDir, result.tables);

  console.log("[Filter]", {
    removed: result.removed.length,
    remaining: result.tables.records.length,
    timestamp: new Date().toISOString(),
  });

  return result;
}
