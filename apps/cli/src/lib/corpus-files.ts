import path from "node:path";
import {
  CORPUS_TABLE_FILES,
  parseCorpusTables,
  renderCorpusTables,
  type CorpusTableName,
  type CorpusTables,
} from "@plenary-corpus/core";
import { readText, writeText } from "../utils/file";

const TABLE_NAMES: CorpusTableName[] = ["segments", "text", "audioPaths", "speakerIndex"];

/** Read the corpus tables in `dir`, or null when none has been written. */
export async function readCorpusTables(dir: string): Promise<CorpusTables | null> {
  const read = (name: CorpusTableName) =>
    readText(path.join(dir, CORPUS_TABLE_FILES[name]));

  const [segments, text, audioPaths, speakerIndex] = await Promise.all(
    TABLE_NAMES.map(read)
  );
  if (segments === null && text === null && audioPaths === null && speakerIndex === null) {
    return null;
  }
  if (segments === null || text === null || audioPaths === null || speakerIndex === null) {
    throw new Error(`Corpus in ${dir} is missing one of its tables`);
  }
  return parseCorpusTables({ segments, text, audioPaths, speakerIndex });
}

/** Each table is replaced atomically. */
export async function writeCorpusTables(dir: string, tables: CorpusTables) {
  const rendered = renderCorpusTables(tables);
  for (const name of TABLE_NAMES) {
    await writeText(path.join(dir, CORPUS_TABLE_FILES[name]), rendered[name]);
  }
}
