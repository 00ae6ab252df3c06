import path from "node:path";
import {
  assembleCorpus,
  audioPathsFromTables,
  chainAudioPathResolvers,
  createTemplateAudioPathResolver,
  parseRecordLines,
  type AssembleInput,
  type AssembleResult,
  type MergeConflict,
  type RejectedRecord,
} from "@plenary-corpus/core";
import type { PipelineConfig } from "../config";
import { readCorpusTables, writeCorpusTables } from "../lib/corpus-files";
import { listFiles, readText, writeLines } from "../utils/file";
import { readFilteredIds } from "./filter";

export interface AssembleOptions {
  // Merge into the corpus already in the output directory, keeping out what filter removed
  incremental?: boolean;
}

export const CONFLICTS_FILE = "conflicts.txt";
export const REJECTED_FILE = "rejected.txt";

const formatConflictLines = (conflict: MergeConflict) =>
  conflict.versions.map(
    ({ source, record }) =>
      `${conflict.uttId} ${source} ${record.start} ${record.end} ${record.speakerId} ${record.text}`
  );

const formatRejectedLine = ({ source, record, reason }: RejectedRecord) =>
  `${record.uttId} ${source} ${reason}`;

async function readSessionRecords(dir: string): Promise<AssembleInput[]> {
  const files = await listFiles(dir, ".records");
  return Promise.all(
    files.map(async (file) => ({
      source: path.basename(file),
      records: parseRecordLines((await readText(file)) ?? ""),
    }))
  );
}

/**
 * Merge every per-session record file into the corpus tables. Conflicts and
 * rejected records are written next to the tables.
 */
export async function assembleSessions(
  config: PipelineConfig,
  options: AssembleOptions = {}
): Promise<AssembleResult> {
  const outputDir = config.paths.corpusOutputDir;
  const inputs = await readSessionRecords(config.paths.sessionOutputDir);
  let resolveAudioPath = createTemplateAudioPathResolver(
    config.paths.audioTemplate,
    config.paths.corpusRoot
  );

  if (options.incremental) {
    const filtered = await readFilteredIds(outputDir);
    for (const input of inputs) {
      input.records = input.records.filter((record) => !filtered.has(record.uttId));
    }

    const existing = await readCorpusTables(outputDir);
    if (existing) {
      inputs.push({ source: outputDir, records: existing.records });
      resolveAudioPath = chainAudioPathResolvers(
        audioPathsFromTables(existing),
        resolveAudioPath
      );
    }
  }

  console.log("[Assemble]", {
    inputs: inputs.length,
    incremental: Boolean(options.incremental),
    timestamp: new Date().toISOString(),
  });

  const result = assembleCorpus(inputs, resolveAudioPath);

  await writeCorpusTables(outputDir, result.tables);
  await writeLines(
    path.join(outputDir, CONFLICTS_FILE),
    result.conflicts.flatMap(formatConflictLines)
  );
  await writeLines(path.join(outputDir, REJECTED_FILE), result.rejected.map(formatRejectedLine));

  if (result.conflicts.length || result.rejected.length) {
    console.warn("[Assemble]", {
      conflicts: result.conflicts.length,
      rejected: result.rejected.length,
      timestamp: new Date().toISOString(),
    });
  }
  console.log("[Assemble]", {
    records: result.tables.records.length,
    sessions: result.tables.audioPaths.length,
    speakers: result.tables.speakerIndex.length,
    timestamp: new Date().toISOString(),
  });

  return result;
}
