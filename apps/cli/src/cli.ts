#!/usr/bin/env tsx
import dotenv from "dotenv";
import path from "node:path";
import { parseArgs } from "node:util";
import { parseRetryList, type RetryEntry } from "@plenary-corpus/core";
import { loadConfig, type PipelineConfig } from "./config";
import { createLanguageClassifier } from "./lib/classifier";
import { loadSpeakerLookup } from "./lib/speaker-table";
import { loadStoplist } from "./lib/stoplist";
import { assembleSessions } from "./tools/assemble";
import { filterCorpus } from "./tools/filter";
import { processSession } from "./tools/process-session";
import { formatSummary, summarizeRun } from "./tools/report";
import { runSessions } from "./tools/run-sessions";
import { buildVocabulary } from "./tools/vocabulary";
import { readText, writeJSON } from "./utils/file";

dotenv.config();

const USAGE = `Usage: plenary-corpus <command> [options]

Commands
  process <session-key...>   reconcile and label sessions (keys like 38-2015-007)
    --retry <file>           only candidates overlapping entries of a retry list
    --concurrency <n>        sessions processed at once
  assemble                   merge session records into the corpus tables
                             (a full assemble brings back filtered utterances; run filter after it)
    --incremental            merge into the existing corpus, skipping filtered utterances
  filter                     remove minority-language utterances
  vocabulary                 merge session word lists
  all <session-key...>       process, assemble, filter and vocabulary`;

interface ProcessOptions {
  retryFile?: string;
  concurrency?: string;
}

async function processCommand(
  config: PipelineConfig,
  keys: string[],
  options: ProcessOptions
) {
  if (keys.length === 0) {
    throw new Error("No session keys given");
  }

  let retry: RetryEntry[] | undefined;
  if (options.retryFile) {
    const content = await readText(options.retryFile);
    if (content === null) {
      throw new Error(`Retry list not found: ${options.retryFile}`);
    }
    retry = parseRetryList(content);
  }

  const concurrency = options.concurrency
    ? Number.parseInt(options.concurrency, 10)
    : config.concurrency;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`Invalid concurrency "${options.concurrency}"`);
  }

  const speakers = await loadSpeakerLookup(config.paths.speakerTable);
  const stoplist = await loadStoplist(config.paths.minorityStoplist);
  const classifier = createLanguageClassifier(config, stoplist);

  const outcomes = await runSessions(
    keys,
    (key) => processSession(key, { config, speakers, classifier, retry }),
    concurrency
  );

  const summary = summarizeRun(outcomes);
  await writeJSON(path.join(config.paths.sessionOutputDir, "summary.json"), summary);
  for (const line of formatSummary(summary)) {
    console.log(line);
  }

  if (summary.failed.length > 0) {
    process.exitCode = 1;
  }
  return summary;
}

async function main() {
  const { positionals, values } = parseArgs({
    allowPositionals: true,
    options: {
      retry: { type: "string" },
      concurrency: { type: "string" },
      incremental: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  const [command, ...keys] = positionals;

  if (values.help || !command) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();

  switch (command) {
    case "process":
      await processCommand(config, keys, {
        retryFile: values.retry,
        concurrency: values.concurrency,
      });
      break;
    case "assemble":
      await assembleSessions(config, { incremental: values.incremental });
      break;
    case "filter":
      await filterCorpus(config);
      break;
    case "vocabulary":
      await buildVocabulary(config);
      break;
    case "all":
      await processCommand(config, keys, { concurrency: values.concurrency });
      await assembleSessions(config, { incremental: values.incremental });
      await filterCorpus(config);
      await buildVocabulary(config);
      break;
    default:
      console.error(`Unknown command "${command}"\n\n${USAGE}`);
      process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error("Error in CLI:", error);
  process.exit(1);
});
