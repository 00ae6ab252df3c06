import path from "node:path";
import { z } from "zod";
import {
  fillSessionTemplate,
  formatRecordLine,
  formatRetryLine,
  formatSeconds,
  formatSessionKey,
  isSameSession,
  labelSession,
  parseSessionKey,
  parseTranscript,
  prepareTranscript,
  reconcileSession,
  selectRetryResults,
  createSpeakerResolver,
  TextNormalizer,
  type DroppedSegment,
  type LanguageClassifier,
  type RetryEntry,
  type SessionId,
  type SpeakerLookup,
} from "@plenary-corpus/core";
import type { PipelineConfig } from "../config";
import { SessionInputError } from "../errors";
import { decoderOutputSchema, toCandidates } from "../lib/decoder-output";
import { readJSON, writeJSON, writeLines } from "../utils/file";
import { countDropReasons, summarizeDurations, type SessionReport } from "./report";

export interface SessionContext {
  config: PipelineConfig;
  speakers: SpeakerLookup;
  classifier: LanguageClassifier;
  // Restricts the output to candidates overlapping these entries
  retry?: RetryEntry[];
}

/** Output file paths of one session; a retry pass writes beside the first pass. */
export const sessionOutputFiles = (dir: string, key: string, retryPass = false) => {
  const base = path.join(dir, retryPass ? `${key}.retry-pass` : key);
  return {
    records: `${base}.records`,
    dropped: `${base}.dropped`,
    retry: `${base}.retry`,
    words: `${base}.words`,
    report: `${base}.report.json`,
  };
};

const formatDroppedLine = (segment: DroppedSegment) =>
  `${segment.session} ${formatSeconds(segment.start)} ${formatSeconds(segment.end)} ${segment.reason} ${segment.hypothesis}`;

const parseKey = (key: string): SessionId => {
  try {
    return parseSessionKey(key);
  } catch (error) {
    throw new SessionInputError(key, error instanceof Error ? error.message : "invalid session key");
  }
};

/**
 * Process one session from transcript and decoder output to labelled
 * segments. Missing inputs fail the session with a SessionInputError.
 */
export async function processSession(
  key: string,
  context: SessionContext
): Promise<SessionReport> {
  const { config } = context;
  const session = parseKey(key);
  const sessionKey = formatSessionKey(session);
  const fill = (template: string) =>
    fillSessionTemplate(template, session, { root: config.paths.corpusRoot });

  const transcriptPath = fill(config.paths.transcriptTemplate);
  const document = await readJSON(transcriptPath, z.unknown());
  if (document === null || document === undefined) {
    throw new SessionInputError(sessionKey, `transcript not found: ${transcriptPath}`);
  }

  const decoderPath = fill(config.paths.decoderTemplate);
  const decoded = await readJSON(decoderPath, decoderOutputSchema);
  if (!decoded) {
    throw new SessionInputError(sessionKey, `decoder output not found: ${decoderPath}`);
  }

  console.log("[Session]", {
    session: sessionKey,
    step: "start",
    retry: Boolean(context.retry),
    timestamp: new Date().toISOString(),
  });

  const transcript = parseTranscript(document, {
    defaultTerm: config.defaultTerm,
    onIssue: (issue) =>
      console.warn("[Transcript Issue]", {
        session: sessionKey,
        subsection: issue.subsection,
        statement: issue.statement,
        reason: issue.reason,
        timestamp: new Date().toISOString(),
      }),
  });
  if (!isSameSession(transcript.session, session)) {
    throw new SessionInputError(
      sessionKey,
      `transcript ${transcriptPath} belongs to session ${formatSessionKey(transcript.session)}`
    );
  }

  const normalizer = new TextNormalizer();
  const prepared = await prepareTranscript(transcript, {
    resolver: createSpeakerResolver(context.speakers),
    classifier: context.classifier,
    normalizer,
    languages: config.languages,
  });

  const candidates = toCandidates(session, decoded);
  const reconciled = reconcileSession(
    prepared.turns,
    candidates,
    config.reconciler,
    (text) => normalizer.normalize(text)
  );
  const results = context.retry
    ? selectRetryResults(reconciled, context.retry)
    : reconciled;
  const labels = labelSession(results, config.labeler);

  const report: SessionReport = {
    session: sessionKey,
    turns: prepared.turns.length,
    unresolvedTurns: prepared.unresolvedTurns,
    detectedLanguages: prepared.detectedLanguages,
    transcriptIssues: transcript.issues.length,
    candidates: results.length,
    counts: labels.counts,
    dropReasons: countDropReasons(labels.decisions),
    durations: summarizeDurations(labels.decisions),
  };

  const files = sessionOutputFiles(
    config.paths.sessionOutputDir,
    sessionKey,
    Boolean(context.retry)
  );
  await writeLines(files.records, labels.records.map(formatRecordLine));
  await writeLines(files.dropped, labels.dropped.map(formatDroppedLine));
  await writeLines(files.retry, labels.retry.map(formatRetryLine));
  await writeLines(files.words, prepared.vocabulary);
  await writeJSON(files.report, report);

  console.log("[Session]", {
    session: sessionKey,
    step: "done",
    ...labels.counts,
    timestamp: new Date().toISOString(),
  });

  return report;
}
