import { z } from "zod";
import { SessionId } from "../types/session";
import {
  ParsedTranscript,
  TranscriptTurn,
  TurnFlag,
  TurnIssue,
} from "../types/transcript";
import { splitWords } from "../utils/words";
import { stripMarkup } from "./markup";

/** Position of an embedded chairman interjection inside a statement. */
export const EMBEDDED_STATEMENT_MARKER = "#ch_statement";

const embeddedStatementSchema = z.object({
  title: z.string().default(""),
  firstname: z.string().default(""),
  lastname: z.string().default(""),
  language: z.string().default(""),
  text: z.string().default(""),
});

const statementSchema = z.object({
  type: z.string().default("L"),
  mp_id: z.coerce.number().int().nonnegative().default(0),
  firstname: z.string().default(""),
  lastname: z.string().default(""),
  title: z.string().default(""),
  language: z.string().default(""),
  text: z.string(),
  embedded_statement: embeddedStatementSchema.optional(),
});

const transcriptSchema = z.object({
  number: z.coerce.number().int().positive(),
  year: z.coerce.number().int().min(1900),
  term: z.coerce.number().int().positive().optional(),
  begin_time: z.string().optional(),
  subsections: z.array(
    z.object({
      number: z.coerce.string().default(""),
      statements: z.array(z.unknown()),
    })
  ),
});

type Statement = z.infer<typeof statementSchema>;

export interface TranscriptParserOptions {
  // Used when the document does not name the parliamentary term
  defaultTerm: number;
  onIssue?: (issue: TurnIssue) => void;
}

export class TranscriptFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TranscriptFormatError";
  }
}

interface TurnDraft {
  speakerName: string;
  declaredSpeakerId?: number;
  text: string;
  language: string;
  embedded: boolean;
}

const speakerName = (firstname: string, lastname: string) =>
  `${firstname} ${lastname}`.trim();

/**
 * A statement with an embedded chairman interjection becomes up to three
 * turns: the speaker before, the chairman, the speaker after.
 */
const draftTurns = (statement: Statement): TurnDraft[] => {
  const main = {
    speakerName: speakerName(statement.firstname, statement.lastname),
    declaredSpeakerId: statement.mp_id > 0 ? statement.mp_id : undefined,
    language: statement.language,
    embedded: false,
  };
  const embedded = statement.embedded_statement;

  if (!embedded || !embedded.text.trim()) {
    return [
      { ...main, text: statement.text.replace(EMBEDDED_STATEMENT_MARKER, " ") },
    ];
  }

  const interjection: TurnDraft = {
    speakerName: speakerName(embedded.firstname, embedded.lastname),
    text: embedded.text,
    language: embedded.language,
    embedded: true,
  };

  const markerAt = statement.text.indexOf(EMBEDDED_STATEMENT_MARKER);
  if (markerAt < 0) {
    return [{ ...main, text: statement.text }, interjection];
  }

  return [
    { ...main, text: statement.text.slice(0, markerAt) },
    interjection,
    {
      ...main,
      text: statement.text.slice(markerAt + EMBEDDED_STATEMENT_MARKER.length),
    },
  ];
};

/**
 * Parse a session transcript document into ordered speech turns.
 * A bad statement is reported and skipped; only a document that cannot be
 * read as a transcript at all throws.
 */
export function parseTranscript(
  document: unknown,
  options: TranscriptParserOptions
): ParsedTranscript {
  const parsed = transcriptSchema.safeParse(document);
  if (!parsed.success) {
    throw new TranscriptFormatError(
      `Invalid transcript document: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`
    );
  }

  const session: SessionId = {
    term: parsed.data.term ?? options.defaultTerm,
    year: parsed.data.year,
    number: parsed.data.number,
  };
  const turns: TranscriptTurn[] = [];
  const issues: TurnIssue[] = [];

  const report = (subsection: string, statement: number, reason: string) => {
    const issue = { session, subsection, statement, reason };
    issues.push(issue);
    options.onIssue?.(issue);
  };

  for (const subsection of parsed.data.subsections) {
    subsection.statements.forEach((raw, statementIndex) => {
      const statement = statementSchema.safeParse(raw);
      if (!statement.success) {
        report(
          subsection.number,
          statementIndex,
          `invalid statement: ${statement.error.issues[0]?.message ?? "unknown"}`
        );
        return;
      }

      for (const draft of draftTurns(statement.data)) {
        const markup = stripMarkup(draft.text);
        if (!markup.ok) {
          report(subsection.number, statementIndex, `malformed markup: ${markup.reason}`);
          continue;
        }
        if (splitWords(markup.text).length === 0) continue;

        const flags: TurnFlag[] = [];
        if (!draft.speakerName) flags.push("missing-speaker");
        if (!draft.language.trim()) flags.push("needs-language");
        if (draft.embedded) flags.push("embedded");

        turns.push({
          session,
          index: turns.length,
          speakerName: draft.speakerName,
          declaredSpeakerId: draft.declaredSpeakerId,
          rawText: markup.text,
          language: draft.language.trim() || undefined,
          flags,
        });
      }
    });
  }

  return { session, turns, issues };
}
