import { describe, it, expect, vi } from "vitest";
import { parseTranscript, TranscriptFormatError } from "./transcript-parser";

const document = {
  number: 7,
  year: 2015,
  subsections: [
    {
      number: "1",
      statements: [
        {
          mp_id: 101,
          firstname: "Anna",
          lastname: "Virtanen",
          language: "fi",
          text: "Arvoisa puhemies, hyvät kollegat.",
        },
        {
          firstname: "Pekka",
          lastname: "Korhonen",
          language: "",
          text: "Kiitos puhemies. #ch_statement Jatkan puhetta tästä.",
          embedded_statement: {
            title: "puhemies",
            firstname: "Maria",
            lastname: "Nieminen",
            language: "fi",
            text: "Aika on päättymässä.",
          },
        },
        { text: 42 },
        { firstname: "Aino", lastname: "Lehto", language: "fi", text: "Kiitos." },
        { firstname: "Eero", lastname: "Salo", language: "fi", text: "<b>a <i>b</i></b> c" },
      ],
    },
  ],
};

const session = { term: 38, year: 2015, number: 7 };

describe("parseTranscript", () => {
  it("should produce ordered turns and split embedded interjections", () => {
    const result = parseTranscript(document, { defaultTerm: 38 });

    expect(result.session).toEqual(session);
    expect(result.turns).toEqual([
      {
        session,
        index: 0,
        speakerName: "Anna Virtanen",
        declaredSpeakerId: 101,
        rawText: "Arvoisa puhemies, hyvät kollegat.",
        language: "fi",
        flags: [],
      },
      {
        session,
        index: 1,
        speakerName: "Pekka Korhonen",
        rawText: "Kiitos puhemies.",
        flags: ["needs-language"],
      },
      {
        session,
        index: 2,
        speakerName: "Maria Nieminen",
        rawText: "Aika on päättymässä.",
        language: "fi",
        flags: ["embedded"],
      },
      {
        session,
        index: 3,
        speakerName: "Pekka Korhonen",
        rawText: "Jatkan puhetta tästä.",
        flags: ["needs-language"],
      },
      {
        session,
        index: 4,
        speakerName: "Aino Lehto",
        rawText: "Kiitos.",
        language: "fi",
        flags: [],
      },
    ]);
  });

  it("should report bad statements and keep going", () => {
    const onIssue = vi.fn();
    const result = parseTranscript(document, { defaultTerm: 38, onIssue });

    expect(result.issues).toHaveLength(2);
    expect(result.issues[0]).toMatchObject({ session, subsection: "1", statement: 2 });
    expect(result.issues[0].reason).toMatch(/^invalid statement: /);
    expect(result.issues[1]).toEqual({
      session,
      subsection: "1",
      statement: 4,
      reason: "malformed markup: nested tag <i> inside <b>",
    });
    expect(onIssue).toHaveBeenCalledTimes(2);
  });

  it("should take the term from the document when present", () => {
    const result = parseTranscript({ ...document, term: 39 }, { defaultTerm: 38 });
    expect(result.session.term).toBe(39);
  });

  it("should keep the interjection after the statement when the marker is missing", () => {
    const result = parseTranscript(
      {
        number: 8,
        year: 2015,
        subsections: [
          {
            number: "2",
            statements: [
              {
                firstname: "Anna",
                lastname: "Virtanen",
                language: "fi",
                text: "Hyvä puhemies.",
                embedded_statement: {
                  firstname: "Maria",
                  lastname: "Nieminen",
                  language: "fi",
                  text: "Puheenvuoro päättyy.",
                },
              },
            ],
          },
        ],
      },
      { defaultTerm: 38 }
    );

    expect(result.turns.map((turn) => turn.speakerName)).toEqual([
      "Anna Virtanen",
      "Maria Nieminen",
    ]);
  });

  it("should throw on documents that are not transcripts", () => {
    expect(() => parseTranscript({ year: 2015 }, { defaultTerm: 38 })).toThrow(
      TranscriptFormatError
    );
  });
});
