import { describe, it, expect } from "vitest";
import { CorpusRecord } from "../types/corpus";
import {
  assembleCorpus,
  audioPathsFromTables,
  chainAudioPathResolvers,
  createTemplateAudioPathResolver,
} from "./corpus-assembler";
import { parseCorpusTables, renderCorpusTables } from "./tables";

const first: CorpusRecord = {
  uttId: "38-2015-007-00000000-00000120",
  session: "38-2015-007",
  start: 0,
  end: 120,
  speakerId: 101,
  text: "hyvä puhemies",
};
const second: CorpusRecord = {
  uttId: "38-2015-007-00000200-00000450",
  session: "38-2015-007",
  start: 200,
  end: 450,
  speakerId: 7,
  text: "kiitos paljon",
};
const third: CorpusRecord = {
  uttId: "38-2015-008-00000000-00000300",
  session: "38-2015-008",
  start: 0,
  end: 300,
  speakerId: 101,
  text: "arvoisat kollegat",
};

const resolveAudioPath = createTemplateAudioPathResolver(
  "{root}/{year}/session-{number}-{year}.wav",
  "corpus"
);

const inputA = { source: "a.records", records: [second, first] };
const inputB = { source: "b.records", records: [third, first] };

describe("createTemplateAudioPathResolver", () => {
  it("should fill the template from the session key", () => {
    expect(resolveAudioPath("38-2015-007")).toBe("corpus/2015/session-007-2015.wav");
    expect(resolveAudioPath("not-a-session")).toBeUndefined();
  });

  it("should fall back through chained resolvers", () => {
    const resolve = chainAudioPathResolvers(
      (session) => (session === "38-2015-007" ? "existing.wav" : undefined),
      resolveAudioPath
    );
    expect(resolve("38-2015-007")).toBe("existing.wav");
    expect(resolve("38-2015-008")).toBe("corpus/2015/session-008-2015.wav");
  });
});

describe("assembleCorpus", () => {
  it("should merge inputs and collapse exact duplicates", () => {
    const result = assembleCorpus([inputA, inputB], resolveAudioPath);

    expect(result.tables.records).toEqual([first, second, third]);
    expect(result.tables.audioPaths).toEqual([
      { session: "38-2015-007", path: "corpus/2015/session-007-2015.wav" },
      { session: "38-2015-008", path: "corpus/2015/session-008-2015.wav" },
    ]);
    expect(result.conflicts).toEqual([]);
    expect(result.rejected).toEqual([]);
  });

  it("should not depend on input order", () => {
    expect(assembleCorpus([inputB, inputA], resolveAudioPath)).toEqual(
      assembleCorpus([inputA, inputB], resolveAudioPath)
    );
  });

  it("should leave an already merged corpus unchanged when merged again", () => {
    const merged = assembleCorpus([inputA, inputB], resolveAudioPath);
    const existing = parseCorpusTables(renderCorpusTables(merged.tables));

    const again = assembleCorpus(
      [{ source: "corpus", records: existing.records }, inputA, inputB],
      chainAudioPathResolvers(audioPathsFromTables(existing), resolveAudioPath)
    );

    expect(again.tables).toEqual(merged.tables);
    expect(renderCorpusTables(again.tables)).toEqual(renderCorpusTables(merged.tables));
  });

  it("should exclude every version of a conflicting utterance", () => {
    const changed = { ...first, text: "toinen teksti" };
    const result = assembleCorpus(
      [inputA, inputB, { source: "c.records", records: [changed] }],
      resolveAudioPath
    );

    expect(result.tables.records).toEqual([second, third]);
    expect(result.conflicts).toEqual([
      {
        uttId: first.uttId,
        versions: [
          { source: "a.records", record: first },
          { source: "b.records", record: first },
          { source: "c.records", record: changed },
        ],
      },
    ]);
  });

  it("should reject records with bad boundaries or no audio path", () => {
    const backwards = { ...first, uttId: "38-2015-007-00000300-00000300", start: 300, end: 300 };
    const result = assembleCorpus(
      [{ source: "a.records", records: [first, backwards, third] }],
      (session) => (session === "38-2015-007" ? "session-007.wav" : undefined)
    );

    expect(result.tables.records).toEqual([first]);
    expect(result.tables.audioPaths).toEqual([
      { session: "38-2015-007", path: "session-007.wav" },
    ]);
    expect(result.rejected).toEqual([
      { source: "a.records", record: backwards, reason: "invalid-boundary" },
      { source: "a.records", record: third, reason: "missing-audio-path" },
    ]);
  });

  it("should keep utterance ids unique", () => {
    const result = assembleCorpus(
      [inputA, inputB, inputA, { source: "c.records", records: [{ ...third, speakerId: 9 }] }],
      resolveAudioPath
    );
    const ids = result.tables.records.map((record) => record.uttId);

    expect(new Set(ids).size).toBe(ids.length);
    expect(ids).toEqual([first.uttId, second.uttId]);
  });
});
