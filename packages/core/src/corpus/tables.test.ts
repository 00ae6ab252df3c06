import { describe, it, expect } from "vitest";
import { CorpusRecord } from "../types/corpus";
import {
  buildCorpusTables,
  formatRecordLine,
  parseCorpusTables,
  parseRecordLine,
  renderCorpusTables,
  retainRecords,
} from "./tables";

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

const audioPaths = new Map([
  ["38-2015-007", "corpus/2015/session-007-2015.wav"],
  ["38-2015-008", "corpus/2015/session-008-2015.wav"],
]);

describe("record lines", () => {
  it("should write and read per-session record lines", () => {
    expect(formatRecordLine(second)).toBe(
      "38-2015-007-00000200-00000450 38-2015-007 200 450 7 kiitos paljon"
    );
    expect(parseRecordLine(formatRecordLine(second))).toEqual(second);
  });

  it("should reject lines with missing fields", () => {
    expect(() => parseRecordLine("38-2015-007-00000200-00000450 38-2015-007 200")).toThrow(
      'Invalid record line "38-2015-007-00000200-00000450 38-2015-007 200"'
    );
  });
});

describe("corpus tables", () => {
  const tables = buildCorpusTables([third, first, second], audioPaths);

  it("should sort records and group utterances by speaker", () => {
    expect(tables.records).toEqual([first, second, third]);
    expect(tables.speakerIndex).toEqual([
      { speakerId: 7, uttIds: [second.uttId] },
      { speakerId: 101, uttIds: [first.uttId, third.uttId] },
    ]);
  });

  it("should render the four tables", () => {
    expect(renderCorpusTables(tables)).toEqual({
      segments:
        "38-2015-007-00000000-00000120 38-2015-007 0.00 1.20\n" +
        "38-2015-007-00000200-00000450 38-2015-007 2.00 4.50\n" +
        "38-2015-008-00000000-00000300 38-2015-008 0.00 3.00\n",
      text:
        "38-2015-007-00000000-00000120 hyvä puhemies\n" +
        "38-2015-007-00000200-00000450 kiitos paljon\n" +
        "38-2015-008-00000000-00000300 arvoisat kollegat\n",
      audioPaths:
        "38-2015-007 corpus/2015/session-007-2015.wav\n" +
        "38-2015-008 corpus/2015/session-008-2015.wav\n",
      speakerIndex:
        "00007 38-2015-007-00000200-00000450\n" +
        "00101 38-2015-007-00000000-00000120 38-2015-008-00000000-00000300\n",
    });
  });

  it("should read rendered tables back", () => {
    expect(parseCorpusTables(renderCorpusTables(tables))).toEqual(tables);
  });

  it("should refuse tables with an utterance missing from the text table", () => {
    const rendered = renderCorpusTables(tables);
    expect(() =>
      parseCorpusTables({ ...rendered, text: "38-2015-007-00000000-00000120 hyvä puhemies\n" })
    ).toThrow(
      "Utterance 38-2015-007-00000200-00000450 is missing from the text or speaker table"
    );
  });

  it("should refuse tables that list an utterance the segment table lacks", () => {
    const rendered = renderCorpusTables(tables);
    const filtered = renderCorpusTables(retainRecords(tables, (record) => record !== second));

    expect(() => parseCorpusTables({ ...rendered, segments: filtered.segments })).toThrow(
      "Utterance 38-2015-007-00000200-00000450 is missing from the segment table"
    );
    expect(() =>
      parseCorpusTables({ ...filtered, speakerIndex: rendered.speakerIndex })
    ).toThrow("Utterance 38-2015-007-00000200-00000450 is missing from the segment table");
  });

  it("should require an audio path for every session", () => {
    expect(() => buildCorpusTables([first], new Map())).toThrow(
      "No audio path for session 38-2015-007"
    );
  });

  it("should rebuild every table from retained records", () => {
    const retained = retainRecords(tables, (record) => record.session === "38-2015-008");

    expect(retained).toEqual({
      records: [third],
      audioPaths: [{ session: "38-2015-008", path: "corpus/2015/session-008-2015.wav" }],
      speakerIndex: [{ speakerId: 101, uttIds: [third.uttId] }],
    });
  });

  it("should render empty tables as empty files", () => {
    expect(renderCorpusTables(buildCorpusTables([], audioPaths))).toEqual({
      segments: "",
      text: "",
      audioPaths: "",
      speakerIndex: "",
    });
  });
});
