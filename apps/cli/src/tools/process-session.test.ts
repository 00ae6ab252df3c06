import fs from "fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createSpeakerLookup } from "@plenary-corpus/core";
import { loadConfig } from "../config";
import { SessionInputError } from "../errors";
import { processSession, sessionOutputFiles } from "./process-session";

const transcript = {
  number: 7,
  year: 2015,
  subsections: [
    {
      number: "1",
      statements: [
        {
          firstname: "Anna",
          lastname: "Virtanen",
          language: "fi",
          text: "Hyvä puhemies, arvoisat kollegat.",
        },
        {
          firstname: "Pekka",
          lastname: "Korhonen",
          language: "sv",
          text: "Jag tror att det är bra.",
        },
        {
          firstname: "Matti",
          lastname: "Tuntematon",
          language: "fi",
          text: "Kiitos paljon tästä keskustelusta.",
        },
      ],
    },
  ],
};

const decoded = {
  segments: [
    { start: 0, end: 150, hypothesis: "hyvä puhemies arvoisat kollegat" },
    { start: 150, end: 400, hypothesis: "jag tror att det är bra" },
    { start: 400, end: 600, hypothesis: "kiitos paljon tästä keskustelua" },
    { start: 600, end: 610, hypothesis: "hyvä puhemies" },
    { start: 0, end: 150, hypothesis: "hyvä puhemies arvoisat kollegat" },
  ],
};

const speakers = createSpeakerLookup([
  { id: 101, names: ["Anna Virtanen"] },
  { id: 102, names: ["Pekka Korhonen"] },
]);

describe("processSession", () => {
  let dir: string;
  let config: ReturnType<typeof loadConfig>;
  const classifier = { classify: vi.fn(async () => ({ label: "fi", confidence: 1 })) };

  const read = (file: string) => fs.readFile(file, "utf8");

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});

    dir = await fs.mkdtemp(path.join(os.tmpdir(), "plenary-session-"));
    config = loadConfig({
      CORPUS_ROOT: path.join(dir, "corpus"),
      DECODER_PATH_TEMPLATE: path.join(dir, "decoded", "session-{number}-{year}.json"),
      SESSION_OUTPUT_DIR: path.join(dir, "sessions"),
    });

    await fs.mkdir(path.join(dir, "corpus", "2015"), { recursive: true });
    await fs.mkdir(path.join(dir, "decoded"), { recursive: true });
    await fs.writeFile(
      path.join(dir, "corpus", "2015", "session-007-2015.json"),
      JSON.stringify(transcript)
    );
    await fs.writeFile(
      path.join(dir, "decoded", "session-007-2015.json"),
      JSON.stringify(decoded)
    );
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should label every candidate and write the session outputs", async () => {
    const report = await processSession("38-2015-007", { config, speakers, classifier });
    const files = sessionOutputFiles(config.paths.sessionOutputDir, "38-2015-007");

    expect(report).toEqual({
      session: "38-2015-007",
      turns: 3,
      unresolvedTurns: 1,
      detectedLanguages: 0,
      transcriptIssues: 0,
      candidates: 5,
      counts: { kept: 1, dropped: 3, queued: 1, unresolved: 1 },
      dropReasons: { "duplicate-boundary": 1, language: 1, duration: 1 },
      durations: { candidates: 760, kept: 150, dropped: 410, queued: 200 },
    });

    expect(await read(files.records)).toBe(
      "38-2015-007-00000000-00000150 38-2015-007 0 150 101 hyvä puhemies arvoisat kollegat\n"
    );
    expect(await read(files.retry)).toBe("38-2015-007 4.00 6.00\n");
    expect(await read(files.dropped)).toBe(
      "38-2015-007 0.00 1.50 duplicate-boundary hyvä puhemies arvoisat kollegat\n" +
        "38-2015-007 1.50 4.00 language jag tror att det är bra\n" +
        "38-2015-007 6.00 6.10 duration hyvä puhemies\n"
    );
    expect((await read(files.words)).split("\n")).toEqual([
      "arvoisat",
      "hyvä",
      "keskustelusta",
      "kiitos",
      "kollegat",
      "paljon",
      "puhemies",
      "tästä",
      "",
    ]);
    expect(JSON.parse(await read(files.report))).toEqual(report);
    expect(classifier.classify).not.toHaveBeenCalled();
  });

  it("should only label candidates from the retry list on a retry pass", async () => {
    const report = await processSession("38-2015-007", {
      config,
      speakers,
      classifier,
      retry: [{ session: "38-2015-007", start: 400, end: 600 }],
    });
    const files = sessionOutputFiles(config.paths.sessionOutputDir, "38-2015-007", true);

    expect(report.candidates).toBe(1);
    expect(report.counts).toEqual({ kept: 0, dropped: 0, queued: 1, unresolved: 1 });
    expect(files.records).toBe(
      path.join(config.paths.sessionOutputDir, "38-2015-007.retry-pass.records")
    );
    expect(await read(files.retry)).toBe("38-2015-007 4.00 6.00\n");
  });

  it("should fail the session when an input is missing", async () => {
    await fs.rm(path.join(dir, "decoded", "session-007-2015.json"));

    const error = await processSession("38-2015-007", { config, speakers, classifier }).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(SessionInputError);
    expect(error).toMatchObject({
      session: "38-2015-007",
      reason: `decoder output not found: ${path.join(dir, "decoded", "session-007-2015.json")}`,
    });
  });

  it("should reject malformed session keys", async () => {
    await expect(
      processSession("2015-007", { config, speakers, classifier })
    ).rejects.toBeInstanceOf(SessionInputError);
  });

  it("should refuse a transcript of another session", async () => {
    await fs.writeFile(
      path.join(dir, "corpus", "2015", "session-007-2015.json"),
      JSON.stringify({ ...transcript, number: 8 })
    );

    await expect(processSession("38-2015-007", { config, speakers, classifier })).rejects.toThrow(
      "belongs to session 38-2015-008"
    );
  });
});
