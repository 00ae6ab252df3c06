import fs from "fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { loadConfig } from "../config";
import { buildVocabulary } from "./vocabulary";

describe("buildVocabulary", () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "plenary-vocabulary-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should merge session word lists without stoplist words", async () => {
    const sessions = path.join(dir, "sessions");
    await fs.mkdir(sessions);
    await fs.writeFile(path.join(sessions, "38-2015-007.words"), "talo\nauto\n");
    await fs.writeFile(path.join(sessions, "38-2015-008.words"), "auto\noch\näiti\n");
    await fs.writeFile(path.join(dir, "stoplist.txt"), "och\n");

    const config = loadConfig({
      SESSION_OUTPUT_DIR: sessions,
      CORPUS_OUTPUT_DIR: path.join(dir, "corpus"),
      MINORITY_STOPLIST: path.join(dir, "stoplist.txt"),
    });

    await expect(buildVocabulary(config)).resolves.toEqual(["auto", "talo", "äiti"]);
    expect(await fs.readFile(path.join(dir, "corpus", "vocabulary.txt"), "utf8")).toBe(
      "auto\ntalo\näiti\n"
    );
  });
});
