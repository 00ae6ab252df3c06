import { readLines } from "../utils/file";

/** One word per line; `#` starts a comment. */
export async function loadStoplist(filePath: string): Promise<Set<string>> {
  const lines = await readLines(filePath);
  if (!lines) {
    throw new Error(`Stoplist not found: ${filePath}`);
  }
  return new Set(
    lines
      .map((line) => line.replace(/#.*$/, "").trim().toLowerCase())
      .filter(Boolean)
  );
}
