import fs from "fs/promises";
import path from "node:path";
import type { z } from "zod";

export const fileExists = async (filePath: string) => {
  return fs
    .access(filePath)
    .then(() => true)
    .catch(() => false);
};

export const readText = async (filePath: string) => {
  if (!(await fileExists(filePath))) {
    return null;
  }
  return fs.readFile(filePath, "utf8");
};

export const readJSON = async <S extends z.ZodTypeAny>(
  filePath: string,
  schema: S
): Promise<z.infer<S> | null> => {
  const content = await readText(filePath);
  if (content === null) {
    return null;
  }
  return schema.parse(JSON.parse(content));
};

export const readLines = async (filePath: string) => {
  const content = await readText(filePath);
  if (content === null) {
    return null;
  }
  return content.split("\n").filter((line) => line.trim().length > 0);
};

/** Write through a temporary file so readers never see a partial file. */
export const writeText = async (filePath: string, content: string) => {
  // Ensure directory exists
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tempPath, content);
  await fs.rename(tempPath, filePath);
};

export const writeLines = async (filePath: string, lines: string[]) =>
  writeText(filePath, lines.length ? `${lines.join("\n")}\n` : "");

export const writeJSON = async <T>(filePath: string, data: T) =>
  writeText(filePath, `${JSON.stringify(data, null, 2)}\n`);

/** Files in `dir` ending with `extension`, sorted by name. Missing dir is empty. */
export const listFiles = async (dir: string, extension: string) => {
  if (!(await fileExists(dir))) {
    return [];
  }
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(extension))
    .map((entry) => path.join(dir, entry.name))
    .sort();
};
