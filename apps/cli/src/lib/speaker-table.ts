import { z } from "zod";
import {
  createSpeakerLookup,
  type SpeakerEntry,
  type SpeakerLookup,
} from "@plenary-corpus/core";
import { readJSON } from "../utils/file";

const speakerId = z.coerce.number().int().positive();

// Either `{ "Anna Virtanen": 101 }` or `[{ "id": 101, "names": [...] }]`
const speakerTableSchema = z.union([
  z.array(
    z.object({
      id: speakerId,
      names: z.array(z.string()).min(1),
    })
  ),
  z.record(z.string(), speakerId),
]);

export type SpeakerTable = z.infer<typeof speakerTableSchema>;

export function toSpeakerEntries(table: SpeakerTable): SpeakerEntry[] {
  if (Array.isArray(table)) {
    return table;
  }

  const namesById = new Map<number, string[]>();
  for (const [name, id] of Object.entries(table)) {
    const names = namesById.get(id) ?? [];
    names.push(name);
    namesById.set(id, names);
  }
  return [...namesById.entries()].map(([id, names]) => ({ id, names }));
}

export async function loadSpeakerLookup(filePath: string): Promise<SpeakerLookup> {
  const table = await readJSON(filePath, speakerTableSchema);
  if (!table) {
    throw new Error(`Speaker table not found: ${filePath}`);
  }
  return createSpeakerLookup(toSpeakerEntries(table));
}
