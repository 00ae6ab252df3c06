import { measureStopwordDensity } from "../language/stopword-density";
import { CorpusRecord, CorpusTables } from "../types/corpus";
import { retainRecords } from "./tables";

export interface LanguageFilterOptions {
  stoplist: ReadonlySet<string>;
  minDensity: number;
  minHits: number;
}

export const DEFAULT_LANGUAGE_FILTER_OPTIONS = {
  minDensity: 0.1,
  minHits: 1,
};

export interface LanguageFilterResult {
  tables: CorpusTables;
  removed: CorpusRecord[];
}

export function isMinorityText(
  text: string,
  options: LanguageFilterOptions
): boolean {
  const { hits, density } = measureStopwordDensity(text, options.stoplist);
  return hits >= options.minHits && density >= options.minDensity;
}

/**
 * Drop records that read as the minority language. The tables are rebuilt
 * from the survivors, so a removed utterance disappears from all of them.
 * Minority-language quotations inside majority speech also trip the filter.
 */
export function filterMinorityLanguage(
  tables: CorpusTables,
  options: LanguageFilterOptions
): LanguageFilterResult {
  const removed = tables.records.filter((record) => isMinorityText(record.text, options));
  const removedIds = new Set(removed.map((record) => record.uttId));
  return {
    tables: retainRecords(tables, (record) => !removedIds.has(record.uttId)),
    removed,
  };
}
