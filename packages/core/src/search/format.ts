// packages/core/src/search/format.ts
import { extractResultFields } from "./extract.js";
import type { DataSource, FormattedResult, RawSearchResult, SearchResponse } from "./types.js";

export const DEFAULT_KEEP_COUNT = 5;

export type FormatOptions = {
  dataSource: DataSource;
  /** Results must score strictly above this. 0 disables the filter. */
  minScore?: number;
  keepCount?: number;
};

export type FormattedSearch = {
  results: FormattedResult[];
  text: string;
  /** How many hits survived the score filter, before truncation. */
  matching: number;
};

export function filterByScore(results: RawSearchResult[], minScore: number): RawSearchResult[] {
  if (!(minScore > 0)) return results;
  return results.filter((r) => typeof r.score === "number" && r.score > minScore);
}

export function renderResults(results: FormattedResult[]): string {
  return results.map((r) => `\n${r.ordinal}) ${r.name}\n${r.imageUrl}`).join("");
}

export function formatSearchResults(response: SearchResponse | null | undefined, opts: FormatOptions): FormattedSearch {
  const raw = response?.results ?? [];
  if (raw.length === 0) return { results: [], text: "", matching: 0 };

  const kept = filterByScore(raw, opts.minScore ?? 0);
  const keepCount = opts.keepCount ?? DEFAULT_KEEP_COUNT;

  const results = kept.slice(0, keepCount).map((entry, i): FormattedResult => ({
    ordinal: i + 1,
    ...extractResultFields(entry, opts.dataSource),
  }));

  return { results, text: renderResults(results), matching: kept.length };
}
