// packages/core/src/search/types.ts
import type { z } from "zod";
import type { DataSourceSchema } from "../env.js";

export type DataSource = z.infer<typeof DataSourceSchema>;

/**
 * One semi-structured search hit. Which fields carry the product data
 * depends on the data source the collection was built from.
 */
export type RawSearchResult = {
  score?: number;
  text?: string;
  html?: string;
  extracted_metadata?: { title?: string; [key: string]: unknown };
  [key: string]: unknown;
};

export type SearchResponse = {
  matching_results?: number;
  results?: RawSearchResult[];
};

export interface SearchService {
  query(text: string, count: number): Promise<SearchResponse>;
}

export type FormattedResult = {
  /** 1-based position in the list shown to the user. */
  ordinal: number;
  name: string;
  url: string;
  imageUrl: string;
};
