// packages/integrations-discovery/src/client.ts
import { z } from "zod";

import type { DiscoverySettings } from "../../core/src/env.js";
import { moduleLogger } from "../../core/src/logger.js";
import type { RawSearchResult, SearchResponse, SearchService } from "../../core/src/search/types.js";

const log = moduleLogger("discovery");

function redact(s?: string) {
  if (!s) return "(none)";
  return `${s.slice(0, 3)}***${s.slice(-3)}`;
}

const DiscoveryResultSchema = z
  .object({
    score: z.number().optional(),
    text: z.string().optional(),
    html: z.string().optional(),
    extracted_metadata: z.object({ title: z.string().optional() }).passthrough().optional(),
    result_metadata: z.object({ score: z.number().optional() }).passthrough().optional(),
  })
  .passthrough();

const DiscoveryResponseSchema = z
  .object({
    matching_results: z.number().optional(),
    results: z.array(DiscoveryResultSchema).optional(),
  })
  .passthrough();

type DiscoveryResult = z.infer<typeof DiscoveryResultSchema>;

function toRawResult(r: DiscoveryResult): RawSearchResult {
  // newer API versions only report the score under result_metadata
  const score = r.score ?? r.result_metadata?.score;
  return score === undefined ? { ...r } : { ...r, score };
}

export function queryUrl(opts: DiscoverySettings, text: string, count: number): string {
  const base = opts.url.replace(/\/+$/, "");
  const u = new URL(
    `${base}/v1/environments/${encodeURIComponent(opts.environmentId)}/collections/${encodeURIComponent(opts.collectionId)}/query`,
  );
  u.searchParams.set("version", opts.version);
  u.searchParams.set("query", text);
  u.searchParams.set("count", String(count));
  return u.toString();
}

export function createDiscoveryClient(opts: DiscoverySettings & { debug?: boolean }): SearchService {
  const authorization = `Basic ${Buffer.from(`apikey:${opts.apiKey}`).toString("base64")}`;

  if (opts.debug) {
    log.debug({ url: opts.url, key: redact(opts.apiKey) }, "discovery client configured");
  }

  return {
    async query(text: string, count: number): Promise<SearchResponse> {
      const res = await fetch(queryUrl(opts, text, count), {
        method: "GET",
        headers: { accept: "application/json", authorization },
      });

      const body = await res.text();
      if (!res.ok) {
        throw new Error(`Discovery HTTP ${res.status}: ${body.slice(0, 400)}`);
      }

      let json: unknown;
      try {
        json = JSON.parse(body);
      } catch {
        throw new Error(`Discovery non-JSON response: ${body.slice(0, 400)}`);
      }

      const parsed = DiscoveryResponseSchema.parse(json);
      return {
        matching_results: parsed.matching_results,
        results: parsed.results?.map(toRawResult),
      };
    },
  };
}
