// packages/core/src/search/extract.ts
import type { DataSource, RawSearchResult } from "./types.js";

export type ResultFields = {
  name: string;
  url: string;
  imageUrl: string;
};

/**
 * Pulls display fields out of one raw search hit. Every collection stores its
 * products differently, so each data source gets its own strategy.
 * A missing marker yields "", never an error.
 */
export type ExtractionStrategy = {
  name(entry: RawSearchResult): string;
  url(entry: RawSearchResult): string;
  imageUrl(entry: RawSearchResult): string;
};

const IBM_STORE_HOST = "http://www.logostore-globalid.us";
const IBM_STORE_DETAIL_PATH = "/ProductDetail.aspx?pid=";
const IBM_STORE_PID_LENGTH = 6;

function amazonUrl(entry: RawSearchResult): string {
  const html = entry.html ?? "";
  // The product link is the last anchor in the page.
  const tag = "<a href=";
  const start = html.lastIndexOf(tag);
  if (start === -1) return "";

  const from = start + tag.length;
  const end = html.indexOf(">", from);
  if (end === -1) return "";

  // drop the quotes around the href value
  return html.slice(from + 1, end - 1);
}

const amazon: ExtractionStrategy = {
  // Discovery enrichment stores the page title in its extracted metadata.
  name: (entry) => entry.extracted_metadata?.title ?? "",
  url: amazonUrl,
  // No separate picture in this collection; the product link is shown instead.
  imageUrl: amazonUrl,
};

const ibmStore: ExtractionStrategy = {
  name(entry) {
    // Page text reads "... Product: <name> Category: ..."
    const text = entry.text ?? "";
    const productTag = "Product:";
    const start = text.indexOf(productTag);
    if (start === -1) return "";

    const from = start + productTag.length;
    const end = text.indexOf("Category:", from);
    if (end === -1) return "";

    // the character before "Category:" is a separator
    return text.slice(from, end - 1).trim();
  },

  url(entry) {
    const html = entry.html ?? "";
    const start = html.indexOf(IBM_STORE_DETAIL_PATH);
    if (start === -1) return "";

    const from = start + IBM_STORE_DETAIL_PATH.length;
    const productId = html.slice(from, from + IBM_STORE_PID_LENGTH);
    return IBM_STORE_HOST + IBM_STORE_DETAIL_PATH + productId;
  },

  imageUrl(entry) {
    const html = entry.html ?? "";
    const tag = '<a class="jqzoom" href="';
    const start = html.indexOf(tag);
    if (start === -1) return "";

    const from = start + tag.length;
    const end = html.indexOf('"', from);
    if (end === -1) return "";

    // ask the image server for a smaller rendition
    return html.slice(from, end).replace(/scale\[[0-9]+\]/g, "scale[50]");
  },
};

export const extractionStrategies: Record<DataSource, ExtractionStrategy> = {
  amazon,
  ibm_store: ibmStore,
};

/**
 * Escapes the characters chat clients treat as markup.
 * `&` goes first so the entities added afterwards are not escaped twice.
 */
export function sanitizeForChat(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function extractResultFields(entry: RawSearchResult, source: DataSource): ResultFields {
  const strategy = extractionStrategies[source];
  return {
    name: sanitizeForChat(strategy.name(entry)),
    url: sanitizeForChat(strategy.url(entry)),
    imageUrl: sanitizeForChat(strategy.imageUrl(entry)),
  };
}
