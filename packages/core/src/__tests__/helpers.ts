import { ContextActionRouter, type RouterConfig } from "../agent/router.js";
import type { SearchResponse, SearchService } from "../search/types.js";
import { MemoryCustomerStore } from "../store/memoryStore.js";
import type { Customer } from "../store/types.js";

export const ada: Customer = { email: "ada@example.com", firstName: "Ada", lastName: "Lovelace", cart: [] };

export function ibmHit(name: string, pid: string, score?: number) {
  return {
    score,
    text: `Product: ${name} Category: Misc`,
    html: `<a href="/ProductDetail.aspx?pid=${pid}"><a class="jqzoom" href="http://img.example.com/${pid}.jpg">`,
  };
}

export function fakeSearch(response: SearchResponse): SearchService {
  return { query: async () => response };
}

export const routerConfig: RouterConfig = {
  dataSource: "ibm_store",
  queryCount: 10,
  keepCount: 5,
  minScore: 0,
};

export function makeRouter(opts: { store?: MemoryCustomerStore; search?: SearchService | null } = {}) {
  const store = opts.store ?? new MemoryCustomerStore();
  const router = new ContextActionRouter({
    store,
    search: opts.search === undefined ? fakeSearch({ results: [] }) : opts.search,
    config: routerConfig,
  });
  return { store, router };
}
