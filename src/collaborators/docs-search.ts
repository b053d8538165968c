/**
 * HTTP client for the remote documentation / FAQ retrieval service.
 *
 * Ranking happens on the service; this client only shapes the request and
 * validates the response:
 *
 *   POST <baseUrl>/search  {"query": "...", "k": 5}
 *   200 {"results": [{"text": "...", "score": 0.82}, ...]}
 */

import { z } from "zod";
import { CollaboratorError } from "./errors.js";
import type { DocumentationSearch, SearchHit } from "./types.js";

const SearchResponseSchema = z.object({
  results: z.array(
    z
      .object({
        text: z.string(),
        score: z.number().optional(),
      })
      .passthrough(),
  ),
});

export interface HttpDocumentationSearchOptions {
  baseUrl: string;
  token?: string;
  /** Injected for tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch;
}

export class HttpDocumentationSearch implements DocumentationSearch {
  private readonly endpoint: string;
  private readonly token: string | undefined;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpDocumentationSearchOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}/search`;
    this.token = options.token;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search(query: string, k: number, signal?: AbortSignal): Promise<SearchHit[]> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "User-Agent": "workflow-gate/0.1",
    };
    if (this.token) {
      headers["Authorization"] = `Bearer ${this.token}`;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers,
        body: JSON.stringify({ query, k }),
        signal,
      });
    } catch (err: unknown) {
      throw new CollaboratorError(
        `Documentation search unreachable: ${err instanceof Error ? err.message : String(err)}`,
        "docs_search",
        "connectivity",
        { endpoint: this.endpoint },
      );
    }

    if (!response.ok) {
      throw new CollaboratorError(
        `Documentation search returned HTTP ${response.status}`,
        "docs_search",
        "query",
        { endpoint: this.endpoint, status: response.status },
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new CollaboratorError(
        "Documentation search returned a non-JSON body",
        "docs_search",
        "invalid_response",
        { endpoint: this.endpoint },
      );
    }

    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CollaboratorError(
        "Documentation search returned an unexpected response shape",
        "docs_search",
        "invalid_response",
        { endpoint: this.endpoint, issues: parsed.error.issues },
      );
    }

    return parsed.data.results
      .slice(0, k)
      .map((r) => ({ snippet: r.text, score: r.score ?? 0 }));
  }
}

/** Stand-in used when no search service is configured. */
export class UnconfiguredDocumentationSearch implements DocumentationSearch {
  async search(): Promise<SearchHit[]> {
    throw new CollaboratorError(
      "Documentation search is not configured (set GATE_DOCS_SEARCH_URL)",
      "docs_search",
      "unavailable",
    );
  }
}
