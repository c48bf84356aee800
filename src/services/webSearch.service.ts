import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { UpstreamService } from "../common/common-enum";
import type { AppConfig } from "../configs/environment";
import { UpstreamUnavailableError } from "../utils/errors";
import { logger } from "../utils/logger";

export interface SearchResult {
  title: string;
  snippet: string;
  link: string;
}

export interface SearchProvider {
  readonly isConfigured: boolean;
  search(query: string): Promise<SearchResult[]>;
}

const serpResponseSchema = z.object({
  organic_results: z
    .array(
      z.object({
        title: z.string().optional(),
        snippet: z.string().optional(),
        link: z.string().optional(),
      })
    )
    .optional(),
});

/**
 * Google results through SerpAPI. Failures and malformed bodies are raised
 * as UpstreamUnavailableError; an answer without organic results is an
 * empty list.
 */
export class WebSearchService implements SearchProvider {
  private http: AxiosInstance;

  constructor(
    private settings: AppConfig["search"],
    timeoutMs: number,
    http?: AxiosInstance
  ) {
    this.http = http ?? axios.create({ baseURL: settings.baseUrl, timeout: timeoutMs });

    if (!this.isConfigured) {
      logger.warn("SERPAPI_KEY not found. Steps will not be enriched.");
    }
  }

  get isConfigured(): boolean {
    return this.settings.apiKey.length > 0;
  }

  async search(query: string): Promise<SearchResult[]> {
    let data: unknown;
    try {
      const response = await this.http.get("/search.json", {
        params: {
          engine: "google",
          q: query,
          num: this.settings.resultCount,
          api_key: this.settings.apiKey,
        },
      });
      data = response.data;
    } catch (error) {
      throw new UpstreamUnavailableError(UpstreamService.SEARCH, error);
    }

    const parsed = serpResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamUnavailableError(UpstreamService.SEARCH, "malformed response");
    }

    return (parsed.data.organic_results ?? []).map((result) => ({
      title: result.title ?? "",
      snippet: result.snippet ?? "",
      link: result.link ?? "",
    }));
  }
}
