import { describe, it, expect } from "vitest";
import { WebSearchService } from "../services/webSearch.service";
import { UpstreamUnavailableError } from "../utils/errors";
import { stubHttp } from "./helpers";

const settings = { apiKey: "test-key", baseUrl: "https://serpapi.test", resultCount: 3 };

describe("WebSearchService", () => {
  it("maps organic results", async () => {
    const { http, requests } = stubHttp(() => ({
      organic_results: [
        { title: "Charminar", snippet: "A monument", link: "https://example.com/c" },
        { title: "No snippet" },
      ],
    }));
    const service = new WebSearchService(settings, 1000, http);

    const results = await service.search("Charminar tips");

    expect(results).toEqual([
      { title: "Charminar", snippet: "A monument", link: "https://example.com/c" },
      { title: "No snippet", snippet: "", link: "" },
    ]);
    expect(requests[0].url).toBe("/search.json");
    expect(requests[0].params).toEqual({
      engine: "google",
      q: "Charminar tips",
      num: 3,
      api_key: "test-key",
    });
  });

  it("returns an empty list when there are no organic results", async () => {
    const { http } = stubHttp(() => ({ search_metadata: { status: "Success" } }));

    await expect(new WebSearchService(settings, 1000, http).search("q")).resolves.toEqual([]);
  });

  it("rejects malformed responses", async () => {
    const { http } = stubHttp(() => ({ organic_results: "nope" }));

    await expect(new WebSearchService(settings, 1000, http).search("q")).rejects.toBeInstanceOf(
      UpstreamUnavailableError
    );
  });

  it("wraps transport errors", async () => {
    const { http } = stubHttp(() => {
      throw new Error("ECONNRESET");
    });

    await expect(new WebSearchService(settings, 1000, http).search("q")).rejects.toThrow(
      "search service unavailable: ECONNRESET"
    );
  });

  it("is not configured without an API key", () => {
    const { http } = stubHttp(() => ({}));
    expect(new WebSearchService({ ...settings, apiKey: "" }, 1000, http).isConfigured).toBe(false);
  });
});
