import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { getAppConfig } from "../config";
import type { AppConfig } from "../types";
import { fetchShowMetadata, normaliseShowId } from "./imdb";

vi.mock("../config", () => ({
  getAppConfig: vi.fn(),
}));

const titlePage = (head: string) =>
  new Response(`<html><head>${head}</head><body><h1>ignored</h1></body></html>`, {
    status: 200,
    headers: { "Content-Type": "text/html" },
  });

describe("imdb service", () => {
  const fetchMock = vi.fn<typeof fetch>();
  const mockConfig: AppConfig = {
    eztvUrls: ["https://eztv.test/api"],
    imdbUrl: "https://imdb.test",
    cachePath: "/tmp/downloader.json",
    transmission: { host: "localhost", port: 9091, user: "", password: "" },
    pageCount: 20,
    requestTimeoutMs: 1000,
    preference: { codecs: ["HEVC", "H264"], resolutions: ["1080p", "720p"] },
    smtp: { host: "smtp.test.com", port: 587, secure: false, user: "", password: "" },
    reportEmail: "",
    fromEmail: "",
  };

  beforeEach(() => {
    vi.clearAllMocks();
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    vi.mocked(getAppConfig).mockReturnValue(mockConfig);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("normaliseShowId", () => {
    it("should strip the tt prefix and surrounding space", () => {
      expect(normaliseShowId(" tt0944947 ")).toBe("0944947");
      expect(normaliseShowId("TT0944947")).toBe("0944947");
    });

    it("should keep bare numeric ids", () => {
      expect(normaliseShowId("6048596")).toBe("6048596");
    });

    it("should reject anything else", () => {
      expect(normaliseShowId("Game of Thrones")).toBeNull();
      expect(normaliseShowId("nm0000123")).toBeNull();
    });
  });

  describe("fetchShowMetadata", () => {
    it("should read the title and canonical URL from open graph tags", async () => {
      fetchMock.mockResolvedValueOnce(
        titlePage(
          '<title>Game of Thrones (TV Series 2011-2019) - IMDb</title>' +
            '<meta property="og:title" content=" Game of Thrones (TV Series 2011-2019) ">' +
            '<meta property="og:url" content="https://www.imdb.test/title/tt0944947/">',
        ),
      );

      const metadata = await fetchShowMetadata("0944947");

      expect(metadata).toEqual({
        title: "Game of Thrones (TV Series 2011-2019)",
        url: "https://www.imdb.test/title/tt0944947/",
      });
      expect(fetchMock.mock.calls[0]?.[0]).toBe("https://imdb.test/title/tt0944947/");
      expect(fetchMock.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal);
    });

    it("should fall back to the document title and the page URL", async () => {
      fetchMock.mockResolvedValueOnce(titlePage("<title>Some Show - IMDb</title>"));

      const metadata = await fetchShowMetadata("1234567");

      expect(metadata).toEqual({
        title: "Some Show - IMDb",
        url: "https://imdb.test/title/tt1234567/",
      });
    });

    it("should use the id when the page has no title at all", async () => {
      fetchMock.mockResolvedValueOnce(titlePage(""));

      const metadata = await fetchShowMetadata("1234567");

      expect(metadata?.title).toBe("tt1234567");
    });

    it("should give up when IMDB does not answer in time", async () => {
      fetchMock.mockRejectedValueOnce(new DOMException("The operation was aborted due to timeout", "TimeoutError"));

      await expect(fetchShowMetadata("1234567")).rejects.toThrow("The operation was aborted due to timeout");
    });

    it("should return null for an unknown title", async () => {
      fetchMock.mockResolvedValueOnce(new Response("Not Found", { status: 404 }));

      expect(await fetchShowMetadata("9999999")).toBeNull();
    });

    it("should throw on any other HTTP error", async () => {
      fetchMock.mockResolvedValueOnce(new Response("Unavailable", { status: 503 }));

      await expect(fetchShowMetadata("1234567")).rejects.toThrow(
        "IMDB answered HTTP 503 for https://imdb.test/title/tt1234567/",
      );
    });
  });
});
