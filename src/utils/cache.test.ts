import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Cache, DownloadedRecord, TrackedShow } from "../types";
import {
  addShow,
  createEmptyCache,
  deactivateShows,
  isDownloaded,
  listDownloaded,
  listShows,
  loadCache,
  markDownloaded,
  purgeShows,
  saveCache,
} from "./cache";
import { CacheError } from "./errors";

const show = (identifier: string, name: string): TrackedShow => ({
  identifier,
  name,
  url: `https://www.imdb.com/title/tt${identifier}/`,
  status: "active",
});

const record = (showId: string, season: number, episode: number): DownloadedRecord => {
  const key = `${showId}:S${String(season).padStart(2, "0")}E${String(episode).padStart(2, "0")}`;
  return {
    episodeKey: key,
    showId,
    season,
    episode,
    filename: `Show.${key}.mkv`,
    downloadUri: `magnet:?xt=urn:btih:${showId}${season}${episode}`,
    dispatchedAt: "2026-01-02T03:04:05.000Z",
  };
};

const populatedCache = (): Cache => {
  let cache = createEmptyCache();
  cache = addShow(cache, show("1111111", "First Show"));
  cache = addShow(cache, show("2222222", "Second Show"));
  cache = markDownloaded(cache, record("1111111", 1, 1));
  cache = markDownloaded(cache, record("2222222", 3, 10));
  return cache;
};

describe("cache store", () => {
  let tempDir: string;
  let cachePath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "eztv-cache-"));
    cachePath = path.join(tempDir, "nested", "downloader.json");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("loadCache", () => {
    it("should return an empty cache when the file is absent", async () => {
      const cache = await loadCache(cachePath);

      expect(cache).toEqual({ shows: {}, downloaded: {} });
      expect(fs.existsSync(cachePath)).toBe(false);
    });

    it("should reject a file that is not JSON", async () => {
      fs.mkdirSync(path.dirname(cachePath), { recursive: true });
      fs.writeFileSync(cachePath, "{ not json");

      await expect(loadCache(cachePath)).rejects.toBeInstanceOf(CacheError);
    });

    it("should reject JSON with the wrong shape", async () => {
      fs.mkdirSync(path.dirname(cachePath), { recursive: true });
      fs.writeFileSync(cachePath, JSON.stringify({ shows: { "1": { name: "x" } }, downloaded: {} }));

      await expect(loadCache(cachePath)).rejects.toThrow(
        /unexpected shape at shows\.1\.identifier/,
      );
    });

    it("should reject a path that cannot be read as a file", async () => {
      fs.mkdirSync(cachePath, { recursive: true });

      await expect(loadCache(cachePath)).rejects.toBeInstanceOf(CacheError);
    });
  });

  describe("saveCache", () => {
    it("should round-trip an empty cache", async () => {
      await saveCache(cachePath, createEmptyCache());

      expect(await loadCache(cachePath)).toEqual(createEmptyCache());
    });

    it("should round-trip shows and downloaded episodes", async () => {
      const cache = populatedCache();

      await saveCache(cachePath, cache);

      expect(await loadCache(cachePath)).toEqual(cache);
    });

    it("should replace the previous contents and leave no temp file", async () => {
      await saveCache(cachePath, populatedCache());
      await saveCache(cachePath, createEmptyCache());

      expect(await loadCache(cachePath)).toEqual(createEmptyCache());
      expect(fs.readdirSync(path.dirname(cachePath))).toEqual(["downloader.json"]);
    });

    it("should keep the previous contents when the write fails", async () => {
      const previous = populatedCache();
      await saveCache(cachePath, previous);
      const renameSpy = vi
        .spyOn(fs.promises, "rename")
        .mockRejectedValueOnce(new Error("no space left on device"));

      await expect(saveCache(cachePath, createEmptyCache())).rejects.toThrow(
        "no space left on device",
      );
      renameSpy.mockRestore();

      expect(await loadCache(cachePath)).toEqual(previous);
      expect(fs.readdirSync(path.dirname(cachePath))).toEqual(["downloader.json"]);
    });
  });

  describe("markDownloaded", () => {
    it("should keep a single entry when marking twice", () => {
      const first = record("1111111", 1, 2);
      const again = { ...first, dispatchedAt: "2026-05-05T00:00:00.000Z" };

      const once = markDownloaded(createEmptyCache(), first);
      const twice = markDownloaded(once, again);

      expect(twice).toBe(once);
      expect(Object.keys(twice.downloaded)).toEqual(["1111111:S01E02"]);
      expect(twice.downloaded["1111111:S01E02"]).toEqual(first);
    });

    it("should not modify the cache it is given", () => {
      const cache = createEmptyCache();

      markDownloaded(cache, record("1111111", 1, 2));

      expect(cache.downloaded).toEqual({});
    });
  });

  describe("isDownloaded", () => {
    it("should report recorded episodes only", () => {
      const cache = populatedCache();

      expect(isDownloaded(cache, "1111111:S01E01")).toBe(true);
      expect(isDownloaded(cache, "1111111:S01E02")).toBe(false);
      expect(isDownloaded(cache, "toString")).toBe(false);
    });
  });

  describe("addShow", () => {
    it("should overwrite metadata without touching downloaded episodes", () => {
      const cache = populatedCache();

      const updated = addShow(cache, { ...show("1111111", "Renamed Show"), status: "inactive" });

      expect(updated.shows["1111111"]?.name).toBe("Renamed Show");
      expect(updated.shows["1111111"]?.status).toBe("inactive");
      expect(updated.downloaded).toEqual(cache.downloaded);
    });
  });

  describe("listShows", () => {
    it("should sort shows by identifier", () => {
      let cache = addShow(createEmptyCache(), show("3000000", "C"));
      cache = addShow(cache, show("1000000", "A"));

      expect(listShows(cache).map((entry) => entry.identifier)).toEqual(["1000000", "3000000"]);
    });
  });

  describe("deactivateShows", () => {
    it("should mark known shows inactive and ignore unknown ids", () => {
      const cache = deactivateShows(populatedCache(), ["2222222", "9999999"]);

      expect(cache.shows["2222222"]?.status).toBe("inactive");
      expect(cache.shows["1111111"]?.status).toBe("active");
      expect(cache.shows["9999999"]).toBeUndefined();
    });
  });

  describe("purgeShows", () => {
    it("should remove shows and keep their downloaded records", () => {
      const cache = purgeShows(populatedCache(), ["1111111"]);

      expect(Object.keys(cache.shows)).toEqual(["2222222"]);
      expect(isDownloaded(cache, "1111111:S01E01")).toBe(true);
    });
  });

  describe("listDownloaded", () => {
    it("should list every record sorted by key", () => {
      expect(listDownloaded(populatedCache()).map((entry) => entry.episodeKey)).toEqual([
        "1111111:S01E01",
        "2222222:S03E10",
      ]);
    });

    it("should filter by show, including orphaned records", () => {
      const cache = purgeShows(populatedCache(), ["2222222"]);

      expect(listDownloaded(cache, "2222222").map((entry) => entry.episodeKey)).toEqual([
        "2222222:S03E10",
      ]);
    });
  });
});
