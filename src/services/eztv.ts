import { z } from "zod";
import type { TorrentCandidate } from "../types";
import { FeedError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { buildEpisodeKey, detectCodec, detectResolution } from "../utils/release";

export const PAGE_LIMIT = 100;

export interface FeedClient {
  /**
   * Fetch the listings of one show, one array of candidates per page.
   * @param showId IMDB id without the tt prefix
   * @param pageCount maximum number of pages to read
   */
  fetchPages(showId: string, pageCount: number): AsyncIterable<TorrentCandidate[]>;
}

export type EztvFeedOptions = {
  urls: string[];
  timeoutMs: number;
};

const HTTP_HEADERS = {
  Accept: "application/json",
  "User-Agent": "eztv-downloader",
};

const episodeNumberSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+$/)])
  .pipe(z.coerce.number().int().nonnegative());

const torrentRecordSchema = z.object({
  filename: z.string().default(""),
  title: z.string().default(""),
  imdb_id: z.union([z.string(), z.number()]).transform(String),
  season: episodeNumberSchema,
  episode: episodeNumberSchema,
  seeds: z.coerce.number().int().nonnegative().default(0),
  magnet_url: z.string().optional(),
  torrent_url: z.string().optional(),
});

const pageSchema = z.object({
  torrents_count: z.coerce.number().int().nonnegative().optional(),
  torrents: z.array(z.unknown()).optional(),
});

type PageResult =
  | { status: "ok"; total: number | undefined; records: unknown[] }
  | { status: "not-found" };

const normaliseImdbId = (imdbId: string): string =>
  imdbId.replace(/^tt/i, "").replace(/^0+(?=\d)/, "");

/**
 * Turn one raw API record into a candidate for the requested show.
 * @param record raw record from the torrents array
 * @param showId identifier of the tracked show, used in the episode key
 * @returns the candidate, "other-show" for a listing of another show, or null when the record is unusable
 */
export const toCandidate = (
  record: unknown,
  showId: string,
): TorrentCandidate | "other-show" | null => {
  const parsed = torrentRecordSchema.safeParse(record);
  if (!parsed.success) {
    return null;
  }
  const torrent = parsed.data;
  if (normaliseImdbId(torrent.imdb_id) !== normaliseImdbId(showId)) {
    return "other-show";
  }
  const downloadUri = torrent.magnet_url || torrent.torrent_url;
  if (!downloadUri) {
    return null;
  }

  const name = torrent.filename || torrent.title;
  return {
    episodeKey: buildEpisodeKey(showId, torrent.season, torrent.episode),
    showId,
    season: torrent.season,
    episode: torrent.episode,
    codec: detectCodec(name),
    resolution: detectResolution(name),
    seeders: torrent.seeds,
    downloadUri,
    filename: torrent.filename,
    title: torrent.title,
  };
};

/**
 * Build the API URL for one page of a show's listings.
 */
export const buildEztvPageUrl = (
  baseUrl: string,
  showId: string,
  page: number,
): string => {
  const params = new URLSearchParams({
    imdb_id: showId,
    limit: String(PAGE_LIMIT),
    page: String(page),
  });
  return `${baseUrl}/get-torrents?${params.toString()}`;
};

/**
 * Create a feed client for the EZTV API.
 * Each page is requested from the mirrors in order until one answers.
 * A page is not found only when every mirror answers 404.
 */
export const createEztvFeed = ({ urls, timeoutMs }: EztvFeedOptions): FeedClient => {
  const fetchPage = async (showId: string, page: number): Promise<PageResult> => {
    const failures: string[] = [];
    let notFound = 0;

    for (const baseUrl of urls) {
      const url = buildEztvPageUrl(baseUrl, showId, page);
      try {
        const response = await fetch(url, {
          headers: HTTP_HEADERS,
          signal: AbortSignal.timeout(timeoutMs),
        });

        if (response.status === 404) {
          notFound++;
          failures.push(`${baseUrl}: HTTP 404`);
          continue;
        }
        if (!response.ok) {
          failures.push(`${baseUrl}: HTTP ${response.status}`);
          continue;
        }

        const body = pageSchema.safeParse(await response.json());
        if (!body.success) {
          failures.push(`${baseUrl}: unexpected response body`);
          continue;
        }
        return {
          status: "ok",
          total: body.data.torrents_count,
          records: body.data.torrents ?? [],
        };
      } catch (error) {
        failures.push(`${baseUrl}: ${errorMessage(error)}`);
      }
    }

    if (notFound === urls.length) {
      return { status: "not-found" };
    }
    throw new FeedError(
      `Failed to fetch page ${page} for ${showId} (${failures.join("; ")})`,
      page,
    );
  };

  async function* fetchPages(
    showId: string,
    pageCount: number,
  ): AsyncGenerator<TorrentCandidate[]> {
    for (let page = 1; page <= pageCount; page++) {
      let result: PageResult;
      try {
        result = await fetchPage(showId, page);
      } catch (error) {
        if (error instanceof FeedError) {
          logger.error(error.message);
          continue;
        }
        throw error;
      }

      if (result.status === "not-found" || result.records.length === 0) {
        return;
      }

      const candidates: TorrentCandidate[] = [];
      for (const record of result.records) {
        const candidate = toCandidate(record, showId);
        if (candidate === null) {
          logger.warn(`Skipping unusable listing on page ${page} for ${showId}`);
        } else if (candidate !== "other-show") {
          candidates.push(candidate);
        }
      }
      yield candidates;

      if (result.total !== undefined && page * PAGE_LIMIT >= result.total) {
        return;
      }
    }
  }

  return { fetchPages };
};
