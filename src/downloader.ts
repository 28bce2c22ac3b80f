import type { FeedClient } from "./services/eztv";
import { runDownloadPass, type DownloadPassResult } from "./services/download";
import { fetchShowMetadata, normaliseShowId } from "./services/imdb";
import type { Dispatcher } from "./services/transmission";
import type { Cache, ReleasePreference } from "./types";
import {
  addShow,
  deactivateShows,
  listDownloaded,
  listShows,
  loadCache,
  purgeShows,
  saveCache,
} from "./utils/cache";
import { errorMessage } from "./utils/errors";
import { logger } from "./utils/logger";

export type RunOptions = {
  cachePath: string;
  feed: FeedClient;
  dispatcher: Dispatcher;
  pageCount: number;
  only?: string[];
  noSave: boolean;
  preference?: ReleasePreference;
  progress?: boolean;
};

/**
 * One fetch/dispatch run: load the cache, check the daemon, run the pass, persist.
 * Nothing is written when the run aborts or when `noSave` is set.
 */
export const runDownloader = async ({
  cachePath,
  feed,
  dispatcher,
  pageCount,
  only,
  noSave,
  preference,
  progress,
}: RunOptions): Promise<DownloadPassResult> => {
  const cache = await loadCache(cachePath);
  const version = await dispatcher.connect();
  logger.info(`Connected to Transmission ${version}`);

  const result = await runDownloadPass({
    cache,
    feed,
    dispatcher,
    pageCount,
    only,
    preference,
    progress,
  });

  if (noSave) {
    logger.info("Cache not saved (--nosave).");
  } else if (result.cache !== cache) {
    await saveCache(cachePath, result.cache);
  }
  return result;
};

/**
 * Track new shows by IMDB id, looking up their title on IMDB.
 * Ids already tracked are skipped unless `refresh` is set, which re-reads their metadata.
 * @returns the number of shows added or refreshed
 */
export const addShows = async (
  cachePath: string,
  inputs: string[],
  refresh = false,
): Promise<number> => {
  let cache: Cache = await loadCache(cachePath);
  let changed = 0;

  for (const input of inputs) {
    const identifier = normaliseShowId(input);
    if (identifier === null) {
      logger.warn(`Skipping ${input} - not an IMDB id`);
      continue;
    }
    const existing = cache.shows[identifier];
    if (existing && !refresh) {
      logger.info(`Skipping ${identifier.padEnd(9)} - already in cache: ${existing.name}`);
      continue;
    }

    try {
      const metadata = await fetchShowMetadata(identifier);
      if (metadata === null) {
        logger.warn(`Skipping ${identifier.padEnd(9)} - not found in IMDB`);
        continue;
      }
      cache = addShow(cache, {
        identifier,
        name: metadata.title,
        url: metadata.url,
        status: existing?.status ?? "active",
      });
      changed++;
      logger.info(`${existing ? "Refreshed" : "Adding"} ${identifier.padEnd(9)} - ${metadata.title}`);
    } catch (error) {
      logger.error(`Skipping ${identifier.padEnd(9)} - IMDB lookup failed:`, errorMessage(error));
    }
  }

  if (changed > 0) {
    await saveCache(cachePath, cache);
  }
  return changed;
};

export const formatShowList = (cache: Cache): string[] => {
  const shows = listShows(cache);
  if (shows.length === 0) {
    return ["No show data in cache."];
  }
  return shows.map(
    (show) =>
      `${show.identifier.padEnd(9)} - ${show.status.padEnd(8)} - ${(show.url ?? "").padEnd(39)} - ${show.name}`,
  );
};

export const formatDownloadedList = (cache: Cache, showId?: string): string[] => {
  const records = listDownloaded(cache, showId);
  if (records.length === 0) {
    return ["No downloaded episodes in cache."];
  }
  return records.map(
    (record) => `${record.episodeKey} - ${record.dispatchedAt} - ${record.filename}`,
  );
};

/**
 * Normalise user-supplied IMDB ids, warning about and dropping the invalid ones.
 */
export const normaliseShowIds = (inputs: string[]): string[] =>
  inputs.flatMap((input) => {
    const identifier = normaliseShowId(input);
    if (identifier === null) {
      logger.warn(`Skipping ${input} - not an IMDB id`);
      return [];
    }
    return [identifier];
  });

/**
 * Mark shows inactive so runs skip them; their history is kept.
 * @returns identifiers that were tracked and are now inactive
 */
export const deactivate = async (cachePath: string, inputs: string[]): Promise<string[]> => {
  const cache = await loadCache(cachePath);
  const identifiers = normaliseShowIds(inputs).filter((id) => Object.hasOwn(cache.shows, id));
  for (const identifier of identifiers) {
    logger.info(`Deactivating ${cache.shows[identifier]?.name ?? identifier}`);
  }
  if (identifiers.length > 0) {
    await saveCache(cachePath, deactivateShows(cache, identifiers));
  }
  return identifiers;
};

/**
 * Stop tracking shows entirely.
 * @returns identifiers that were removed
 */
export const purge = async (cachePath: string, inputs: string[]): Promise<string[]> => {
  const cache = await loadCache(cachePath);
  const identifiers = normaliseShowIds(inputs).filter((id) => Object.hasOwn(cache.shows, id));
  for (const identifier of identifiers) {
    logger.info(`Purging ${cache.shows[identifier]?.name ?? identifier}`);
  }
  if (identifiers.length > 0) {
    await saveCache(cachePath, purgeShows(cache, identifiers));
  }
  return identifiers;
};
