import { z } from "zod";
import type { Cache, DownloadedRecord, TrackedShow } from "../types";
import { CacheError, errorMessage } from "./errors";
import { readFileIfExists, writeFileAtomic } from "./file";

// ============================================================================
// SCHEMA
// ============================================================================

const trackedShowSchema = z.object({
  identifier: z.string().min(1),
  name: z.string(),
  url: z.string().optional(),
  status: z.enum(["active", "inactive"]),
});

const downloadedRecordSchema = z.object({
  episodeKey: z.string().min(1),
  showId: z.string().min(1),
  season: z.number().int().nonnegative(),
  episode: z.number().int().nonnegative(),
  filename: z.string(),
  downloadUri: z.string(),
  dispatchedAt: z.string(),
});

const cacheSchema = z.object({
  shows: z.record(trackedShowSchema),
  downloaded: z.record(downloadedRecordSchema),
});

// ============================================================================
// PERSISTENCE
// ============================================================================

export const createEmptyCache = (): Cache => ({
  shows: {},
  downloaded: {},
});

/**
 * Load the cache file. A missing file yields an empty cache.
 * @param cachePath path to the cache file
 * @returns the cache
 * @throws CacheError when the file cannot be read or does not hold a cache
 */
export const loadCache = async (cachePath: string): Promise<Cache> => {
  let content: string | null;
  try {
    content = await readFileIfExists(cachePath);
  } catch (error) {
    throw new CacheError(
      `Cannot read cache file ${cachePath}: ${errorMessage(error)}`,
      cachePath,
      { cause: error },
    );
  }

  if (content === null) {
    return createEmptyCache();
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new CacheError(
      `Cache file ${cachePath} is not valid JSON: ${errorMessage(error)}`,
      cachePath,
      { cause: error },
    );
  }

  const parsed = cacheSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new CacheError(
      `Cache file ${cachePath} has an unexpected shape${where}: ${issue?.message ?? "invalid"}`,
      cachePath,
    );
  }
  return parsed.data;
};

/**
 * Write the whole cache back, replacing the previous file.
 * @param cachePath path to the cache file
 * @param cache the cache to persist
 */
export const saveCache = async (
  cachePath: string,
  cache: Cache,
): Promise<void> => {
  await writeFileAtomic(cachePath, `${JSON.stringify(cache, null, 4)}\n`);
};

// ============================================================================
// OPERATIONS
// ============================================================================

export const isDownloaded = (cache: Cache, episodeKey: string): boolean =>
  Object.hasOwn(cache.downloaded, episodeKey);

/**
 * Record a dispatched episode. Marking an episode twice keeps the first record.
 */
export const markDownloaded = (
  cache: Cache,
  record: DownloadedRecord,
): Cache => {
  if (isDownloaded(cache, record.episodeKey)) {
    return cache;
  }
  return {
    ...cache,
    downloaded: { ...cache.downloaded, [record.episodeKey]: record },
  };
};

/**
 * Track a show, replacing the metadata of a show with the same identifier.
 */
export const addShow = (cache: Cache, show: TrackedShow): Cache => ({
  ...cache,
  shows: { ...cache.shows, [show.identifier]: show },
});

export const listShows = (cache: Cache): TrackedShow[] =>
  Object.values(cache.shows).sort((a, b) =>
    a.identifier.localeCompare(b.identifier),
  );

/**
 * Mark shows inactive. Their downloaded episodes stay in the cache.
 * Unknown identifiers are ignored.
 */
export const deactivateShows = (cache: Cache, identifiers: string[]): Cache => {
  const shows = { ...cache.shows };
  for (const identifier of identifiers) {
    const show = shows[identifier];
    if (show) {
      shows[identifier] = { ...show, status: "inactive" };
    }
  }
  return { ...cache, shows };
};

/**
 * Stop tracking shows. Downloaded records are left behind as orphans.
 */
export const purgeShows = (cache: Cache, identifiers: string[]): Cache => {
  const shows = { ...cache.shows };
  for (const identifier of identifiers) {
    delete shows[identifier];
  }
  return { ...cache, shows };
};

export const listDownloaded = (
  cache: Cache,
  showId?: string,
): DownloadedRecord[] =>
  Object.values(cache.downloaded)
    .filter((record) => showId === undefined || record.showId === showId)
    .sort((a, b) => a.episodeKey.localeCompare(b.episodeKey));
