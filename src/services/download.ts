import * as cliProgress from "cli-progress";
import type {
  Cache,
  DispatchFailure,
  DispatchReport,
  ReleasePreference,
  TorrentCandidate,
  TrackedShow,
} from "../types";
import { isDownloaded, listShows, markDownloaded } from "../utils/cache";
import { TransmissionConnectionError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { DEFAULT_PREFERENCE, groupByEpisode, selectBestRelease } from "../utils/release";
import type { FeedClient } from "./eztv";
import type { Dispatcher } from "./transmission";

export type DownloadPassOptions = {
  cache: Cache;
  feed: FeedClient;
  dispatcher: Dispatcher;
  pageCount: number;
  /** Restrict the pass to these show identifiers. */
  only?: string[];
  preference?: ReleasePreference;
  /** Render a page progress bar per show. */
  progress?: boolean;
  now?: () => Date;
};

export type DownloadPassResult = {
  cache: Cache;
  added: DispatchReport[];
  failed: DispatchFailure[];
};

const collectCandidates = async (
  feed: FeedClient,
  show: TrackedShow,
  pageCount: number,
  progress: boolean,
): Promise<TorrentCandidate[]> => {
  const bar = progress
    ? new cliProgress.SingleBar(
        {
          clearOnComplete: true,
          hideCursor: true,
          format: "[{bar}] {show} | page {value}/{total}",
        },
        cliProgress.Presets.shades_classic,
      )
    : null;
  bar?.start(pageCount, 0, { show: show.name });

  const candidates: TorrentCandidate[] = [];
  try {
    for await (const page of feed.fetchPages(show.identifier, pageCount)) {
      candidates.push(...page);
      bar?.increment();
    }
  } finally {
    bar?.stop();
  }
  return candidates;
};

/**
 * Fetch, select and dispatch new episodes for every active tracked show.
 * A rejected torrent or a failed show is logged and skipped; a lost daemon connection aborts the pass.
 * @returns the updated cache with the reports of the pass
 * @throws TransmissionConnectionError
 */
export const runDownloadPass = async ({
  cache: initialCache,
  feed,
  dispatcher,
  pageCount,
  only,
  preference = DEFAULT_PREFERENCE,
  progress = false,
  now = () => new Date(),
}: DownloadPassOptions): Promise<DownloadPassResult> => {
  let cache = initialCache;
  const added: DispatchReport[] = [];
  const failed: DispatchFailure[] = [];

  logger.header("Checking tracked shows for new episodes...");

  for (const show of listShows(initialCache)) {
    if (show.status !== "active") {
      logger.info(`${show.name} - inactive.`);
      continue;
    }
    if (only && !only.includes(show.identifier)) {
      continue;
    }

    let candidates: TorrentCandidate[];
    try {
      candidates = await collectCandidates(feed, show, pageCount, progress);
    } catch (error) {
      logger.error(`Error fetching listings for ${show.name}:`, errorMessage(error));
      failed.push({ show: show.name, reason: errorMessage(error) });
      continue;
    }

    const episodes = [...groupByEpisode(candidates).entries()]
      .filter(([episodeKey]) => !isDownloaded(cache, episodeKey))
      .sort(([a], [b]) => a.localeCompare(b));
    logger.info(`${show.name} - new episodes: ${episodes.length}`);

    for (const [episodeKey, group] of episodes) {
      const release = selectBestRelease(group, preference);

      try {
        const torrent = await dispatcher.addTorrent(release.downloadUri);
        cache = markDownloaded(cache, {
          episodeKey,
          showId: release.showId,
          season: release.season,
          episode: release.episode,
          filename: release.filename,
          downloadUri: release.downloadUri,
          dispatchedAt: now().toISOString(),
        });
        added.push({
          show: show.name,
          episodeKey,
          filename: release.filename,
          duplicate: torrent.duplicate,
        });
        logger.info(
          `ADDED ${show.name} - ${episodeKey} - ${release.filename}${torrent.duplicate ? " (already in Transmission)" : ""}`,
        );
      } catch (error) {
        if (error instanceof TransmissionConnectionError) {
          throw error;
        }
        logger.error(`Error queueing ${show.name} - ${episodeKey}:`, errorMessage(error));
        failed.push({ show: show.name, episodeKey, reason: errorMessage(error) });
      }
    }
  }

  logger.header(`${added.length} Episodes Queued`);

  return { cache, added, failed };
};
