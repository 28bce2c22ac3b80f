import type {
  Codec,
  ReleasePreference,
  Resolution,
  TorrentCandidate,
} from "../types";
import { patterns } from "./patterns";

export const DEFAULT_PREFERENCE: ReleasePreference = {
  codecs: ["HEVC", "H264"],
  resolutions: ["1080p", "720p"],
};

/**
 * Build the episode key used by the cache, e.g. `0944947:S08E03`.
 */
export const buildEpisodeKey = (
  showId: string,
  season: number,
  episode: number,
): string => {
  const pad = (value: number) => String(value).padStart(2, "0");
  return `${showId}:S${pad(season)}E${pad(episode)}`;
};

/**
 * Detect the video codec from a release name.
 * @param name release file name or title
 */
export const detectCodec = (name: string): Codec => {
  if (patterns.hevc.test(name)) {
    return "HEVC";
  }
  if (patterns.h264.test(name)) {
    return "H264";
  }
  return "unknown";
};

/**
 * Detect the resolution from a release name.
 * @param name release file name or title
 */
export const detectResolution = (name: string): Resolution => {
  const match = name.match(patterns.resolution);
  if (match) {
    switch (match[1]) {
      case "1080":
        return "1080p";
      case "720":
        return "720p";
      default:
        return "other";
    }
  }
  return patterns.standardDefinition.test(name) ? "other" : "unknown";
};

const rank = <T>(order: readonly T[], value: T): number => {
  const index = order.indexOf(value);
  return index === -1 ? 0 : order.length - index;
};

/**
 * Compare two releases of the same episode.
 * @returns a positive number when `a` is preferred, negative when `b` is, 0 on a full tie
 */
export const compareReleases = (
  a: TorrentCandidate,
  b: TorrentCandidate,
  preference: ReleasePreference = DEFAULT_PREFERENCE,
): number => {
  const codec = rank(preference.codecs, a.codec) - rank(preference.codecs, b.codec);
  if (codec !== 0) {
    return codec;
  }

  const resolution =
    rank(preference.resolutions, a.resolution) -
    rank(preference.resolutions, b.resolution);
  if (resolution !== 0) {
    return resolution;
  }

  return a.seeders - b.seeders;
};

/**
 * Pick the release to download among the listings of one episode.
 * Codec outranks resolution, resolution outranks seeders, and a full tie keeps the first-seen candidate.
 * @param candidates listings sharing one episode key, must not be empty
 */
export const selectBestRelease = (
  candidates: readonly TorrentCandidate[],
  preference: ReleasePreference = DEFAULT_PREFERENCE,
): TorrentCandidate => {
  const [first, ...rest] = candidates;
  if (first === undefined) {
    throw new RangeError("selectBestRelease needs at least one candidate");
  }

  return rest.reduce(
    (best, candidate) =>
      compareReleases(candidate, best, preference) > 0 ? candidate : best,
    first,
  );
};

/**
 * Group candidates by episode key, keeping first-seen order for keys and for candidates within a key.
 */
export const groupByEpisode = (
  candidates: readonly TorrentCandidate[],
): Map<string, TorrentCandidate[]> => {
  const groups = new Map<string, TorrentCandidate[]>();
  for (const candidate of candidates) {
    const group = groups.get(candidate.episodeKey);
    if (group) {
      group.push(candidate);
    } else {
      groups.set(candidate.episodeKey, [candidate]);
    }
  }
  return groups;
};
